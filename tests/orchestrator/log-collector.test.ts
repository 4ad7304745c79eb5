/**
 * Tests for the log collector
 */

import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { LogCollector } from '../../src/orchestrator/log-collector.js';
import type { Project } from '../../src/types/project.js';

const web: Project = { path: '/w/apps/web', name: 'apps/web', root: 'apps', platform: 'node' };
const api: Project = { path: '/w/apps/api', name: 'apps/api', root: 'apps', platform: 'python' };

describe('LogCollector', () => {
  let logs: LogCollector | undefined;

  afterEach(async () => {
    await logs?.dispose();
    logs = undefined;
  });

  it('should allocate a temporary directory', async () => {
    logs = await LogCollector.create('testfleet-logs-test-');
    expect(existsSync(logs.directory)).toBe(true);
    expect(path.basename(logs.directory).startsWith('testfleet-logs-test-')).toBe(true);
  });

  it('should open one sink file per project inside the directory', async () => {
    logs = await LogCollector.create();
    const first = logs.open(web);
    const second = logs.open(api);

    expect(first.path).toBe(path.join(logs.directory, '1-apps-web.log'));
    expect(second.path).toBe(path.join(logs.directory, '2-apps-api.log'));
  });

  it('should refuse a second sink for the same project', async () => {
    logs = await LogCollector.create();
    logs.open(web);
    expect(() => logs?.open(web)).toThrow('Log sink already open for apps/web');
  });

  it('should capture interleaved output from several sources', async () => {
    logs = await LogCollector.create();
    logs.open(web);
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    logs.attach(web, stdout);
    logs.attach(web, stderr);

    stdout.write('line 1\n');
    stderr.write('oops\n');
    stdout.end('line 2\n');
    stderr.end();
    await new Promise((resolve) => setImmediate(resolve));

    const content = await logs.read(web);
    expect(content.split('\n').sort()).toEqual(['', 'line 1', 'line 2', 'oops']);
  });

  it('should keep projects isolated', async () => {
    logs = await LogCollector.create();
    logs.open(web);
    logs.open(api);
    logs.note(web, 'web output');
    logs.note(api, 'api output');

    expect(await logs.read(web)).toBe('web output\n');
    expect(await logs.read(api)).toBe('api output\n');
  });

  it('should return an empty string for a project without a sink', async () => {
    logs = await LogCollector.create();
    expect(await logs.read(web)).toBe('');
  });

  it('should throw when attaching to a project without a sink', async () => {
    logs = await LogCollector.create();
    expect(() => logs?.attach(web, new PassThrough())).toThrow('No log sink open for apps/web');
  });

  it('should remove the directory on dispose and tolerate a second dispose', async () => {
    logs = await LogCollector.create();
    logs.open(web);
    logs.note(web, 'something');
    const dir = logs.directory;

    await logs.dispose();
    expect(existsSync(dir)).toBe(false);
    expect(logs.isDisposed).toBe(true);

    await logs.dispose();
    expect(() => logs?.open(api)).toThrow('LogCollector has been disposed');
  });
});
