/**
 * Tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG, DEFAULT_RUNNERS_DIR } from '../../src/config/defaults.js';
import { ConfigSchema, MAX_TIMER_MS } from '../../src/config/schema.js';
import {
  deepMerge,
  getConfigPath,
  loadConfig,
  loadEnvConfig,
  validateConfig,
} from '../../src/config/index.js';

describe('DEFAULT_CONFIG', () => {
  it('should pass schema validation', () => {
    const result = ConfigSchema.safeParse(DEFAULT_CONFIG);
    expect(result.success).toBe(true);
  });

  it('should scan the conventional roots in order', () => {
    expect(DEFAULT_CONFIG.discovery.roots).toEqual(['apps', 'packages', 'services']);
  });

  it('should check markers in precedence order', () => {
    expect(DEFAULT_CONFIG.platforms.markers.map((m) => m.platform)).toEqual([
      'flutter',
      'node',
      'python',
      'go',
      'rust',
      'dotnet',
    ]);
  });

  it('should point every platform at a shell adapter', () => {
    expect(DEFAULT_CONFIG.platforms.adapters.go).toBe(`${DEFAULT_RUNNERS_DIR}/go.sh`);
    expect(Object.keys(DEFAULT_CONFIG.platforms.adapters)).toHaveLength(6);
  });

  it('should have a ten minute deadline', () => {
    expect(DEFAULT_CONFIG.execution.timeout_ms).toBe(600_000);
    expect(DEFAULT_CONFIG.execution.kill_grace_ms).toBe(2000);
  });
});

describe('ConfigSchema', () => {
  it('should fill marker defaults', () => {
    const result = ConfigSchema.parse({
      discovery: {},
      platforms: { markers: [{ platform: 'go', files: ['go.mod'] }], adapters: {} },
      execution: {},
      output: {},
    });

    expect(result.discovery.roots).toEqual(['apps', 'packages', 'services']);
    expect(result.platforms.markers).toEqual([{ platform: 'go', files: ['go.mod'], extensions: [] }]);
    expect(result.execution).toEqual({ timeout_ms: 600_000, kill_grace_ms: 2000 });
    expect(result.output).toEqual({ verbose: false, progress: true });
  });

  it('should reject unknown platforms and a non-positive timeout', () => {
    expect(
      ConfigSchema.safeParse({ ...DEFAULT_CONFIG, execution: { timeout_ms: 0, kill_grace_ms: 0 } }).success
    ).toBe(false);
    expect(
      ConfigSchema.safeParse({
        ...DEFAULT_CONFIG,
        platforms: { ...DEFAULT_CONFIG.platforms, adapters: { cobol: 'runners/cobol.sh' } },
      }).success
    ).toBe(false);
  });
});

describe('timer bounds', () => {
  const withExecution = (timeout_ms: number, kill_grace_ms = 2000) =>
    ConfigSchema.safeParse({ ...DEFAULT_CONFIG, execution: { timeout_ms, kill_grace_ms } });

  it('should accept the largest delay a timer can hold', () => {
    expect(withExecution(MAX_TIMER_MS).success).toBe(true);
    expect(withExecution(1000, MAX_TIMER_MS).success).toBe(true);
  });

  it('should reject delays that would overflow the timer', () => {
    expect(withExecution(3_000_000_000).success).toBe(false);
    expect(withExecution(1000, MAX_TIMER_MS + 1).success).toBe(false);
  });

  it('should ignore an overflowing timeout from the environment', () => {
    expect(loadEnvConfig({ TESTFLEET_TIMEOUT_MS: '3000000000' })).toEqual({});
    expect(loadEnvConfig({ TESTFLEET_TIMEOUT_MS: String(MAX_TIMER_MS) })).toEqual({
      execution: { timeout_ms: MAX_TIMER_MS },
    });
  });
});

describe('deepMerge', () => {
  it('should merge nested objects key by key', () => {
    const merged = deepMerge(
      { execution: { timeout_ms: 1000, kill_grace_ms: 50 }, output: { verbose: false } },
      { execution: { timeout_ms: 2000 } }
    );

    expect(merged).toEqual({
      execution: { timeout_ms: 2000, kill_grace_ms: 50 },
      output: { verbose: false },
    });
  });

  it('should replace arrays instead of concatenating them', () => {
    const merged = deepMerge({ discovery: { roots: ['apps', 'packages'] } }, { discovery: { roots: ['libs'] } });
    expect(merged).toEqual({ discovery: { roots: ['libs'] } });
  });

  it('should ignore undefined values in the source', () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });

  it('should not mutate its inputs', () => {
    const target = { output: { verbose: false } };
    deepMerge(target, { output: { verbose: true } });
    expect(target).toEqual({ output: { verbose: false } });
  });
});

describe('loadEnvConfig', () => {
  it('should read the deadline, log level and progress switch', () => {
    expect(
      loadEnvConfig({
        TESTFLEET_TIMEOUT_MS: '45000',
        TESTFLEET_LOG_LEVEL: 'debug',
        TESTFLEET_NO_PROGRESS: '1',
      })
    ).toEqual({
      execution: { timeout_ms: 45000 },
      output: { verbose: true, progress: false },
    });
  });

  it('should ignore invalid or missing values', () => {
    expect(loadEnvConfig({ TESTFLEET_TIMEOUT_MS: 'soon', TESTFLEET_LOG_LEVEL: 'info' })).toEqual({});
    expect(loadEnvConfig({ TESTFLEET_TIMEOUT_MS: '-5' })).toEqual({});
    expect(loadEnvConfig({})).toEqual({});
  });
});

describe('loadConfig', () => {
  let dir: string;
  let warnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'testfleet-config-'));
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(getConfigPath()).toBeNull();
  });

  it('should merge a yaml config file over the defaults', async () => {
    const file = path.join(dir, 'testfleet.config.yaml');
    writeFileSync(
      file,
      [
        'discovery:',
        '  roots: [apps, libs]',
        'platforms:',
        '  adapters:',
        '    node: tools/run-node.sh',
        'execution:',
        '  timeout_ms: 120000',
        '',
      ].join('\n')
    );

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(getConfigPath()).toBe(file);
    expect(config.discovery.roots).toEqual(['apps', 'libs']);
    expect(config.platforms.adapters.node).toBe('tools/run-node.sh');
    expect(config.platforms.adapters.go).toBe(`${DEFAULT_RUNNERS_DIR}/go.sh`);
    expect(config.execution).toEqual({ timeout_ms: 120_000, kill_grace_ms: 2000 });
  });

  it('should apply env vars over the file and overrides over both', async () => {
    writeFileSync(path.join(dir, '.testfleetrc.yml'), 'execution:\n  timeout_ms: 120000\noutput:\n  verbose: false\n');

    const config = await loadConfig({
      cwd: dir,
      env: { TESTFLEET_TIMEOUT_MS: '90000', TESTFLEET_LOG_LEVEL: 'debug' },
      overrides: { execution: { timeout_ms: 5000 } },
    });

    expect(config.execution.timeout_ms).toBe(5000);
    expect(config.output.verbose).toBe(true);
  });

  it('should fall back to defaults when the merged config is invalid', async () => {
    writeFileSync(path.join(dir, 'testfleet.config.yml'), 'execution:\n  timeout_ms: -1\n');

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnSpy).toHaveBeenCalledWith(
      'Configuration validation warnings: execution.timeout_ms: Number must be greater than 0'
    );
  });

  it('should keep env vars and CLI overrides when the config file is invalid', async () => {
    writeFileSync(
      path.join(dir, 'testfleet.config.yaml'),
      'discovery:\n  roots: [libs]\nexecution:\n  timeout_ms: 3000000000\n'
    );

    const config = await loadConfig({
      cwd: dir,
      env: { TESTFLEET_NO_PROGRESS: '1' },
      overrides: { execution: { timeout_ms: 5000 }, discovery: { roots: ['services'] } },
    });

    expect(config.execution).toEqual({ timeout_ms: 5000, kill_grace_ms: 2000 });
    expect(config.discovery.roots).toEqual(['services']);
    expect(config.output.progress).toBe(false);
    expect(config.platforms).toEqual(DEFAULT_CONFIG.platforms);
    expect(warnSpy).toHaveBeenCalledWith(
      'Configuration validation warnings: execution.timeout_ms: Number must be less than or equal to 2147483647'
    );
  });

  it('should drop the file values when the config file is invalid', async () => {
    writeFileSync(
      path.join(dir, 'testfleet.config.yaml'),
      'discovery:\n  roots: [libs]\nexecution:\n  kill_grace_ms: -5\n'
    );

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.discovery.roots).toEqual(DEFAULT_CONFIG.discovery.roots);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should ignore a config file that is not a mapping', async () => {
    const file = path.join(dir, 'testfleet.config.yaml');
    writeFileSync(file, '- apps\n- packages\n');

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnSpy).toHaveBeenCalledWith(`Ignoring ${file}: expected a mapping at the top level`);
  });
});

describe('validateConfig', () => {
  it('should return parsed data for a valid config', () => {
    expect(validateConfig({ ...DEFAULT_CONFIG, output: { verbose: true, progress: false } }).output).toEqual({
      verbose: true,
      progress: false,
    });
  });
});
