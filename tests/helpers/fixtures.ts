/**
 * Test fixtures: throw-away workspaces with shell runner adapters
 */

import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { stripVTControlCharacters } from 'node:util';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG, type Config } from '../../src/config/index.js';

/**
 * Adapter that runs `test.sh` inside the project directory it is given
 */
export const DELEGATING_ADAPTER = '#!/bin/sh\ncd "$1" || exit 2\nexec sh ./test.sh\n';

export interface Workspace {
  root: string;
  /** Create `<root>/<name>` holding the given files */
  addProject(dir: string, files: Record<string, string>): string;
  /** Write an executable adapter script, returning its path relative to the workspace */
  addAdapter(name: string, body?: string, mode?: number): string;
  cleanup(): void;
}

export function createWorkspace(prefix: string = 'testfleet-ws-'): Workspace {
  const root = mkdtempSync(path.join(os.tmpdir(), prefix));

  return {
    root,
    addProject(dir, files) {
      const projectDir = path.join(root, dir);
      mkdirSync(projectDir, { recursive: true });
      for (const [name, content] of Object.entries(files)) {
        const filePath = path.join(projectDir, name);
        mkdirSync(path.dirname(filePath), { recursive: true });
        writeFileSync(filePath, content);
      }
      return projectDir;
    },
    addAdapter(name, body = DELEGATING_ADAPTER, mode = 0o755) {
      const relative = path.join('runners', name);
      const adapterPath = path.join(root, relative);
      mkdirSync(path.dirname(adapterPath), { recursive: true });
      writeFileSync(adapterPath, body);
      chmodSync(adapterPath, mode);
      return relative;
    },
    cleanup() {
      rmSync(root, { recursive: true, force: true });
    },
  };
}

/**
 * A node project whose test script prints a line and exits with a code after a delay
 */
export function nodeProject(options: { output: string; exitCode: number; sleepSeconds?: number }): Record<string, string> {
  const sleep = options.sleepSeconds ? `sleep ${options.sleepSeconds}\n` : '';
  return {
    'package.json': '{}\n',
    'test.sh': `echo "${options.output}"\n${sleep}exit ${options.exitCode}\n`,
  };
}

/**
 * Test configuration: only the node platform has an adapter, progress off
 */
export function testConfig(adapter: string, overrides: Partial<Config['execution']> = {}): Config {
  return {
    ...DEFAULT_CONFIG,
    discovery: { roots: ['apps', 'packages'] },
    platforms: {
      markers: DEFAULT_CONFIG.platforms.markers,
      adapters: { node: adapter },
    },
    execution: { timeout_ms: 30_000, kill_grace_ms: 1000, ...overrides },
    output: { verbose: false, progress: false },
  };
}

/**
 * Join captured console.log calls into plain text
 */
export function capturedText(calls: unknown[][]): string {
  return stripVTControlCharacters(calls.map((args) => args.map(String).join(' ')).join('\n'));
}
