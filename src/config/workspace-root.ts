/**
 * Workspace root detection
 * Resolves the workspace root by walking up the directory tree
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAMES } from './defaults.js';

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve the workspace root directory from a given working directory
 *
 * Heuristic priority, per ancestor from `cwd` upward:
 * 1. A directory containing a testfleet config file
 * 2. A directory containing `.git` (the repository top level)
 * 3. `cwd` (fallback)
 *
 * @param cwd - The current working directory
 * @returns The resolved workspace root path
 */
export async function resolveWorkspaceRoot(cwd: string): Promise<string> {
  const start = path.resolve(cwd);
  let current = start;

  while (true) {
    for (const name of CONFIG_FILE_NAMES) {
      if (await pathExists(path.join(current, name))) {
        return current;
      }
    }

    if (await pathExists(path.join(current, '.git'))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return start;
    }
    current = parent;
  }
}
