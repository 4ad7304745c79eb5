/**
 * Project discovery
 * Enumerates candidate project directories one level below each configured root
 */

import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import type { OrchestrationWarning } from '../types/diagnostics.js';

/**
 * A directory that may hold a testable project
 */
export interface Candidate {
  /** Absolute path */
  path: string;
  /** Root directory (as configured) it was found under */
  root: string;
  /** `<root>/<dir>` */
  name: string;
}

export interface DiscoveryResult {
  candidates: Candidate[];
  /** Unreadable or placeholder directories that were skipped */
  skipped: OrchestrationWarning[];
}

/**
 * Whether a directory holds anything besides hidden entries like `.gitkeep`
 */
async function isPlausibleProject(dir: string): Promise<boolean> {
  const entries = await fs.readdir(dir);
  return entries.some((name) => !name.startsWith('.'));
}

function errorReason(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Discover candidate directories under the ordered roots.
 * Roots are visited in the given order and entries sorted by name, so
 * discovery over an unchanged tree always yields the same list.
 *
 * @param workspaceRoot - Absolute workspace root
 * @param roots - Root directories relative to the workspace root
 * @returns Candidates plus the directories that were skipped
 */
export async function discoverCandidates(
  workspaceRoot: string,
  roots: readonly string[]
): Promise<DiscoveryResult> {
  const candidates: Candidate[] = [];
  const skipped: OrchestrationWarning[] = [];
  const seen = new Set<string>();

  for (const root of roots) {
    const rootDir = path.resolve(workspaceRoot, root);

    let entries: Dirent[];
    try {
      entries = await fs.readdir(rootDir, { withFileTypes: true });
    } catch (error) {
      // A missing root is normal (not every workspace has every root)
      if (errorReason(error) !== 'ENOENT') {
        skipped.push({ kind: 'discovery_unreadable', path: rootDir, reason: errorReason(error) });
      }
      continue;
    }

    const dirs = entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));

    for (const dirName of dirs) {
      const dir = path.join(rootDir, dirName);
      if (seen.has(dir)) continue;

      try {
        if (!(await isPlausibleProject(dir))) {
          skipped.push({ kind: 'discovery_unreadable', path: dir, reason: 'empty directory' });
          continue;
        }
      } catch (error) {
        skipped.push({ kind: 'discovery_unreadable', path: dir, reason: errorReason(error) });
        continue;
      }

      seen.add(dir);
      candidates.push({
        path: dir,
        root,
        name: `${root.replace(/\/+$/, '')}/${dirName}`,
      });
    }
  }

  return { candidates, skipped };
}
