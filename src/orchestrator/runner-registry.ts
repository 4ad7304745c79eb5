/**
 * Runner registry
 * Maps a platform to the external adapter executable that tests it
 */

import { existsSync, statSync } from 'node:fs';
import path from 'node:path';
import type { Platform } from '../types/platform.js';
import type { DispatchTarget, Project } from '../types/project.js';
import type { OrchestrationWarning } from '../types/diagnostics.js';

export type AdapterResolution =
  | { found: true; adapter: string }
  | { found: false; adapter?: string };

export interface RunnerRegistry {
  /** Resolve the adapter registered for a platform */
  resolve(platform: Platform): AdapterResolution;
}

/**
 * Create a registry over the configured adapters.
 * An adapter counts as registered when it is configured and its file exists;
 * whether it is executable is only discovered when it is spawned.
 *
 * @param workspaceRoot - Absolute workspace root adapters are relative to
 * @param adapters - Adapter path per platform
 */
export function createRunnerRegistry(
  workspaceRoot: string,
  adapters: Partial<Record<Platform, string>>
): RunnerRegistry {
  const cache = new Map<Platform, AdapterResolution>();

  return {
    resolve(platform) {
      const cached = cache.get(platform);
      if (cached) return cached;

      const configured = adapters[platform];
      let resolution: AdapterResolution;
      if (!configured) {
        resolution = { found: false };
      } else {
        const adapter = path.resolve(workspaceRoot, configured);
        resolution = existsSync(adapter) && statSync(adapter).isFile()
          ? { found: true, adapter }
          : { found: false, adapter };
      }

      cache.set(platform, resolution);
      return resolution;
    },
  };
}

export interface TargetSelection {
  targets: DispatchTarget[];
  warnings: OrchestrationWarning[];
}

/**
 * Pair each project with its adapter, dropping projects without one
 *
 * @param projects - Classified projects
 * @param registry - Runner registry
 */
export function selectTargets(projects: readonly Project[], registry: RunnerRegistry): TargetSelection {
  const targets: DispatchTarget[] = [];
  const warnings: OrchestrationWarning[] = [];

  for (const project of projects) {
    const resolution = registry.resolve(project.platform);
    if (resolution.found) {
      targets.push({ project, adapter: resolution.adapter });
    } else {
      warnings.push({
        kind: 'missing_runner_adapter',
        path: project.path,
        platform: project.platform,
        adapter: resolution.adapter,
      });
    }
  }

  return { targets, warnings };
}
