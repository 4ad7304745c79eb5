/**
 * Orchestration diagnostics
 * Non-fatal problems are returned as values and only shrink the execution set
 */

import type { Platform } from './platform.js';

export type OrchestrationWarning =
  | {
      kind: 'discovery_unreadable';
      path: string;
      reason: string;
    }
  | {
      kind: 'unclassified_platform';
      path: string;
    }
  | {
      kind: 'missing_runner_adapter';
      path: string;
      platform: Platform;
      adapter?: string;
    };

export type OrchestrationWarningKind = OrchestrationWarning['kind'];

/**
 * Render a warning as a single console line
 *
 * @param warning - Warning to describe
 * @returns Human-readable message
 */
export function describeWarning(warning: OrchestrationWarning): string {
  switch (warning.kind) {
    case 'discovery_unreadable':
      return `Skipping ${warning.path}: ${warning.reason}`;
    case 'unclassified_platform':
      return `Skipping ${warning.path}: no platform marker found`;
    case 'missing_runner_adapter':
      return warning.adapter
        ? `Skipping ${warning.path}: ${warning.platform} runner not found at ${warning.adapter}`
        : `Skipping ${warning.path}: no runner registered for ${warning.platform}`;
  }
}
