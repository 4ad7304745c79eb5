/**
 * Project type definitions
 */

import type { Platform } from './platform.js';

/**
 * A discovered, independently testable unit.
 * Identity is the absolute path; immutable once classified.
 */
export interface Project {
  readonly path: string;
  /** Display name: `<root>/<dir>` relative to the workspace */
  readonly name: string;
  /** Root directory (relative to the workspace) the project was found under */
  readonly root: string;
  readonly platform: Platform;
}

/**
 * A project paired with the adapter that will test it
 */
export interface DispatchTarget {
  readonly project: Project;
  /** Absolute path of the runner adapter executable */
  readonly adapter: string;
}
