/**
 * CLI commands index
 * Exports all command creators
 */

export { createRunCommand, executeRun, optionsToOverrides, parsePositiveInt } from './run.js';
export { createListCommand } from './list.js';
