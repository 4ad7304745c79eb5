/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createRunCommand, createListCommand } from './commands/index.js';
import { printError, stopSpinner } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Read the package version from the nearest package.json above this module
 */
function readPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch {
      // Not here; keep walking up
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

/**
 * Package version - read from package.json
 */
export const VERSION: string = readPackageVersion();

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('testfleet')
    .description('Run the tests of every project in parallel, stopping at the first failure')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createListCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    stopSpinner();
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
