/**
 * Run command
 * Discovers projects and runs every test adapter in parallel
 */

import { Command, InvalidArgumentError } from 'commander';
import path from 'node:path';
import { loadConfig, getConfigPath, MAX_TIMER_MS } from '../../config/index.js';
import { resolveWorkspaceRoot } from '../../config/workspace-root.js';
import { runOrchestration, exitCodeFor } from '../../orchestrator/index.js';
import { printDebug, setVerbose } from '../output.js';

export interface RunCommandOptions {
  cwd?: string;
  root?: string[];
  timeout?: number;
  verbose?: boolean;
  progress?: boolean;
}

/**
 * Parse a positive integer option value that fits in a timer
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  if (parsed > MAX_TIMER_MS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMER_MS}, got "${value}".`);
  }
  return parsed;
}

/**
 * Translate CLI flags into configuration overrides
 */
export function optionsToOverrides(options: RunCommandOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (options.root && options.root.length > 0) {
    overrides.discovery = { roots: options.root };
  }
  if (options.timeout !== undefined) {
    overrides.execution = { timeout_ms: options.timeout };
  }

  const output: Record<string, unknown> = {};
  if (options.verbose) {
    output.verbose = true;
  }
  // commander sets progress=true unless --no-progress is given
  if (options.progress === false) {
    output.progress = false;
  }
  if (Object.keys(output).length > 0) {
    overrides.output = output;
  }

  return overrides;
}

/**
 * Run the orchestration with SIGINT/SIGTERM wired to cancellation
 *
 * @returns Process exit code
 */
export async function executeRun(options: RunCommandOptions): Promise<number> {
  const workspaceRoot = options.cwd
    ? path.resolve(options.cwd)
    : await resolveWorkspaceRoot(process.cwd());

  const config = await loadConfig({ cwd: workspaceRoot, overrides: optionsToOverrides(options) });
  setVerbose(config.output.verbose);
  printDebug(`Workspace root: ${workspaceRoot}`);
  printDebug(`Config file: ${getConfigPath() ?? '(defaults)'}`);

  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const result = await runOrchestration({
      workspaceRoot,
      config,
      signal: controller.signal,
    });
    return exitCodeFor(result);
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

/**
 * Create the run command
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Run the tests of every discovered project in parallel (fail-fast)')
    .option('-C, --cwd <dir>', 'Workspace root (default: nearest config file or git root)')
    .option('--root <dir...>', 'Root directories to scan, in order')
    .option('-t, --timeout <ms>', 'Global deadline in milliseconds', parsePositiveInt)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--no-progress', 'Disable the progress spinner')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await executeRun(options);
    });
}
