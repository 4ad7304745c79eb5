/**
 * Execution dispatcher
 * Spawns one runner adapter process per project, all before monitoring begins.
 *
 * Fan-out is unbounded: every target is spawned at once. A `maxParallel`
 * pool would slot in here without touching the monitor.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import type { DispatchTarget, Project } from '../types/project.js';
import type { Execution, ExecutionExit } from '../types/execution.js';
import type { LogCollector } from './log-collector.js';

export interface DispatchOptions {
  /** Working directory for adapters (the workspace root) */
  cwd: string;
  /** Extra environment for adapters */
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Whether adapters are spawned as process group leaders
 */
export function spawnsGroupLeaders(platform: NodeJS.Platform = process.platform): boolean {
  return platform !== 'win32';
}

function spawnFailure(
  id: string,
  target: DispatchTarget,
  logPath: string,
  startedAt: number,
  message: string,
): Execution {
  const exit: ExecutionExit = { exitCode: null, signal: null, error: message };
  return {
    id,
    project: target.project,
    adapter: target.adapter,
    logPath,
    startedAt,
    pid: null,
    exited: Promise.resolve(exit),
    closed: Promise.resolve(),
    status: 'running',
  };
}

/**
 * Spawn the adapter for one target
 *
 * @param id - Execution id
 * @param target - Project and adapter
 * @param logs - Log collector providing the sink
 * @param options - Dispatch options
 * @returns The running execution; spawn failures surface through `exited`
 */
export function dispatch(
  id: string,
  target: DispatchTarget,
  logs: LogCollector,
  options: DispatchOptions,
): Execution {
  const { project, adapter } = target;
  const sink = logs.open(project);
  const startedAt = Date.now();

  let child: ChildProcess;
  try {
    child = spawn(adapter, [project.path], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env, CI: 'true' },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: spawnsGroupLeaders(options.platform),
      windowsHide: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logs.note(project, `[testfleet] failed to spawn ${adapter}: ${message}`);
    return spawnFailure(id, target, sink.path, startedAt, message);
  }

  if (child.stdout) logs.attach(project, child.stdout);
  if (child.stderr) logs.attach(project, child.stderr);

  const exited = new Promise<ExecutionExit>((resolve) => {
    child.once('exit', (exitCode, signal) => {
      resolve({ exitCode, signal });
    });
    child.on('error', (error) => {
      // Without a pid the process never started
      if (child.pid === undefined) {
        logs.note(project, `[testfleet] failed to spawn ${adapter}: ${error.message}`);
        resolve({ exitCode: null, signal: null, error: error.message });
      } else {
        logs.note(project, `[testfleet] adapter process error: ${error.message}`);
      }
    });
  });

  const closed = new Promise<void>((resolve) => {
    child.once('close', () => resolve());
    child.once('error', () => {
      if (child.pid === undefined) resolve();
    });
  });

  return {
    id,
    project,
    adapter,
    logPath: sink.path,
    startedAt,
    process: child,
    pid: child.pid ?? null,
    exited,
    closed,
    status: 'running',
  };
}

/**
 * Spawn every target. Returns once all spawns have been issued.
 *
 * @param targets - Projects paired with adapters
 * @param logs - Log collector
 * @param options - Dispatch options
 */
export function dispatchAll(
  targets: readonly DispatchTarget[],
  logs: LogCollector,
  options: DispatchOptions,
): Execution[] {
  return targets.map((target, index) => dispatch(executionId(target.project, index), target, logs, options));
}

/**
 * Stable execution id: dispatch position plus project name
 */
export function executionId(project: Project, index: number): string {
  return `${index + 1}:${project.name}`;
}
