/**
 * Process termination helpers
 * Best-effort: a signal is requested, its effect is never awaited here.
 */

import { spawn as spawnDefault } from 'node:child_process';

export interface ProcessKillTarget {
  pid?: number | null;
  kill: (signal?: NodeJS.Signals) => boolean;
}

type TaskKillSpawnResult = {
  unref: () => void;
  once: (event: 'error', listener: () => void) => unknown;
};

type TaskKillSpawn = (
  command: string,
  args: readonly string[],
  options: { stdio: 'ignore'; windowsHide: true },
) => TaskKillSpawnResult;

type GroupKill = (pid: number, signal: NodeJS.Signals) => void;

export interface TerminateProcessOptions {
  platform?: NodeJS.Platform;
  /** The process leads its own process group (spawned with `detached`) */
  groupLeader?: boolean;
  spawnImpl?: TaskKillSpawn;
  groupKillImpl?: GroupKill;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Send a signal to a process and, where possible, to everything it started.
 * - POSIX group leaders: the whole process group is signalled.
 * - Otherwise Node's standard kill() is used.
 * - On Windows, SIGKILL also runs `taskkill /T /F` to terminate the tree.
 *
 * @returns True when a signal was delivered to something
 */
export function terminateProcess(
  proc: ProcessKillTarget,
  signal: NodeJS.Signals,
  options: TerminateProcessOptions = {},
): boolean {
  const platform = options.platform ?? process.platform;
  const pid = proc.pid ?? 0;

  if (platform !== 'win32' && options.groupLeader && pid > 0) {
    const groupKill: GroupKill = options.groupKillImpl ?? ((target, sig) => process.kill(-target, sig));
    try {
      groupKill(pid, signal);
      return true;
    } catch (error) {
      // ESRCH: the group is already gone
      if (errorCode(error) === 'ESRCH') return false;
    }
  }

  let delivered = false;
  try {
    delivered = proc.kill(signal);
  } catch (error) {
    if (errorCode(error) !== 'ESRCH') throw error;
  }

  if (platform !== 'win32' || signal !== 'SIGKILL' || pid <= 0) return delivered;

  const spawnImpl: TaskKillSpawn = options.spawnImpl
    ?? ((command, args, spawnOptions) => spawnDefault(command, args, spawnOptions));
  const killer = spawnImpl('taskkill', ['/PID', String(pid), '/T', '/F'], {
    stdio: 'ignore',
    windowsHide: true,
  });
  killer.unref();
  // taskkill failing to start leaves the kill() above as the only attempt
  killer.once('error', () => undefined);
  return true;
}
