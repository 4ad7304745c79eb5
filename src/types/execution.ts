/**
 * Execution type definitions
 * One Execution is one spawned runner adapter process
 */

import type { ChildProcess } from 'node:child_process';
import { z } from 'zod';
import type { Project } from './project.js';

export const ExecutionStatusSchema = z.enum([
  'pending',
  'running',
  'succeeded',
  'failed',
  'cancelled',
  'timed_out',
]);
export type ExecutionStatus = z.infer<typeof ExecutionStatusSchema>;

/** Statuses an Execution never leaves */
export const TERMINAL_STATUSES: ReadonlySet<ExecutionStatus> = new Set([
  'succeeded',
  'failed',
  'cancelled',
  'timed_out',
]);

export function isTerminalStatus(status: ExecutionStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * How a child process ended
 */
export interface ExecutionExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the adapter could not be spawned */
  error?: string;
}

/**
 * Runtime record of one adapter process.
 * Created by the dispatcher; status fields are written only by the ProcessMonitor.
 */
export interface Execution {
  readonly id: string;
  readonly project: Project;
  readonly adapter: string;
  readonly logPath: string;
  readonly startedAt: number;
  /** Undefined when the spawn failed synchronously */
  readonly process?: ChildProcess;
  readonly pid: number | null;
  /** Resolves once, when the process exits or fails to spawn */
  readonly exited: Promise<ExecutionExit>;
  /** Resolves once stdout and stderr have been drained */
  readonly closed: Promise<void>;
  status: ExecutionStatus;
  exit?: ExecutionExit;
  endedAt?: number;
}

/**
 * Serializable view of an Execution for reports
 */
export interface ExecutionSummary {
  id: string;
  name: string;
  path: string;
  platform: Project['platform'];
  status: ExecutionStatus;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  error?: string;
  durationMs: number;
}

export const RunOutcomeSchema = z.enum([
  'success',
  'failure',
  'timeout',
  'no_projects',
  'interrupted',
]);
export type RunOutcome = z.infer<typeof RunOutcomeSchema>;

/**
 * Aggregate result of one orchestration run
 */
export interface RunResult {
  outcome: RunOutcome;
  executions: ExecutionSummary[];
  /** The triggering failed project (failure outcome only) */
  culprit?: Project;
  /** Full captured log of the culprit */
  culpritLog?: string;
  startedAt: string;
  durationMs: number;
}

/**
 * Summarize an execution for reporting
 *
 * @param execution - Execution to summarize
 * @param now - Reference time for executions that have not ended
 */
export function summarizeExecution(execution: Execution, now: number = Date.now()): ExecutionSummary {
  return {
    id: execution.id,
    name: execution.project.name,
    path: execution.project.path,
    platform: execution.project.platform,
    status: execution.status,
    exitCode: execution.exit?.exitCode ?? null,
    signal: execution.exit?.signal ?? null,
    error: execution.exit?.error,
    durationMs: (execution.endedAt ?? now) - execution.startedAt,
  };
}
