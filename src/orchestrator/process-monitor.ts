/**
 * Process monitor
 * Single coordinator that drives every execution of a run to a terminal status.
 *
 * Each live execution contributes its `exited` promise; together with a deadline
 * timer and an optional abort signal they are multiplexed through one
 * `Promise.race`, which is the coordinator's only suspension point. The live map
 * is created, read and mutated by this class alone.
 *
 * When several executions have already exited at the moment the race settles,
 * the one reported is the first in live-map iteration order. Which of two
 * near-simultaneous failures that is depends on process timing and is not
 * made deterministic.
 */

import { isTerminalStatus, type Execution, type ExecutionExit, type ExecutionStatus } from '../types/execution.js';
import { MAX_TIMER_MS } from '../config/schema.js';
import { terminateProcess } from './process-termination.js';
import { spawnsGroupLeaders } from './dispatcher.js';

export type MonitorOutcome = 'success' | 'failure' | 'timeout' | 'interrupted';

export interface MonitorProgress {
  total: number;
  finished: number;
  running: number;
}

export interface MonitorOptions {
  /** Global deadline, measured from the earliest execution start */
  timeoutMs: number;
  /** How long terminated processes get to exit before SIGKILL */
  killGraceMs: number;
  /** Aborting cancels every live execution */
  signal?: AbortSignal;
  /** Called after every status change */
  onSettled?: (execution: Execution, progress: MonitorProgress) => void;
  /** Signal delivery; defaults to process-group termination */
  terminate?: (execution: Execution, signal: NodeJS.Signals) => void;
  /**
   * Called once an adapter has exited on its own, to kill whatever it left
   * running in its process group; defaults to a group SIGKILL
   */
  sweep?: (execution: Execution) => void;
}

export interface MonitorResult {
  outcome: MonitorOutcome;
  /** The failed execution that triggered fail-fast */
  culprit?: Execution;
  /** All executions in dispatch order */
  executions: readonly Execution[];
}

type MonitorEvent =
  | { type: 'exit'; execution: Execution; exit: ExecutionExit }
  | { type: 'deadline' }
  | { type: 'abort' };

interface Timer {
  promise: Promise<void>;
  clear: () => void;
}

/**
 * Resolve after `ms`. Delays beyond what `setTimeout` accepts are re-armed in chunks.
 */
function createTimer(ms: number): Timer {
  let handle: NodeJS.Timeout | undefined;
  const due = Date.now() + Math.max(0, ms);
  const promise = new Promise<void>((resolve) => {
    const arm = () => {
      handle = setTimeout(() => {
        if (Date.now() >= due) {
          resolve();
        } else {
          arm();
        }
      }, Math.min(Math.max(0, due - Date.now()), MAX_TIMER_MS));
    };
    arm();
  });
  return {
    promise,
    clear: () => clearTimeout(handle),
  };
}

function createAbortWatch(signal?: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  if (!signal) {
    return { promise: new Promise<void>(() => undefined), dispose: () => undefined };
  }
  if (signal.aborted) {
    return { promise: Promise.resolve(), dispose: () => undefined };
  }
  let listener: (() => void) | undefined;
  const promise = new Promise<void>((resolve) => {
    listener = () => resolve();
    signal.addEventListener('abort', listener, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener('abort', listener);
    },
  };
}

function defaultTerminate(execution: Execution, signal: NodeJS.Signals): void {
  if (!execution.process) return;
  terminateProcess(execution.process, signal, { groupLeader: spawnsGroupLeaders() });
}

function defaultSweep(execution: Execution): void {
  // Only a group leader's pid is safe to signal after it exited
  if (!execution.process || !spawnsGroupLeaders()) return;
  terminateProcess(execution.process, 'SIGKILL', { groupLeader: true });
}

function isSuccessfulExit(exit: ExecutionExit): boolean {
  return exit.error === undefined && exit.exitCode === 0;
}

export class ProcessMonitor {
  private readonly executions: readonly Execution[];
  private readonly options: MonitorOptions;
  private readonly live = new Map<string, Execution>();
  private readonly terminated: Execution[] = [];
  private started = false;

  constructor(executions: readonly Execution[], options: MonitorOptions) {
    this.executions = executions;
    this.options = options;
  }

  /**
   * Drive the run until no execution is live
   */
  async run(): Promise<MonitorResult> {
    if (this.started) {
      throw new Error('ProcessMonitor.run() may only be called once');
    }
    this.started = true;

    for (const execution of this.executions) {
      this.live.set(execution.id, execution);
    }
    if (this.live.size === 0) {
      return { outcome: 'success', executions: this.executions };
    }

    const firstStart = Math.min(...this.executions.map((e) => e.startedAt));
    const deadline = createTimer(firstStart + this.options.timeoutMs - Date.now());
    const abort = createAbortWatch(this.options.signal);

    let outcome: MonitorOutcome = 'success';
    let culprit: Execution | undefined;

    try {
      while (this.live.size > 0) {
        const event = await Promise.race<MonitorEvent>([
          ...Array.from(this.live.values(), (execution) =>
            execution.exited.then((exit): MonitorEvent => ({ type: 'exit', execution, exit }))
          ),
          deadline.promise.then((): MonitorEvent => ({ type: 'deadline' })),
          abort.promise.then((): MonitorEvent => ({ type: 'abort' })),
        ]);

        if (event.type === 'deadline') {
          outcome = 'timeout';
          this.terminateAll('timed_out', 'SIGKILL');
          break;
        }

        if (event.type === 'abort') {
          outcome = 'interrupted';
          this.terminateAll('cancelled', 'SIGTERM');
          break;
        }

        const { execution, exit } = event;
        const failed = !isSuccessfulExit(exit);
        this.settle(execution, failed ? 'failed' : 'succeeded', exit);
        (this.options.sweep ?? defaultSweep)(execution);

        if (failed) {
          outcome = 'failure';
          culprit = execution;
          this.terminateAll('cancelled', 'SIGTERM');
          break;
        }
      }
    } finally {
      deadline.clear();
      abort.dispose();
    }

    await this.reap(culprit);

    return { outcome, culprit, executions: this.executions };
  }

  /**
   * Current progress counts
   */
  progress(): MonitorProgress {
    const total = this.executions.length;
    return {
      total,
      running: this.live.size,
      finished: total - this.live.size,
    };
  }

  private settle(execution: Execution, status: ExecutionStatus, exit?: ExecutionExit): void {
    // Terminal statuses are final
    if (isTerminalStatus(execution.status)) {
      throw new Error(`Execution ${execution.id} is already ${execution.status}`);
    }
    execution.status = status;
    execution.exit = exit;
    execution.endedAt = Date.now();
    this.live.delete(execution.id);
    this.options.onSettled?.(execution, this.progress());
  }

  /**
   * Signal every live execution and mark it with the given status.
   * The status is assigned as soon as the signal is sent.
   */
  private terminateAll(status: 'cancelled' | 'timed_out', signal: NodeJS.Signals): void {
    const terminate = this.options.terminate ?? defaultTerminate;
    for (const execution of Array.from(this.live.values())) {
      terminate(execution, signal);
      this.terminated.push(execution);
      this.settle(execution, status);
    }
  }

  /**
   * Give terminated processes `killGraceMs` to exit, SIGKILL the rest, and
   * let the culprit's output drain so its log is complete.
   */
  private async reap(culprit?: Execution): Promise<void> {
    const graceMs = this.options.killGraceMs;
    const terminate = this.options.terminate ?? defaultTerminate;

    if (this.terminated.length > 0) {
      const exitedIds = new Set<string>();
      const exits = this.terminated.map((execution) =>
        execution.exited.then(() => {
          exitedIds.add(execution.id);
        })
      );

      const grace = createTimer(graceMs);
      await Promise.race([Promise.all(exits), grace.promise]);
      grace.clear();

      const stragglers = this.terminated.filter((execution) => !exitedIds.has(execution.id));
      if (stragglers.length > 0) {
        for (const execution of stragglers) {
          terminate(execution, 'SIGKILL');
        }
        const killWait = createTimer(graceMs);
        await Promise.race([Promise.all(stragglers.map((e) => e.exited)), killWait.promise]);
        killWait.clear();
      }
    }

    if (culprit) {
      const drain = createTimer(graceMs);
      await Promise.race([culprit.closed, drain.promise]);
      drain.clear();
    }
  }
}
