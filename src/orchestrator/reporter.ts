/**
 * Result reporter
 * Renders discovery, progress and the final summary, and maps outcomes to exit codes
 */

import type { Project } from '../types/project.js';
import type { ExecutionSummary, RunResult } from '../types/execution.js';
import { PLATFORM_LABELS } from '../types/platform.js';
import { describeWarning, type OrchestrationWarning } from '../types/diagnostics.js';
import type { MonitorProgress } from './process-monitor.js';
import {
  theme,
  printHeader,
  printSection,
  printSuccess,
  printWarning,
  printError,
  printInfo,
  printDebug,
  printKeyValue,
  printListItem,
  printBlank,
  startSpinner,
  updateSpinner,
  succeedSpinner,
  failSpinner,
  formatDuration,
} from '../cli/output.js';

export const NO_PROJECTS_MESSAGE = 'No testable projects found - nothing to test.';
export const CANCELLED_NOTICE = 'All other test executions were cancelled.';
export const TIMED_OUT_NOTICE = 'All running test executions were terminated.';
export const NOTHING_RUNNING_NOTICE = 'No other test executions were running.';

/**
 * Exit code for a run outcome
 *
 * @param result - Run result
 * @returns 0 for success or nothing to test, 1 for failure or timeout, 130 when interrupted
 */
export function exitCodeFor(result: Pick<RunResult, 'outcome'>): number {
  switch (result.outcome) {
    case 'success':
    case 'no_projects':
      return 0;
    case 'failure':
    case 'timeout':
      return 1;
    case 'interrupted':
      return 130;
  }
}

/**
 * Print the discovered project list
 *
 * @param projects - Classified projects in discovery order
 */
export function printDiscovery(projects: readonly Project[]): void {
  printHeader('Running Tests Across All Projects');

  if (projects.length === 0) {
    return;
  }

  printInfo(`Discovered ${projects.length} project${projects.length === 1 ? '' : 's'}:`);
  const width = Math.max(...projects.map((p) => p.name.length));
  for (const project of projects) {
    printListItem(`${project.name.padEnd(width)}  ${theme.secondary(`[${PLATFORM_LABELS[project.platform]}]`)}`, 1);
  }
}

/**
 * Print non-fatal warnings collected before dispatch
 */
export function printWarnings(warnings: readonly OrchestrationWarning[]): void {
  for (const warning of warnings) {
    if (warning.kind === 'discovery_unreadable') {
      printDebug(describeWarning(warning));
    } else {
      printWarning(describeWarning(warning));
    }
  }
}

/**
 * Print the banner shown right before adapters are spawned
 *
 * @param count - Number of executions about to start
 * @param timeoutMs - Global deadline
 */
export function printDispatch(count: number, timeoutMs: number): void {
  printBlank();
  printInfo(
    `Running ${count} test suite${count === 1 ? '' : 's'} in parallel ` +
      `(fail-fast, timeout ${formatDuration(timeoutMs)})...`
  );
}

/**
 * Spinner-backed progress display
 */
export interface ProgressDisplay {
  update(progress: MonitorProgress, latest?: string): void;
  stop(succeeded: boolean): void;
}

/**
 * Create the progress display. Disabled displays print one debug line per settled execution.
 *
 * @param total - Number of executions
 * @param enabled - Whether to show a spinner
 */
export function createProgressDisplay(total: number, enabled: boolean): ProgressDisplay {
  const label = (progress: MonitorProgress) => `${progress.finished}/${progress.total} finished`;

  if (!enabled) {
    return {
      update: (progress, latest) => {
        printDebug(`${label(progress)}${latest ? ` (${latest})` : ''}`);
      },
      stop: () => undefined,
    };
  }

  startSpinner(`0/${total} finished`);
  return {
    update: (progress, latest) => {
      updateSpinner(`${label(progress)}${latest ? ` - ${latest}` : ''}`);
    },
    stop: (succeeded) => {
      if (succeeded) {
        succeedSpinner();
      } else {
        failSpinner();
      }
    },
  };
}

/**
 * Print that there was nothing to test
 */
export function printNoProjects(): void {
  printInfo(NO_PROJECTS_MESSAGE);
}

/**
 * Print the success summary
 */
export function printSuccessSummary(result: RunResult): void {
  printBlank();
  printSuccess(
    `All ${result.executions.length} project${result.executions.length === 1 ? '' : 's'} passed ` +
      `in ${formatDuration(result.durationMs)}`
  );
}

function listByStatus(executions: readonly ExecutionSummary[], status: ExecutionSummary['status']): string[] {
  return executions.filter((e) => e.status === status).map((e) => e.name);
}

/**
 * Print the failure block: the triggering project, its full log and the cancellation notice
 */
export function printFailureReport(result: RunResult): void {
  const culprit = result.culprit;
  printSection('Test Failure');

  if (culprit) {
    const summary = result.executions.find((e) => e.path === culprit.path);
    printError(`Tests failed: ${culprit.name}`);
    printKeyValue('Path', culprit.path);
    printKeyValue('Platform', PLATFORM_LABELS[culprit.platform]);
    if (summary?.error) {
      printKeyValue('Spawn error', summary.error);
    } else if (summary?.signal) {
      printKeyValue('Signal', summary.signal);
    } else if (summary) {
      printKeyValue('Exit code', summary.exitCode ?? 'unknown');
    }

    printSection(`Log: ${culprit.name}`);
    const log = result.culpritLog ?? '';
    console.log(log.length > 0 ? log.replace(/\n$/, '') : theme.dim('(no output captured)'));
  }

  printReportTail(result, CANCELLED_NOTICE, 'cancelled');
}

/**
 * Print the timeout block
 */
export function printTimeoutReport(result: RunResult): void {
  printSection('Timeout');
  printError(`Global deadline exceeded after ${formatDuration(result.durationMs)}`);
  const timedOut = listByStatus(result.executions, 'timed_out');
  if (timedOut.length > 0) {
    console.log(theme.error('  Still running at the deadline:'));
    for (const name of timedOut) {
      printListItem(name, 2);
    }
  }
  printReportTail(result, TIMED_OUT_NOTICE, 'timed_out');
}

/**
 * Print the interruption block
 */
export function printInterruptedReport(result: RunResult): void {
  printSection('Interrupted');
  printWarning('Run interrupted before all projects finished');
  printReportTail(result, CANCELLED_NOTICE, 'cancelled');
}

/**
 * Print the passed and cancelled lists, then the notice when anything was stopped
 *
 * @param stopped - Status of the executions the notice is about
 */
function printReportTail(result: RunResult, notice: string, stopped: 'cancelled' | 'timed_out'): void {
  const passed = listByStatus(result.executions, 'succeeded');
  const cancelled = listByStatus(result.executions, 'cancelled');

  printBlank();
  if (passed.length > 0) {
    printKeyValue('Passed', passed.join(', '));
  }
  if (cancelled.length > 0) {
    printKeyValue('Cancelled', cancelled.join(', '));
  }
  if (listByStatus(result.executions, stopped).length > 0) {
    printWarning(notice);
  } else {
    printInfo(NOTHING_RUNNING_NOTICE);
  }
}

/**
 * Print the final report for any outcome
 */
export function reportResult(result: RunResult): void {
  switch (result.outcome) {
    case 'no_projects':
      printNoProjects();
      return;
    case 'success':
      printSuccessSummary(result);
      return;
    case 'failure':
      printFailureReport(result);
      return;
    case 'timeout':
      printTimeoutReport(result);
      return;
    case 'interrupted':
      printInterruptedReport(result);
      return;
  }
}
