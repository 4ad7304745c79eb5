/**
 * Orchestration entry point
 * Discovery -> classification -> registry -> dispatch -> monitor -> report
 */

import type { Config } from '../config/schema.js';
import type { DispatchTarget, Project } from '../types/project.js';
import { summarizeExecution, type RunResult } from '../types/execution.js';
import type { OrchestrationWarning } from '../types/diagnostics.js';
import { discoverCandidates } from './discoverer.js';
import { classifyCandidates } from './classifier.js';
import { createRunnerRegistry, selectTargets } from './runner-registry.js';
import { LogCollector } from './log-collector.js';
import { dispatchAll } from './dispatcher.js';
import { ProcessMonitor, type MonitorResult } from './process-monitor.js';
import {
  createProgressDisplay,
  printDiscovery,
  printDispatch,
  printWarnings,
  reportResult,
} from './reporter.js';

export * from './discoverer.js';
export * from './classifier.js';
export * from './runner-registry.js';
export * from './log-collector.js';
export * from './dispatcher.js';
export * from './process-monitor.js';
export * from './process-termination.js';
export * from './reporter.js';
export * from '../types/index.js';

/**
 * Everything known before any process is spawned
 */
export interface ProjectPlan {
  /** Classified projects in discovery order */
  projects: Project[];
  /** Projects that have a runner adapter */
  targets: DispatchTarget[];
  warnings: OrchestrationWarning[];
}

/**
 * Discover, classify and pair projects with their adapters
 *
 * @param workspaceRoot - Absolute workspace root
 * @param config - Resolved configuration
 */
export async function planProjects(workspaceRoot: string, config: Config): Promise<ProjectPlan> {
  const discovery = await discoverCandidates(workspaceRoot, config.discovery.roots);
  const classification = classifyCandidates(discovery.candidates, config.platforms.markers);
  const registry = createRunnerRegistry(workspaceRoot, config.platforms.adapters);
  const selection = selectTargets(classification.projects, registry);

  return {
    projects: classification.projects,
    targets: selection.targets,
    warnings: [...discovery.skipped, ...classification.warnings, ...selection.warnings],
  };
}

export interface OrchestrationOptions {
  workspaceRoot: string;
  config: Config;
  /** Aborting terminates every running adapter */
  signal?: AbortSignal;
  /** Prefix for the temporary log directory */
  logDirPrefix?: string;
}

/**
 * Run every project's tests in parallel with fail-fast cancellation and a global deadline
 *
 * @returns The run result; exit codes come from `exitCodeFor`
 */
export async function runOrchestration(options: OrchestrationOptions): Promise<RunResult> {
  const { workspaceRoot, config } = options;
  const startedAt = Date.now();

  const plan = await planProjects(workspaceRoot, config);
  printDiscovery(plan.projects);
  printWarnings(plan.warnings);

  if (plan.targets.length === 0) {
    const result: RunResult = {
      outcome: 'no_projects',
      executions: [],
      startedAt: new Date(startedAt).toISOString(),
      durationMs: Date.now() - startedAt,
    };
    reportResult(result);
    return result;
  }

  const logs = await LogCollector.create(options.logDirPrefix);
  const result = await executeTargets(plan.targets, logs, options, startedAt)
    .finally(() => logs.dispose());

  reportResult(result);
  return result;
}

/**
 * Spawn, monitor and collect the result while the log collector is alive
 */
async function executeTargets(
  targets: readonly DispatchTarget[],
  logs: LogCollector,
  options: OrchestrationOptions,
  startedAt: number
): Promise<RunResult> {
  const { workspaceRoot, config } = options;

  printDispatch(targets.length, config.execution.timeout_ms);
  const executions = dispatchAll(targets, logs, { cwd: workspaceRoot });

  const progress = createProgressDisplay(executions.length, config.output.progress);
  const monitor = new ProcessMonitor(executions, {
    timeoutMs: config.execution.timeout_ms,
    killGraceMs: config.execution.kill_grace_ms,
    signal: options.signal,
    onSettled: (execution, counts) => {
      progress.update(counts, `${execution.project.name} ${execution.status}`);
    },
  });

  let outcome: MonitorResult;
  try {
    outcome = await monitor.run();
  } catch (error) {
    progress.stop(false);
    throw error;
  }
  progress.stop(outcome.outcome === 'success');

  const culpritLog = outcome.culprit ? await logs.read(outcome.culprit.project) : undefined;
  const now = Date.now();

  return {
    outcome: outcome.outcome,
    executions: outcome.executions.map((execution) => summarizeExecution(execution, now)),
    culprit: outcome.culprit?.project,
    culpritLog,
    startedAt: new Date(startedAt).toISOString(),
    durationMs: now - startedAt,
  };
}
