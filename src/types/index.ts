/**
 * Central type exports
 */

export {
  PlatformSchema,
  PlatformMarkerSchema,
  PLATFORM_LABELS,
  type Platform,
  type PlatformMarker,
} from './platform.js';

export type { Project, DispatchTarget } from './project.js';

export {
  ExecutionStatusSchema,
  RunOutcomeSchema,
  TERMINAL_STATUSES,
  isTerminalStatus,
  summarizeExecution,
  type ExecutionStatus,
  type ExecutionExit,
  type Execution,
  type ExecutionSummary,
  type RunOutcome,
  type RunResult,
} from './execution.js';

export {
  describeWarning,
  type OrchestrationWarning,
  type OrchestrationWarningKind,
} from './diagnostics.js';
