/**
 * Tests for execution and diagnostic types
 */

import { describe, it, expect } from 'vitest';
import {
  ExecutionStatusSchema,
  isTerminalStatus,
  summarizeExecution,
  type Execution,
} from '../../src/types/execution.js';
import { describeWarning } from '../../src/types/diagnostics.js';

function execution(overrides: Partial<Execution> = {}): Execution {
  const exited = new Promise<never>(() => undefined);
  return {
    id: '1:apps/web',
    project: { path: '/w/apps/web', name: 'apps/web', root: 'apps', platform: 'node' },
    adapter: '/w/runners/node.sh',
    logPath: '/tmp/1-apps-web.log',
    startedAt: 1_000,
    pid: 123,
    exited,
    closed: Promise.resolve(),
    status: 'running',
    ...overrides,
  };
}

describe('ExecutionStatusSchema', () => {
  it('should only accept known statuses', () => {
    expect(ExecutionStatusSchema.safeParse('timed_out').success).toBe(true);
    expect(ExecutionStatusSchema.safeParse('skipped').success).toBe(false);
  });

  it('should treat everything but pending and running as terminal', () => {
    expect(isTerminalStatus('pending')).toBe(false);
    expect(isTerminalStatus('running')).toBe(false);
    expect(isTerminalStatus('succeeded')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('cancelled')).toBe(true);
    expect(isTerminalStatus('timed_out')).toBe(true);
  });
});

describe('summarizeExecution', () => {
  it('should summarize a finished execution', () => {
    const summary = summarizeExecution(
      execution({ status: 'failed', exit: { exitCode: 1, signal: null }, endedAt: 3_500 })
    );

    expect(summary).toEqual({
      id: '1:apps/web',
      name: 'apps/web',
      path: '/w/apps/web',
      platform: 'node',
      status: 'failed',
      exitCode: 1,
      signal: null,
      error: undefined,
      durationMs: 2_500,
    });
  });

  it('should measure unfinished executions against the reference time', () => {
    const summary = summarizeExecution(execution({ status: 'cancelled' }), 1_750);
    expect(summary.durationMs).toBe(750);
    expect(summary.exitCode).toBeNull();
  });
});

describe('describeWarning', () => {
  it('should describe each warning kind', () => {
    expect(describeWarning({ kind: 'discovery_unreadable', path: '/w/apps/x', reason: 'EACCES' })).toBe(
      'Skipping /w/apps/x: EACCES'
    );
    expect(describeWarning({ kind: 'unclassified_platform', path: '/w/apps/docs' })).toBe(
      'Skipping /w/apps/docs: no platform marker found'
    );
    expect(
      describeWarning({ kind: 'missing_runner_adapter', path: '/w/apps/app', platform: 'flutter', adapter: '/w/r/flutter.sh' })
    ).toBe('Skipping /w/apps/app: flutter runner not found at /w/r/flutter.sh');
    expect(describeWarning({ kind: 'missing_runner_adapter', path: '/w/apps/app', platform: 'rust' })).toBe(
      'Skipping /w/apps/app: no runner registered for rust'
    );
  });
});
