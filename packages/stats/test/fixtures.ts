import type { RunRecord } from '@deskpilot/core';

let sequence = 0;

export function runRecord(overrides: Partial<RunRecord> = {}): RunRecord {
  const startedAt = overrides.startedAt ?? Date.parse('2026-01-05T10:00:00Z');
  const durationMs = overrides.durationMs ?? 200;
  sequence++;
  return {
    runId: `run-${sequence}`,
    flowId: 'invoices',
    source: 'manual',
    startedAt,
    endedAt: startedAt + durationMs,
    durationMs,
    status: 'success',
    selectorOutcomes: [],
    stepsCompleted: 1,
    ...overrides,
  };
}

/**
 * Six runs across two ISO weeks and two months:
 * 2 succeeded, 3 failed (three different reasons), 1 skipped.
 */
export const sampleRuns: RunRecord[] = [
  runRecord({
    startedAt: Date.parse('2026-01-05T10:00:00Z'),
    durationMs: 200,
    selectorOutcomes: [{ stepId: 'save', selector: '#save', ok: true }],
  }),
  runRecord({
    startedAt: Date.parse('2026-01-05T12:00:00Z'),
    durationMs: 800,
    status: 'failed',
    reason: 'ROW_NOT_FOUND',
    failedStepId: 'row',
    selectorOutcomes: [
      { stepId: 'save', selector: '#save', ok: true },
      { stepId: 'row', selector: '#row', ok: false },
    ],
  }),
  runRecord({
    flowId: 'payroll',
    startedAt: Date.parse('2026-01-11T23:59:00Z'),
    durationMs: 0,
    status: 'failed',
    reason: 'LOCK_BUSY',
  }),
  runRecord({
    flowId: undefined,
    jobId: 'nightly',
    source: 'schedule',
    startedAt: Date.parse('2026-02-02T08:00:00Z'),
    durationMs: 0,
    status: 'skipped',
    reason: 'LOCK_BUSY',
  }),
  runRecord({ flowId: 'payroll', startedAt: Date.parse('2026-02-02T09:00:00Z'), durationMs: 45_000 }),
  runRecord({
    startedAt: Date.parse('2026-02-03T07:00:00Z'),
    durationMs: 400_000,
    status: 'failed',
    reason: 'CUSTOM_REASON',
  }),
];
