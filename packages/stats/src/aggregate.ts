import type { RunRecord } from '@deskpilot/core';
import { dayKey, isoWeekKey, monthKey } from './buckets';
import type { DurationStats, RunTotals, SelectorStats, StatsSnapshot } from './types';

export const DEFAULT_HISTOGRAM_BOUNDS: readonly number[] = [100, 500, 1000, 5000, 10_000, 30_000, 60_000, 300_000];

const EMPTY_TOTALS: RunTotals = Object.freeze({ total: 0, succeeded: 0, failed: 0, skipped: 0 });

/** Key under which a run is counted per flow */
export function flowKey(run: RunRecord): string {
  if (run.flowId) return run.flowId;
  return run.jobId ? `job:${run.jobId}` : 'unknown';
}

export function emptySnapshot(bounds: readonly number[] = DEFAULT_HISTOGRAM_BOUNDS): StatsSnapshot {
  const sorted = [...new Set(bounds.filter(b => Number.isFinite(b)))].sort((a, b) => a - b);
  return deepFreeze({
    totals: EMPTY_TOTALS,
    failuresByReason: {},
    selectors: {},
    durations: {
      count: 0,
      sumMs: 0,
      minMs: null,
      maxMs: null,
      meanMs: null,
      buckets: [...sorted, Infinity].map(le => ({ le, count: 0 })),
    },
    byDay: {},
    byWeek: {},
    byMonth: {},
    byFlow: {},
    firstRunAt: null,
    lastRunAt: null,
  });
}

/**
 * Keys are flow ids, reasons and selectors taken from run records, so
 * reads go through own properties and writes through literal keys.
 */
function own<T>(map: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

function withEntry<T>(map: Readonly<Record<string, T>>, key: string, value: T): Readonly<Record<string, T>> {
  return Object.freeze({ ...map, [key]: value });
}

function addToTotals(totals: RunTotals | undefined, run: RunRecord): RunTotals {
  const base = totals ?? EMPTY_TOTALS;
  return Object.freeze({
    total: base.total + 1,
    succeeded: base.succeeded + (run.status === 'success' ? 1 : 0),
    failed: base.failed + (run.status === 'failed' ? 1 : 0),
    skipped: base.skipped + (run.status === 'skipped' ? 1 : 0),
  });
}

function bump(
  buckets: Readonly<Record<string, RunTotals>>,
  key: string,
  run: RunRecord
): Readonly<Record<string, RunTotals>> {
  return withEntry(buckets, key, addToTotals(own(buckets, key), run));
}

function addDuration(stats: DurationStats, durationMs: number): DurationStats {
  const count = stats.count + 1;
  const sumMs = stats.sumMs + durationMs;
  const target = stats.buckets.findIndex(b => durationMs <= b.le);
  return deepFreeze({
    count,
    sumMs,
    minMs: stats.minMs === null ? durationMs : Math.min(stats.minMs, durationMs),
    maxMs: stats.maxMs === null ? durationMs : Math.max(stats.maxMs, durationMs),
    meanMs: sumMs / count,
    buckets: stats.buckets.map((b, i) => (i === target ? { le: b.le, count: b.count + 1 } : b)),
  });
}

function addSelectors(
  selectors: Readonly<Record<string, SelectorStats>>,
  run: RunRecord
): Readonly<Record<string, SelectorStats>> {
  if (run.selectorOutcomes.length === 0) return selectors;
  let next = selectors;
  for (const outcome of run.selectorOutcomes) {
    const prev = own(next, outcome.selector) ?? { successes: 0, failures: 0 };
    next = withEntry(next, outcome.selector, Object.freeze({
      successes: prev.successes + (outcome.ok ? 1 : 0),
      failures: prev.failures + (outcome.ok ? 0 : 1),
    }));
  }
  return next;
}

/**
 * Fold one run into a snapshot, returning a new frozen snapshot. Unchanged
 * branches are shared with the previous snapshot.
 */
export function applyRecord(snapshot: StatsSnapshot, run: RunRecord): StatsSnapshot {
  const at = run.startedAt;
  let failuresByReason = snapshot.failuresByReason;
  if (run.status === 'failed') {
    const reason = run.reason ?? 'UNKNOWN';
    failuresByReason = withEntry(failuresByReason, reason, (own(failuresByReason, reason) ?? 0) + 1);
  }

  return Object.freeze({
    totals: addToTotals(snapshot.totals, run),
    failuresByReason,
    selectors: addSelectors(snapshot.selectors, run),
    durations: run.status === 'skipped' ? snapshot.durations : addDuration(snapshot.durations, run.durationMs),
    byDay: bump(snapshot.byDay, dayKey(at), run),
    byWeek: bump(snapshot.byWeek, isoWeekKey(at), run),
    byMonth: bump(snapshot.byMonth, monthKey(at), run),
    byFlow: bump(snapshot.byFlow, flowKey(run), run),
    firstRunAt: snapshot.firstRunAt === null ? at : Math.min(snapshot.firstRunAt, at),
    lastRunAt: snapshot.lastRunAt === null ? at : Math.max(snapshot.lastRunAt, at),
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
