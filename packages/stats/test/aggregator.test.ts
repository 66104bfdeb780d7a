import { describe, it, expect } from 'vitest';
import { StatsAggregator } from '../src/aggregator';
import { isoWeekKey } from '../src/buckets';
import { runRecord, sampleRuns } from './fixtures';

describe('StatsAggregator', () => {
  const snapshot = StatsAggregator.fromRecords(sampleRuns).snapshot();

  it('counts totals and failures by reason', () => {
    expect(snapshot.totals).toEqual({ total: 6, succeeded: 2, failed: 3, skipped: 1 });
    expect(snapshot.failuresByReason).toEqual({ ROW_NOT_FOUND: 1, LOCK_BUSY: 1, CUSTOM_REASON: 1 });
  });

  it('tracks selector outcomes', () => {
    expect(snapshot.selectors).toEqual({
      '#save': { successes: 2, failures: 0 },
      '#row': { successes: 0, failures: 1 },
    });
  });

  it('summarises durations of decided runs', () => {
    expect(snapshot.durations).toMatchObject({ count: 5, sumMs: 446_000, minMs: 0, maxMs: 400_000, meanMs: 89_200 });
    expect(snapshot.durations.buckets.map(b => b.count)).toEqual([1, 1, 1, 0, 0, 0, 1, 0, 1]);
    expect(snapshot.durations.buckets.at(-1)?.le).toBe(Infinity);
  });

  it('buckets by UTC day, ISO week, month and flow', () => {
    expect(snapshot.byDay).toEqual({
      '2026-01-05': { total: 2, succeeded: 1, failed: 1, skipped: 0 },
      '2026-01-11': { total: 1, succeeded: 0, failed: 1, skipped: 0 },
      '2026-02-02': { total: 2, succeeded: 1, failed: 0, skipped: 1 },
      '2026-02-03': { total: 1, succeeded: 0, failed: 1, skipped: 0 },
    });
    expect(Object.keys(snapshot.byWeek)).toEqual(['2026-W02', '2026-W06']);
    expect(snapshot.byWeek['2026-W02'].total).toBe(3);
    expect(snapshot.byMonth).toEqual({
      '2026-01': { total: 3, succeeded: 1, failed: 2, skipped: 0 },
      '2026-02': { total: 3, succeeded: 1, failed: 1, skipped: 1 },
    });
    expect(snapshot.byFlow).toEqual({
      invoices: { total: 3, succeeded: 1, failed: 2, skipped: 0 },
      payroll: { total: 2, succeeded: 1, failed: 1, skipped: 0 },
      'job:nightly': { total: 1, succeeded: 0, failed: 0, skipped: 1 },
    });
  });

  it('remembers the first and last run', () => {
    expect(snapshot.firstRunAt).toBe(Date.parse('2026-01-05T10:00:00Z'));
    expect(snapshot.lastRunAt).toBe(Date.parse('2026-02-03T07:00:00Z'));
  });

  it('hands out frozen snapshots unaffected by later records', () => {
    const stats = new StatsAggregator();
    stats.record(runRecord());
    const before = stats.snapshot();

    stats.record(runRecord({ status: 'failed', reason: 'TIMEOUT' }));

    expect(before.totals.total).toBe(1);
    expect(before.failuresByReason).toEqual({});
    expect(stats.snapshot().totals.total).toBe(2);
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.byFlow)).toBe(true);
    expect(Object.isFrozen(before.durations.buckets)).toBe(true);
  });

  it('matches recording one by one when rebuilt from records', () => {
    const stats = new StatsAggregator();
    sampleRuns.forEach(r => stats.record(r));

    expect(StatsAggregator.fromRecords(sampleRuns).snapshot()).toEqual(stats.snapshot());
  });

  it('accepts custom histogram bounds', () => {
    const stats = new StatsAggregator({ histogramBounds: [1000] });
    stats.record(runRecord({ durationMs: 5000 }));

    expect(stats.snapshot().durations.buckets).toEqual([
      { le: 1000, count: 0 },
      { le: Infinity, count: 1 },
    ]);
  });

  it('starts over on reset', () => {
    const stats = StatsAggregator.fromRecords(sampleRuns);

    stats.reset();

    expect(stats.snapshot().totals.total).toBe(0);
  });
});

describe('isoWeekKey', () => {
  it('follows ISO 8601 year boundaries', () => {
    expect(isoWeekKey(Date.parse('2025-12-29T12:00:00Z'))).toBe('2026-W01');
    expect(isoWeekKey(Date.parse('2026-01-01T00:00:00Z'))).toBe('2026-W01');
    expect(isoWeekKey(Date.parse('2026-01-05T00:00:00Z'))).toBe('2026-W02');
    expect(isoWeekKey(Date.parse('2027-01-01T00:00:00Z'))).toBe('2026-W53');
  });
});
