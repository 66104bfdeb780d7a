import type { RunRecord, RunRecorder } from '@deskpilot/core';
import { applyRecord, emptySnapshot, DEFAULT_HISTOGRAM_BOUNDS } from './aggregate';
import type { StatsSnapshot } from './types';

export interface StatsOptions {
  /** Upper bounds (ms) of the duration histogram; an unbounded bucket is always added */
  histogramBounds?: readonly number[];
}

/**
 * Run recorder that keeps a running aggregate.
 *
 * Each `record()` builds a new frozen snapshot and swaps it in; readers
 * holding an earlier snapshot never see later runs.
 *
 * ```typescript
 * const stats = new StatsAggregator();
 * const runner = new Runner(actions, flows, locks, { recorders: [stats] });
 * // ...
 * const report = toStatsReport(stats.snapshot());
 * ```
 */
export class StatsAggregator implements RunRecorder {
  private readonly bounds: readonly number[];
  private current: StatsSnapshot;

  constructor(options: StatsOptions = {}) {
    this.bounds = options.histogramBounds ?? DEFAULT_HISTOGRAM_BOUNDS;
    this.current = emptySnapshot(this.bounds);
  }

  /** Rebuild an aggregator from stored runs, e.g. a persistent run log */
  static fromRecords(records: Iterable<RunRecord>, options?: StatsOptions): StatsAggregator {
    const aggregator = new StatsAggregator(options);
    for (const record of records) aggregator.record(record);
    return aggregator;
  }

  record(run: RunRecord): void {
    this.current = applyRecord(this.current, run);
  }

  snapshot(): StatsSnapshot {
    return this.current;
  }

  reset(): void {
    this.current = emptySnapshot(this.bounds);
  }
}
