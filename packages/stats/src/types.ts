export interface RunTotals {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
}

export interface SelectorStats {
  readonly successes: number;
  readonly failures: number;
}

export interface HistogramBucket {
  /** Inclusive upper bound in ms; Infinity for the last bucket */
  readonly le: number;
  readonly count: number;
}

export interface DurationStats {
  readonly count: number;
  readonly sumMs: number;
  readonly minMs: number | null;
  readonly maxMs: number | null;
  readonly meanMs: number | null;
  readonly buckets: readonly HistogramBucket[];
}

/**
 * Immutable aggregate of every recorded run. Time buckets are UTC.
 */
export interface StatsSnapshot {
  readonly totals: RunTotals;
  readonly failuresByReason: Readonly<Record<string, number>>;
  readonly selectors: Readonly<Record<string, SelectorStats>>;
  /** Over succeeded and failed runs */
  readonly durations: DurationStats;
  /** `YYYY-MM-DD` */
  readonly byDay: Readonly<Record<string, RunTotals>>;
  /** ISO week, `YYYY-Www` */
  readonly byWeek: Readonly<Record<string, RunTotals>>;
  /** `YYYY-MM` */
  readonly byMonth: Readonly<Record<string, RunTotals>>;
  readonly byFlow: Readonly<Record<string, RunTotals>>;
  readonly firstRunAt: number | null;
  readonly lastRunAt: number | null;
}
