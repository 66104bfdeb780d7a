/**
 * Terminal status of a run.
 */
export type RunStatus = 'success' | 'failed' | 'skipped';

/**
 * What triggered the run.
 */
export type RunSource = 'manual' | 'schedule';

/**
 * Whether the selector of one attempted step resolved.
 */
export interface SelectorOutcome {
  readonly stepId: string;
  /** Selector as a stable string key (objects are JSON-encoded) */
  readonly selector: string;
  readonly ok: boolean;
}

/**
 * Recorded outcome of one flow or job execution.
 */
export interface RunRecord {
  readonly runId: string;
  readonly flowId?: string;
  readonly flowName?: string;
  readonly jobId?: string;
  readonly source: RunSource;
  /** Epoch ms */
  readonly startedAt: number;
  /** Epoch ms */
  readonly endedAt: number;
  readonly durationMs: number;
  readonly status: RunStatus;
  readonly failedStepId?: string;
  /** Reason category, e.g. LOCK_BUSY, NOT_FOUND, or anything an action reports */
  readonly reason?: string;
  readonly message?: string;
  readonly selectorOutcomes: readonly SelectorOutcome[];
  readonly stepsCompleted: number;
}
