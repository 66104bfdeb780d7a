import type { RunRecord, RunStatus } from '../types/run';

/**
 * Sink for run outcomes (stats aggregation, persistent logs).
 */
export interface RunRecorder {
  record(run: RunRecord): void | Promise<void>;
}

export interface RunQuery {
  flowId?: string;
  jobId?: string;
  status?: RunStatus;
  /** Inclusive lower bound on startedAt */
  since?: number;
  limit?: number;
}

/**
 * A recorder that can read its history back.
 */
export interface RunLog extends RunRecorder {
  list(query?: RunQuery): Promise<RunRecord[]>;
}
