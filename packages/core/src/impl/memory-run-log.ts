import type { RunLog, RunQuery } from '../interfaces/run-recorder';
import type { RunRecord } from '../types/run';

/**
 * Append-only in-memory run history, newest last.
 */
export class MemoryRunLog implements RunLog {
  private readonly runs: RunRecord[] = [];

  record(run: RunRecord): void {
    this.runs.push(run);
  }

  async list(query: RunQuery = {}): Promise<RunRecord[]> {
    let result = this.runs.filter(r =>
      (query.flowId === undefined || r.flowId === query.flowId) &&
      (query.jobId === undefined || r.jobId === query.jobId) &&
      (query.status === undefined || r.status === query.status) &&
      (query.since === undefined || r.startedAt >= query.since)
    );
    if (query.limit !== undefined) {
      result = result.slice(-query.limit);
    }
    return result;
  }

  get size(): number {
    return this.runs.length;
  }

  clear(): void {
    this.runs.length = 0;
  }
}
