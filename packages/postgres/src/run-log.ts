import type { RunLog, RunQuery, RunRecord, RunSource, RunStatus, SelectorOutcome } from '@deskpilot/core';
import { DeskpilotError, isRecord } from '@deskpilot/core';
import { applySchema, type Queryable } from './schema';

const STATUSES: readonly RunStatus[] = ['success', 'failed', 'skipped'];
const SOURCES: readonly RunSource[] = ['manual', 'schedule'];

/**
 * Run history in PostgreSQL. Pass a `pg.Pool`:
 *
 * ```typescript
 * const log = new PgRunLog(new Pool({ connectionString: process.env.DATABASE_URL }));
 * await log.ensureSchema();
 * runner.addRecorder(log);
 * ```
 */
export class PgRunLog implements RunLog {
  constructor(private pool: Queryable) {}

  async ensureSchema(): Promise<void> {
    await applySchema(this.pool);
  }

  async record(run: RunRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO dp_runs (
        run_id, flow_id, flow_name, job_id, source, started_at, ended_at,
        duration_ms, status, failed_step_id, reason, message,
        selector_outcomes, steps_completed
      ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14)
      ON CONFLICT (run_id) DO NOTHING`,
      [
        run.runId,
        run.flowId ?? null,
        run.flowName ?? null,
        run.jobId ?? null,
        run.source,
        run.startedAt,
        run.endedAt,
        run.durationMs,
        run.status,
        run.failedStepId ?? null,
        run.reason ?? null,
        run.message ?? null,
        JSON.stringify(run.selectorOutcomes),
        run.stepsCompleted,
      ]
    );
  }

  /**
   * Runs matching `query`, oldest first. With a limit, the newest `limit` runs.
   */
  async list(query: RunQuery = {}): Promise<RunRecord[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    const where = (column: string, op: string, value: unknown) => {
      values.push(value);
      conditions.push(`${column} ${op} $${values.length}`);
    };

    if (query.flowId !== undefined) where('flow_id', '=', query.flowId);
    if (query.jobId !== undefined) where('job_id', '=', query.jobId);
    if (query.status !== undefined) where('status', '=', query.status);
    if (query.since !== undefined) where('started_at', '>=', query.since);

    let sql = 'SELECT * FROM dp_runs';
    if (conditions.length > 0) sql += ` WHERE ${conditions.join(' AND ')}`;

    if (query.limit === undefined) {
      const { rows } = await this.pool.query(`${sql} ORDER BY started_at ASC, run_id ASC`, values);
      return rows.map(toRunRecord);
    }

    values.push(query.limit);
    const { rows } = await this.pool.query(
      `${sql} ORDER BY started_at DESC, run_id DESC LIMIT $${values.length}`,
      values
    );
    return rows.map(toRunRecord).reverse();
  }
}

function malformed(column: string): DeskpilotError {
  return new DeskpilotError('RUN_LOG_CORRUPT', `Run log row has an invalid "${column}" column`);
}

function optionalText(row: Record<string, unknown>, column: string): string | undefined {
  const value = row[column];
  if (value === null || value === undefined) return undefined;
  if (typeof value !== 'string') throw malformed(column);
  return value;
}

function requiredText(row: Record<string, unknown>, column: string): string {
  const value = optionalText(row, column);
  if (value === undefined) throw malformed(column);
  return value;
}

// BIGINT columns arrive as strings
function integer(row: Record<string, unknown>, column: string): number {
  const value = row[column];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) throw malformed(column);
  return parsed;
}

function oneOf<T extends string>(row: Record<string, unknown>, column: string, allowed: readonly T[]): T {
  const value = row[column];
  const match = allowed.find(a => a === value);
  if (match === undefined) throw malformed(column);
  return match;
}

function selectorOutcomes(value: unknown): SelectorOutcome[] {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (!Array.isArray(parsed)) throw malformed('selector_outcomes');
  return parsed.map(item => {
    if (
      !isRecord(item) ||
      typeof item.stepId !== 'string' ||
      typeof item.selector !== 'string' ||
      typeof item.ok !== 'boolean'
    ) {
      throw malformed('selector_outcomes');
    }
    return { stepId: item.stepId, selector: item.selector, ok: item.ok };
  });
}

function toRunRecord(row: unknown): RunRecord {
  if (!isRecord(row)) throw malformed('(row)');
  return {
    runId: requiredText(row, 'run_id'),
    flowId: optionalText(row, 'flow_id'),
    flowName: optionalText(row, 'flow_name'),
    jobId: optionalText(row, 'job_id'),
    source: oneOf(row, 'source', SOURCES),
    startedAt: integer(row, 'started_at'),
    endedAt: integer(row, 'ended_at'),
    durationMs: integer(row, 'duration_ms'),
    status: oneOf(row, 'status', STATUSES),
    failedStepId: optionalText(row, 'failed_step_id'),
    reason: optionalText(row, 'reason'),
    message: optionalText(row, 'message'),
    selectorOutcomes: selectorOutcomes(row.selector_outcomes),
    stepsCompleted: integer(row, 'steps_completed'),
  };
}
