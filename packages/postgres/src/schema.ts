export const SCHEMA_VERSION = '0.1.0';

export const schema = `
-- deskpilot run log v${SCHEMA_VERSION}

CREATE TABLE IF NOT EXISTS dp_runs (
  run_id            TEXT PRIMARY KEY,
  flow_id           TEXT,
  flow_name         TEXT,
  job_id            TEXT,
  source            TEXT NOT NULL CHECK (source IN ('manual', 'schedule')),
  started_at        BIGINT NOT NULL,
  ended_at          BIGINT NOT NULL,
  duration_ms       BIGINT NOT NULL,
  status            TEXT NOT NULL CHECK (status IN ('success', 'failed', 'skipped')),
  failed_step_id    TEXT,
  reason            TEXT,
  message           TEXT,
  selector_outcomes JSONB NOT NULL DEFAULT '[]',
  steps_completed   INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_dp_runs_started ON dp_runs(started_at);
CREATE INDEX IF NOT EXISTS idx_dp_runs_flow ON dp_runs(flow_id) WHERE flow_id IS NOT NULL;
CREATE INDEX IF NOT EXISTS idx_dp_runs_job ON dp_runs(job_id) WHERE job_id IS NOT NULL;
CREATE INDEX IF NOT EXISTS idx_dp_runs_status ON dp_runs(status);
`;

/**
 * The part of a pg Pool (or Client) the run log talks to.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

/**
 * Apply the schema (idempotent)
 */
export async function applySchema(pool: Queryable): Promise<void> {
  await pool.query(schema);
}
