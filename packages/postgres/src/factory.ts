import pg, { type Pool, type PoolConfig } from 'pg';
import { PgRunLog } from './run-log';

export interface PgRunLogHandle {
  pool: Pool;
  runLog: PgRunLog;
  /** End the pool */
  close(): Promise<void>;
}

/**
 * Open a pool, apply the schema, and return a ready run log.
 */
export async function createPgRunLog(config: string | PoolConfig): Promise<PgRunLogHandle> {
  const pool = new pg.Pool(typeof config === 'string' ? { connectionString: config } : config);
  const runLog = new PgRunLog(pool);
  try {
    await runLog.ensureSchema();
  } catch (err) {
    await pool.end();
    throw err;
  }
  return { pool, runLog, close: () => pool.end() };
}
