import Ajv from 'ajv';
import { ConfigurationError, type ValidationIssue } from './types/errors';
import { DEFAULT_RUN_LOCK_PATH, type RbacDefault } from './engine/runner';
import { DEFAULT_STALE_AFTER_MS } from './impl/file-lock';

/**
 * Runtime settings shared by the runner, lock manager, and scheduler.
 */
export interface DeskpilotConfig {
  /** Global run lock marker */
  runLockPath: string;
  /** Directory for per-job lock markers */
  jobLockDir: string;
  rbacDefault: RbacDefault;
  lockStaleAfterMs: number;
  autoClearStaleLocks: boolean;
  /** Scheduler poll interval, below one second */
  pollIntervalMs: number;
  /** IANA zone for cron evaluation; local time when unset */
  timezone?: string;
}

export const DEFAULT_CONFIG: Readonly<DeskpilotConfig> = {
  runLockPath: DEFAULT_RUN_LOCK_PATH,
  jobLockDir: 'runs/jobs',
  rbacDefault: 'deny',
  lockStaleAfterMs: DEFAULT_STALE_AFTER_MS,
  autoClearStaleLocks: false,
  pollIntervalMs: 250,
};

const configSchema = {
  type: 'object',
  required: ['runLockPath', 'jobLockDir', 'rbacDefault', 'lockStaleAfterMs', 'autoClearStaleLocks', 'pollIntervalMs'],
  properties: {
    runLockPath: { type: 'string', minLength: 1 },
    jobLockDir: { type: 'string', minLength: 1 },
    rbacDefault: { enum: ['allow', 'deny'] },
    lockStaleAfterMs: { type: 'integer', minimum: 1 },
    autoClearStaleLocks: { type: 'boolean' },
    pollIntervalMs: { type: 'integer', minimum: 10, maximum: 999 },
    timezone: { type: 'string', minLength: 1 },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<DeskpilotConfig>(configSchema);

type Env = Readonly<Record<string, string | undefined>>;

function envInt(env: Env, key: string): number | string | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  // Left as a string so the schema reports it
  return Number.isFinite(n) ? n : raw;
}

function envBool(env: Env, key: string): boolean | string | undefined {
  const raw = env[key]?.toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  return raw;
}

function fromEnv(env: Env): Record<string, unknown> {
  const values: Record<string, unknown> = {
    runLockPath: env.DESKPILOT_RUN_LOCK || undefined,
    jobLockDir: env.DESKPILOT_JOB_LOCK_DIR || undefined,
    rbacDefault: env.DESKPILOT_RBAC_DEFAULT || undefined,
    lockStaleAfterMs: envInt(env, 'DESKPILOT_LOCK_STALE_MS'),
    autoClearStaleLocks: envBool(env, 'DESKPILOT_AUTO_CLEAR_STALE'),
    pollIntervalMs: envInt(env, 'DESKPILOT_POLL_MS'),
    timezone: env.DESKPILOT_TIMEZONE || undefined,
  };
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

/**
 * Merge defaults, `DESKPILOT_*` environment variables, and explicit overrides
 * (later wins), then validate.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function resolveConfig(
  overrides: Partial<DeskpilotConfig> = {},
  env: Env = process.env
): DeskpilotConfig {
  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const merged: unknown = { ...DEFAULT_CONFIG, ...fromEnv(env), ...explicit };

  if (!validateConfig(merged)) {
    const issues: ValidationIssue[] = (validateConfig.errors ?? []).map(e => ({
      path: e.instancePath.replace(/^\//, '') || (typeof e.params.additionalProperty === 'string' ? e.params.additionalProperty : '(root)'),
      message: e.message ?? 'Invalid',
      severity: 'error',
    }));
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map(i => `${i.path} ${i.message}`).join('; ')}`,
      issues
    );
  }
  return merged;
}
