import {
  DeskpilotError,
  ReasonCodes,
  generateId,
  type EventBus,
  type LockHandle,
  type LockManager,
  type RunRecord,
  type RunRecorder,
  type RunStatus,
  type Runner,
} from '@deskpilot/core';
import { computeNextRun, validateCron } from './cron';
import type { JobCondition } from './conditions';

export interface JobRunContext {
  jobId: string;
  /** Scheduled firing time (epoch ms) */
  firedAt: number;
}

/** Arbitrary work run on a schedule */
export type JobFunction = (context: JobRunContext) => unknown;

/** Run a stored flow through the Runner as `actorRole` */
export interface FlowJobTarget {
  kind: 'flow';
  flowId: string;
  actorRole: string;
  variables?: Record<string, unknown>;
}

export type JobTarget = JobFunction | FlowJobTarget;

export interface AddJobOptions {
  id?: string;
  name?: string;
}

export type JobStatus = RunStatus | 'running';

/**
 * Read-only view of a registered job.
 */
export interface Job {
  readonly id: string;
  readonly name: string;
  readonly cron: string;
  readonly lockPath: string;
  readonly target: 'flow' | 'function';
  readonly flowId?: string;
  readonly conditions: readonly string[];
  readonly nextRunAt: number;
  readonly lastFiredAt?: number;
  readonly lastStatus?: JobStatus;
  readonly lastReason?: string;
}

interface JobEntry {
  readonly id: string;
  readonly name: string;
  readonly cron: string;
  readonly lockPath: string;
  readonly target: JobTarget;
  readonly conditions: readonly JobCondition[];
  nextRunAt: number;
  lastFiredAt?: number;
  lastStatus?: JobStatus;
  lastReason?: string;
}

export interface SchedulerOptions {
  /** Job locks */
  locks: LockManager;
  /** Required for flow targets */
  runner?: Runner;
  /** Receive RunRecords for function targets (flow runs are reported by the Runner) */
  recorders?: RunRecorder[];
  events?: EventBus;
  /** Report skipped firings as `skipped` RunRecords (default: false) */
  recordSkips?: boolean;
  /** Coordination loop interval (default: 250) */
  pollIntervalMs?: number;
  timezone?: string;
  /** Time source, for tests */
  clock?: () => number;
}

/**
 * Fires jobs on cron schedules from a single polling loop.
 *
 * A due job passes its conditions, then its own lock, then runs detached
 * from the loop. Overlapping firings of one job are skipped because the
 * earlier firing still holds the job lock.
 */
export class CronScheduler {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly recorders: RunRecorder[];
  private readonly pollIntervalMs: number;
  private readonly clock: () => number;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly options: SchedulerOptions) {
    this.recorders = [...(options.recorders ?? [])];
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.clock = options.clock ?? Date.now;
  }

  // ── Jobs ────────────────────────────────────────────────────────────

  /**
   * Register a job. The first firing is the next cron match after now.
   *
   * @throws InvalidCronError
   */
  addJob(
    cron: string,
    target: JobTarget,
    lockPath: string,
    conditions: JobCondition[] = [],
    options: AddJobOptions = {}
  ): Job {
    validateCron(cron, this.options.timezone);
    if (typeof target !== 'function' && !this.options.runner) {
      throw new DeskpilotError('RUNNER_REQUIRED', 'Flow jobs need a scheduler created with a runner');
    }

    const id = options.id ?? generateId();
    if (this.jobs.has(id)) {
      throw new DeskpilotError('JOB_EXISTS', `Job "${id}" already exists`);
    }

    const entry: JobEntry = {
      id,
      name: options.name ?? (typeof target === 'function' ? target.name || id : target.flowId),
      cron,
      lockPath,
      target,
      conditions: [...conditions],
      nextRunAt: computeNextRun(cron, this.clock(), this.options.timezone),
    };
    this.jobs.set(id, entry);
    return this.describe(entry);
  }

  removeJob(id: string): boolean {
    return this.jobs.delete(id);
  }

  getJob(id: string): Job | undefined {
    const entry = this.jobs.get(id);
    return entry ? this.describe(entry) : undefined;
  }

  listJobs(): Job[] {
    return [...this.jobs.values()].map(entry => this.describe(entry));
  }

  addRecorder(recorder: RunRecorder): void {
    this.recorders.push(recorder);
  }

  // ── Loop ────────────────────────────────────────────────────────────

  /**
   * Start the coordination loop.
   * Idempotent - calling multiple times has no effect.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    void this.tick();
  }

  /**
   * Stop firing new jobs. Jobs already running finish; see `drain()`.
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Admit every due job once. Resolves after conditions and locks are
   * settled; job bodies keep running in the background.
   */
  async tickOnce(): Promise<void> {
    const at = this.clock();
    for (const entry of [...this.jobs.values()]) {
      if (entry.nextRunAt > at) continue;
      const firedAt = entry.nextRunAt;
      entry.nextRunAt = computeNextRun(entry.cron, at, this.options.timezone);
      await this.admit(entry, firedAt);
    }
  }

  /** Wait for every running job body to settle */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async tick(): Promise<void> {
    if (!this.running) return;

    try {
      await this.tickOnce();
    } catch (err) {
      console.error('[CronScheduler] Error processing due jobs:', err);
    }

    if (this.running) {
      this.timer = setTimeout(() => void this.tick(), this.pollIntervalMs);
    }
  }

  // ── Firing ──────────────────────────────────────────────────────────

  private async admit(entry: JobEntry, firedAt: number): Promise<void> {
    if (!(await this.conditionsHold(entry))) {
      await this.skip(entry, firedAt, ReasonCodes.ConditionFalse, 'A job condition was false');
      return;
    }

    const lock = await this.options.locks.tryAcquire(entry.lockPath);
    if (!lock) {
      await this.skip(entry, firedAt, ReasonCodes.LockBusy, `Job lock "${entry.lockPath}" is held by an earlier firing`);
      return;
    }

    entry.lastFiredAt = firedAt;
    entry.lastStatus = 'running';
    entry.lastReason = undefined;
    this.options.events?.onJobFired?.({ jobId: entry.id, at: firedAt });

    const work: Promise<void> = this.run(entry, firedAt, lock).finally(() => {
      this.inFlight.delete(work);
    });
    this.inFlight.add(work);
  }

  private async conditionsHold(entry: JobEntry): Promise<boolean> {
    for (const condition of entry.conditions) {
      try {
        if (!(await condition())) return false;
      } catch (err) {
        console.error(`[CronScheduler] Condition ${condition.name || '(anonymous)'} of job "${entry.id}" threw:`, err);
        return false;
      }
    }
    return true;
  }

  /** A skip leaves the status of a firing that is still running untouched */
  private async skip(entry: JobEntry, at: number, reason: string, message: string): Promise<void> {
    if (entry.lastStatus !== 'running') {
      entry.lastStatus = 'skipped';
      entry.lastReason = reason;
    }
    this.options.events?.onJobSkipped?.({ jobId: entry.id, at, reason });

    if (this.options.recordSkips) {
      await this.report(this.buildRecord(entry, at, at, { status: 'skipped', reason, message }));
    }
  }

  /** Never rejects */
  private async run(entry: JobEntry, firedAt: number, lock: LockHandle): Promise<void> {
    const startedAt = this.clock();
    let record: RunRecord | undefined;
    let error: { code: string; message: string } | undefined;

    try {
      if (typeof entry.target === 'function') {
        try {
          await entry.target({ jobId: entry.id, firedAt });
          record = this.buildRecord(entry, startedAt, this.clock(), { status: 'success' });
        } catch (err) {
          error = describeError(err);
          record = this.buildRecord(entry, startedAt, this.clock(), {
            status: 'failed',
            reason: error.code,
            message: error.message,
          });
        }
        await this.report(record);
      } else {
        record = await this.runFlow(entry, entry.target);
      }
    } catch (err) {
      error = describeError(err);
      console.error(`[CronScheduler] Job "${entry.id}" failed:`, err);
    } finally {
      await this.release(entry, lock);
    }

    if (record) {
      entry.lastStatus = record.status;
      entry.lastReason = record.reason;
      this.options.events?.onJobCompleted?.({ jobId: entry.id, status: record.status, durationMs: record.durationMs });
    } else {
      entry.lastStatus = 'failed';
      entry.lastReason = error?.code;
    }
    if (error) {
      this.options.events?.onJobFailed?.({ jobId: entry.id, error });
    }
  }

  private async runFlow(entry: JobEntry, target: FlowJobTarget): Promise<RunRecord> {
    const runner = this.options.runner;
    if (!runner) throw new DeskpilotError('RUNNER_REQUIRED', 'Flow jobs need a scheduler created with a runner');
    return runner.executeById(target.flowId, target.variables ?? {}, target.actorRole, {
      source: 'schedule',
      jobId: entry.id,
      onLockBusy: 'skip',
    });
  }

  private async release(entry: JobEntry, lock: LockHandle): Promise<void> {
    try {
      await lock.release();
    } catch (err) {
      console.error(`[CronScheduler] Failed to release lock of job "${entry.id}":`, err);
    }
  }

  private buildRecord(
    entry: JobEntry,
    startedAt: number,
    endedAt: number,
    outcome: { status: RunStatus; reason?: string; message?: string }
  ): RunRecord {
    return {
      runId: generateId(),
      jobId: entry.id,
      source: 'schedule',
      startedAt,
      endedAt,
      durationMs: endedAt - startedAt,
      ...outcome,
      selectorOutcomes: [],
      stepsCompleted: 0,
    };
  }

  private async report(record: RunRecord): Promise<void> {
    for (const recorder of this.recorders) {
      try {
        await recorder.record(record);
      } catch (err) {
        console.error(`[CronScheduler] Recorder failed for run ${record.runId}:`, err);
      }
    }
  }

  private describe(entry: JobEntry): Job {
    return {
      id: entry.id,
      name: entry.name,
      cron: entry.cron,
      lockPath: entry.lockPath,
      target: typeof entry.target === 'function' ? 'function' : 'flow',
      flowId: typeof entry.target === 'function' ? undefined : entry.target.flowId,
      conditions: entry.conditions.map(c => c.name || '(anonymous)'),
      nextRunAt: entry.nextRunAt,
      lastFiredAt: entry.lastFiredAt,
      lastStatus: entry.lastStatus,
      lastReason: entry.lastReason,
    };
  }
}

function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof DeskpilotError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: ReasonCodes.ActionError, message: err.message };
  return { code: ReasonCodes.ActionError, message: String(err) };
}
