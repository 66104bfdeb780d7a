/**
 * Deskpilot - wires the runtime and its Express query surface.
 */

import { join } from 'node:path';
import express, { type Application, type RequestHandler, type Router } from 'express';
import {
  DefaultActionRegistry,
  FileLockManager,
  MemoryFlowStore,
  Runner,
  generateId,
  resolveConfig,
  type ActionHandler,
  type DeskpilotConfig,
  type EventBus,
  type Flow,
  type FlowStore,
  type LockManager,
  type RunLog,
  type RunRecorder,
} from '@deskpilot/core';
import { createBuiltinActions, type ActionBackends } from '@deskpilot/actions';
import { CronScheduler, type Job, type JobCondition, type JobTarget } from '@deskpilot/scheduler';
import { StatsAggregator, type StatsOptions } from '@deskpilot/stats';
import { createContextMiddleware, createErrorHandler, type ContextMiddlewareOptions } from './middleware';
import {
  registerActionRoutes,
  registerFlowRoutes,
  registerHealthRoutes,
  registerJobRoutes,
  registerRunnerRoutes,
  registerStatsRoutes,
} from './handlers';
import { DefaultRouteConfig, type RouteConfig } from './routes';

export interface DeskpilotOptions {
  /** Mount the router on this app */
  app?: Application;
  /** Route prefix (default: '/') */
  prefix?: string;
  /** Explicit settings; the rest comes from DESKPILOT_* variables and defaults */
  config?: Partial<DeskpilotConfig>;
  /** Environment to read DESKPILOT_* variables from (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
  /** Backends for the built-in action families */
  backends?: ActionBackends;
  /** Extra actions registered after the built-ins */
  actions?: ActionHandler[];
  /** Flows to store at startup */
  flows?: Flow[];
  /** Default: MemoryFlowStore */
  flowStore?: FlowStore;
  /** Default: FileLockManager with the configured staleness settings */
  locks?: LockManager;
  /** Persistent history; stats are rebuilt from it at startup */
  runLog?: RunLog;
  events?: EventBus;
  stats?: StatsOptions;
  routes?: RouteConfig;
  context?: ContextMiddlewareOptions;
  /** Applied before the deskpilot routes */
  middleware?: RequestHandler[];
}

export interface ScheduleOptions {
  id?: string;
  name?: string;
  conditions?: JobCondition[];
  /** Default: `<jobLockDir>/<id>.lock` */
  lockPath?: string;
}

/**
 * Build a ready runtime: config, locks, action registry, runner,
 * scheduler, stats, and the Express router.
 *
 * @example
 * ```typescript
 * const app = express();
 * const deskpilot = await createDeskpilot({ app, backends: { browser }, flows: [invoiceExport] });
 *
 * deskpilot.schedule('0 0 7 * * 0-4', { kind: 'flow', flowId: 'invoice-export', actorRole: 'operator' }, {
 *   conditions: [vpnConnected()],
 * });
 * deskpilot.start();
 * app.listen(3000);
 * ```
 */
export async function createDeskpilot(options: DeskpilotOptions = {}): Promise<Deskpilot> {
  const config = resolveConfig(options.config, options.env);

  const flows = options.flowStore ?? new MemoryFlowStore();
  for (const flow of options.flows ?? []) {
    await flows.save(flow);
  }

  const stats = options.runLog
    ? StatsAggregator.fromRecords(await options.runLog.list(), options.stats)
    : new StatsAggregator(options.stats);

  return new Deskpilot(config, flows, stats, options);
}

export class Deskpilot {
  readonly actions: DefaultActionRegistry;
  readonly locks: LockManager;
  readonly runner: Runner;
  readonly scheduler: CronScheduler;
  readonly router: Router;

  constructor(
    readonly config: DeskpilotConfig,
    readonly flows: FlowStore,
    readonly stats: StatsAggregator,
    options: DeskpilotOptions = {}
  ) {
    const recorders: RunRecorder[] = options.runLog ? [stats, options.runLog] : [stats];

    this.actions = new DefaultActionRegistry(options.events);
    this.actions.registerAll([...createBuiltinActions(options.backends), ...(options.actions ?? [])]);

    this.locks =
      options.locks ??
      new FileLockManager({
        staleAfterMs: config.lockStaleAfterMs,
        autoClearStale: config.autoClearStaleLocks,
        events: options.events,
      });

    this.runner = new Runner(this.actions, flows, this.locks, {
      lockPath: config.runLockPath,
      rbacDefault: config.rbacDefault,
      events: options.events,
      recorders,
    });

    this.scheduler = new CronScheduler({
      locks: this.locks,
      runner: this.runner,
      recorders,
      events: options.events,
      pollIntervalMs: config.pollIntervalMs,
      timezone: config.timezone,
    });

    this.router = this.buildRouter(options);
    options.app?.use(options.prefix || '/', this.router);
  }

  /**
   * Register a job under its own lock in the job lock directory.
   *
   * @throws InvalidCronError
   */
  schedule(cron: string, target: JobTarget, options: ScheduleOptions = {}): Job {
    const id = options.id ?? generateId();
    const lockPath = options.lockPath ?? join(this.config.jobLockDir, `${id}.lock`);
    return this.scheduler.addJob(cron, target, lockPath, options.conditions ?? [], { id, name: options.name });
  }

  start(): void {
    this.scheduler.start();
    console.info(`[Deskpilot] Scheduler started with ${this.scheduler.listJobs().length} job(s)`);
  }

  /**
   * Stop scheduling, ask the active run to stop, and wait for job bodies to finish.
   */
  async shutdown(): Promise<void> {
    this.scheduler.stop();
    this.runner.stop();
    await this.scheduler.drain();
  }

  private buildRouter(options: DeskpilotOptions): Router {
    const routes = { ...DefaultRouteConfig, ...options.routes };
    const router = express.Router();

    router.use(express.json());
    router.use(
      createContextMiddleware(
        {
          runner: this.runner,
          flows: this.flows,
          actions: this.actions,
          stats: this.stats,
          scheduler: this.scheduler,
        },
        options.context
      )
    );
    for (const mw of options.middleware ?? []) {
      router.use(mw);
    }

    if (routes.flows) registerFlowRoutes(router);
    if (routes.runner) registerRunnerRoutes(router);
    if (routes.jobs) registerJobRoutes(router);
    if (routes.actions) registerActionRoutes(router);
    if (routes.stats) registerStatsRoutes(router);
    if (routes.health) registerHealthRoutes(router);

    router.use(createErrorHandler());
    return router;
  }
}
