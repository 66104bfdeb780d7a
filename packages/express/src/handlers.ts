/**
 * Express route handlers for deskpilot.
 */

import type { Router, Request, Response } from 'express';
import { FlowNotFoundError, ReasonCodes, isRecord, type ActionCategory, type Flow, type JSONSchema } from '@deskpilot/core';
import { renderStatsHtml, toStatsReport } from '@deskpilot/stats';
import { Routes } from './routes';
import {
  asyncHandler,
  requireDeskpilotContext,
  requireRole,
  validateBody,
  RequestValidationError,
  type DeskpilotServices,
  type ErrorResponse,
} from './middleware';

export interface FlowSummary {
  id: string;
  version: string;
  name: string;
  description?: string;
  status: Flow['status'];
  steps: number;
  approvals: number;
}

export function toFlowSummary(flow: Flow): FlowSummary {
  return {
    id: flow.id,
    version: flow.version,
    name: flow.name,
    description: flow.description,
    status: flow.status,
    steps: flow.steps.length,
    approvals: flow.approvals.length,
  };
}

async function loadFlow(services: DeskpilotServices, flowId: string): Promise<Flow> {
  const flow = await services.flows.get(flowId);
  if (!flow) throw new FlowNotFoundError(flowId);
  return flow;
}

const runBodySchema: JSONSchema = {
  type: 'object',
  properties: {
    variables: { type: 'object' },
  },
  additionalProperties: false,
};

function variablesOf(body: unknown): Record<string, unknown> {
  return isRecord(body) && isRecord(body.variables) ? { ...body.variables } : {};
}

/**
 * Register flow routes (list, view, run, publish, approve).
 */
export function registerFlowRoutes(router: Router): void {
  // GET /api/flows - flows the role may view
  router.get(
    Routes.ListFlows,
    asyncHandler(async (req: Request, res: Response) => {
      const { services, role } = requireRole(req);
      const flows = await services.flows.list();
      res.json({
        flows: flows.filter(f => services.runner.can(f, 'view', role)).map(toFlowSummary),
      });
    })
  );

  // GET /api/flows/:flowId
  router.get(
    Routes.GetFlow,
    asyncHandler(async (req: Request, res: Response) => {
      const { services, role } = requireRole(req);
      const flow = await loadFlow(services, req.params.flowId);
      res.json({ flow: services.runner.viewFlow(flow, role) });
    })
  );

  // POST /api/flows/:flowId/run
  router.post(
    Routes.RunFlow,
    validateBody(runBodySchema),
    asyncHandler(async (req: Request, res: Response) => {
      const { services, role } = requireRole(req);
      const record = await services.runner.executeById(req.params.flowId, variablesOf(req.body), role);

      if (record.reason === ReasonCodes.LockBusy) {
        const busy: ErrorResponse = {
          error: { code: ReasonCodes.LockBusy, message: record.message ?? 'Runner is busy', details: { run: record } },
        };
        res.status(409).json(busy);
        return;
      }
      res.json({ run: record });
    })
  );

  router.post(
    Routes.PublishFlow,
    asyncHandler(async (req: Request, res: Response) => {
      const { services, role } = requireRole(req);
      const flow = await loadFlow(services, req.params.flowId);
      res.json({ flow: toFlowSummary(await services.runner.publishFlow(flow, role)) });
    })
  );

  router.post(
    Routes.ApproveFlow,
    asyncHandler(async (req: Request, res: Response) => {
      const { services, role } = requireRole(req);
      const flow = await loadFlow(services, req.params.flowId);
      res.json({ flow: toFlowSummary(await services.runner.approveFlow(flow, role)) });
    })
  );
}

/**
 * Register runner control routes. Each answers with whether a run was affected.
 */
export function registerRunnerRoutes(router: Router): void {
  router.post(Routes.StopRunner, (req: Request, res: Response) => {
    const { runner } = requireDeskpilotContext(req).services;
    const runId = runner.currentRunId();
    res.json({ stopped: runner.stop(), runId });
  });

  router.post(Routes.PauseRunner, (req: Request, res: Response) => {
    const { runner } = requireDeskpilotContext(req).services;
    res.json({ paused: runner.pause(), runId: runner.currentRunId() });
  });

  router.post(Routes.ResumeRunner, (req: Request, res: Response) => {
    const { runner } = requireDeskpilotContext(req).services;
    runner.resume();
    res.json({ paused: runner.isPaused(), runId: runner.currentRunId() });
  });

  router.post(Routes.SkipStep, (req: Request, res: Response) => {
    const { runner } = requireDeskpilotContext(req).services;
    res.json({ skipped: runner.skip(), runId: runner.currentRunId() });
  });
}

const ACTION_CATEGORIES: readonly ActionCategory[] = ['web', 'image', 'coordinates', 'table', 'utility', 'custom'];

function parseCategory(value: unknown): ActionCategory | undefined {
  if (value === undefined) return undefined;
  const category = ACTION_CATEGORIES.find(c => c === value);
  if (!category) {
    throw new RequestValidationError(`Unknown action category "${String(value)}"`, [
      { path: 'query.category', message: `must be one of ${ACTION_CATEGORIES.join(', ')}`, severity: 'error' },
    ]);
  }
  return category;
}

export function registerJobRoutes(router: Router): void {
  router.get(Routes.ListJobs, (req: Request, res: Response) => {
    const { scheduler } = requireDeskpilotContext(req).services;
    res.json({
      running: scheduler?.isRunning() ?? false,
      jobs: scheduler?.listJobs() ?? [],
    });
  });
}

export function registerActionRoutes(router: Router): void {
  // GET /api/actions?category=web
  router.get(Routes.ListActions, (req: Request, res: Response) => {
    const { actions } = requireDeskpilotContext(req).services;
    const category = parseCategory(req.query.category);
    res.json({ actions: actions.listActions(category), categories: actions.categories() });
  });
}

export function registerStatsRoutes(router: Router): void {
  // GET /api/stats?format=json|html
  router.get(Routes.Stats, (req: Request, res: Response) => {
    const { stats } = requireDeskpilotContext(req).services;
    const format = req.query.format ?? 'json';
    if (format === 'html') {
      res.type('html').send(renderStatsHtml(stats.snapshot()));
      return;
    }
    if (format !== 'json') {
      throw new RequestValidationError(`Unsupported stats format "${String(format)}"`, [
        { path: 'query.format', message: 'must be json or html', severity: 'error' },
      ]);
    }
    res.json(toStatsReport(stats.snapshot()));
  });
}

/**
 * Register the health route.
 */
export function registerHealthRoutes(router: Router): void {
  router.get(Routes.Health, (req: Request, res: Response) => {
    const { runner, scheduler } = requireDeskpilotContext(req).services;
    res.json({
      status: 'healthy',
      timestamp: Date.now(),
      runner: {
        running: runner.isRunning(),
        paused: runner.isPaused(),
        runId: runner.currentRunId(),
      },
      scheduler: {
        running: scheduler?.isRunning() ?? false,
        jobs: scheduler?.listJobs().length ?? 0,
      },
    });
  });
}
