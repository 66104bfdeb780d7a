/**
 * Route definitions for the deskpilot query surface.
 */

export const Routes = {
  // ── Flow Routes ─────────────────────────────────────────────────────
  /**
   * GET /api/flows
   * Flows the caller's role may view.
   */
  ListFlows: '/api/flows',

  /**
   * GET /api/flows/:flowId
   */
  GetFlow: '/api/flows/:flowId',

  /**
   * POST /api/flows/:flowId/run
   * Run a stored flow now. Body: `{ variables? }`.
   */
  RunFlow: '/api/flows/:flowId/run',

  PublishFlow: '/api/flows/:flowId/publish',

  ApproveFlow: '/api/flows/:flowId/approve',

  // ── Runner Routes ───────────────────────────────────────────────────
  /**
   * POST /api/runner/stop
   * Stop the active run at its next step boundary.
   */
  StopRunner: '/api/runner/stop',

  PauseRunner: '/api/runner/pause',

  ResumeRunner: '/api/runner/resume',

  SkipStep: '/api/runner/skip',

  // ── Query Routes ────────────────────────────────────────────────────
  ListJobs: '/api/jobs',

  ListActions: '/api/actions',

  /**
   * GET /api/stats?format=json|html
   */
  Stats: '/api/stats',

  // ── Health Routes ───────────────────────────────────────────────────
  Health: '/health',
} as const;

export type RouteName = keyof typeof Routes;
export type RoutePath = (typeof Routes)[RouteName];

/**
 * Fill in route parameters.
 *
 * @example
 * ```typescript
 * buildRoute(Routes.RunFlow, { flowId: 'invoice-export' });
 * // => '/api/flows/invoice-export/run'
 * ```
 */
export function buildRoute(route: RoutePath, params: Record<string, string> = {}): string {
  let result: string = route;
  for (const [key, value] of Object.entries(params)) {
    result = result.replace(`:${key}`, encodeURIComponent(value));
  }
  return result;
}

/**
 * Route groups to mount.
 */
export interface RouteConfig {
  /** List, view, run, publish, approve */
  flows?: boolean;
  /** Stop, pause, resume, skip */
  runner?: boolean;
  jobs?: boolean;
  actions?: boolean;
  stats?: boolean;
  health?: boolean;
}

export const DefaultRouteConfig: Required<RouteConfig> = {
  flows: true,
  runner: true,
  jobs: true,
  actions: true,
  stats: true,
  health: true,
};
