/**
 * @deskpilot/express - query surface and runtime wiring for deskpilot.
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createDeskpilot } from '@deskpilot/express';
 *
 * const app = express();
 * const deskpilot = await createDeskpilot({ app, flows: [invoiceExport] });
 * deskpilot.start();
 *
 * // Routes:
 * // GET  /health
 * // GET  /api/flows, /api/flows/:flowId
 * // POST /api/flows/:flowId/run | publish | approve
 * // POST /api/runner/stop | pause | resume | skip
 * // GET  /api/jobs, /api/actions, /api/stats?format=json|html
 *
 * app.listen(3000);
 * ```
 */

// Runtime
export { createDeskpilot, Deskpilot } from './deskpilot';
export type { DeskpilotOptions, ScheduleOptions } from './deskpilot';

// Routes
export { Routes, buildRoute, DefaultRouteConfig } from './routes';
export type { RouteName, RoutePath, RouteConfig } from './routes';

// Middleware
export {
  createContextMiddleware,
  createErrorHandler,
  asyncHandler,
  validateBody,
  requireDeskpilotContext,
  requireRole,
  RoleRequiredError,
  RequestValidationError,
  ROLE_HEADER,
} from './middleware';
export type { DeskpilotContext, DeskpilotServices, ContextMiddlewareOptions, ErrorResponse } from './middleware';

// Route handlers (for custom routing)
export {
  registerFlowRoutes,
  registerRunnerRoutes,
  registerJobRoutes,
  registerActionRoutes,
  registerStatsRoutes,
  registerHealthRoutes,
  toFlowSummary,
} from './handlers';
export type { FlowSummary } from './handlers';
