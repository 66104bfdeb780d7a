/**
 * Express middleware for deskpilot.
 */

import Ajv, { type ErrorObject } from 'ajv';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import {
  DeskpilotError,
  FlowNotFoundError,
  FlowValidationError,
  LockBusyError,
  PermissionDeniedError,
  type ActionRegistry,
  type FlowStore,
  type JSONSchema,
  type Runner,
  type ValidationIssue,
} from '@deskpilot/core';
import type { CronScheduler } from '@deskpilot/scheduler';
import type { StatsAggregator } from '@deskpilot/stats';

export const ROLE_HEADER = 'x-deskpilot-role';

/**
 * Runtime services the handlers read from.
 */
export interface DeskpilotServices {
  runner: Runner;
  flows: FlowStore;
  actions: ActionRegistry;
  stats: StatsAggregator;
  scheduler?: CronScheduler;
}

/**
 * Context attached to Express requests.
 */
export interface DeskpilotContext {
  services: DeskpilotServices;
  /** Actor role, used only for authorization */
  role?: string;
}

declare global {
  namespace Express {
    interface Request {
      deskpilot?: DeskpilotContext;
    }
  }
}

export interface ContextMiddlewareOptions {
  /** Extract the actor role (default: the x-deskpilot-role header) */
  getRole?: (req: Request) => string | undefined;
}

export function createContextMiddleware(
  services: DeskpilotServices,
  options: ContextMiddlewareOptions = {}
): RequestHandler {
  const getRole = options.getRole ?? ((req: Request) => req.get(ROLE_HEADER));
  return (req: Request, _res: Response, next: NextFunction) => {
    const role = getRole(req)?.trim();
    req.deskpilot = { services, role: role || undefined };
    next();
  };
}

// === Errors ===

export class RoleRequiredError extends DeskpilotError {
  constructor() {
    super('ROLE_REQUIRED', `Missing ${ROLE_HEADER} header`);
    this.name = 'RoleRequiredError';
  }
}

/**
 * Request body or query failed validation.
 */
export class RequestValidationError extends DeskpilotError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[]
  ) {
    super('INVALID_REQUEST', message);
    this.name = 'RequestValidationError';
  }
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

function statusFor(err: Error): number {
  if (err instanceof RoleRequiredError) return 401;
  if (err instanceof PermissionDeniedError) return 403;
  if (err instanceof FlowNotFoundError) return 404;
  if (err instanceof FlowValidationError || err instanceof RequestValidationError) return 400;
  if (err instanceof LockBusyError) return 409;
  // body-parser errors carry their own 4xx status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

function toErrorResponse(err: Error, status: number): ErrorResponse {
  if (err instanceof FlowValidationError || err instanceof RequestValidationError) {
    return { error: { code: err.code, message: err.message, details: err.issues } };
  }
  if (err instanceof DeskpilotError) {
    return { error: { code: err.code, message: err.message } };
  }
  if (status < 500) {
    return { error: { code: 'INVALID_REQUEST', message: err.message } };
  }
  return { error: { code: 'INTERNAL_ERROR', message: err.message || 'An unexpected error occurred' } };
}

/**
 * Map errors to `{ error: { code, message, details? } }` responses.
 */
export function createErrorHandler(): (err: Error, req: Request, res: Response, next: NextFunction) => void {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err);
    if (status >= 500) console.error('[Deskpilot] Request failed:', err);
    res.status(status).json(toErrorResponse(err, status));
  };
}

// === Request helpers ===

export function requireDeskpilotContext(req: Request): DeskpilotContext {
  if (!req.deskpilot) {
    throw new DeskpilotError('CONTEXT_MISSING', 'Deskpilot context not attached. Did you forget the middleware?');
  }
  return req.deskpilot;
}

/**
 * Context plus the caller's role.
 * @throws RoleRequiredError
 */
export function requireRole(req: Request): DeskpilotContext & { role: string } {
  const ctx = requireDeskpilotContext(req);
  if (!ctx.role) throw new RoleRequiredError();
  return { ...ctx, role: ctx.role };
}

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

function toIssues(errors: ErrorObject[] | null | undefined, root: string): ValidationIssue[] {
  return (errors ?? []).map(e => ({
    path: e.instancePath ? `${root}${e.instancePath.replace(/\//g, '.')}` : root,
    message: e.message ?? 'Invalid',
    severity: 'error',
  }));
}

/**
 * Reject requests whose JSON body does not match `schema`.
 */
export function validateBody(schema: JSONSchema): RequestHandler {
  const validate = ajv.compile(schema);
  return (req: Request, _res: Response, next: NextFunction) => {
    // No body at all is an empty object
    const body: unknown = req.body ?? {};
    if (validate(body)) {
      next();
      return;
    }
    const issues = toIssues(validate.errors, 'body');
    next(new RequestValidationError(`Invalid request body: ${issues.map(i => `${i.path} ${i.message}`).join('; ')}`, issues));
  };
}

/**
 * Async handler wrapper to catch errors.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
