import { describe, it, expect, vi, afterEach } from 'vitest';
import express, { type Request } from 'express';
import request from 'supertest';
import { FlowValidationError, LockBusyError, PermissionDeniedError } from '@deskpilot/core';
import {
  asyncHandler,
  createContextMiddleware,
  createErrorHandler,
  requireRole,
  validateBody,
  type DeskpilotServices,
} from '../src/middleware';
import { createTestApp } from './fixtures';

function appThrowing(error: Error) {
  const app = express();
  app.get(
    '/boom',
    asyncHandler(async () => {
      throw error;
    })
  );
  app.use(createErrorHandler());
  return app;
}

describe('createErrorHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each([
    [new PermissionDeniedError('run', 'guest', 'payroll'), 403, 'PERMISSION_DENIED'],
    [new LockBusyError('runs/runner.lock'), 409, 'LOCK_BUSY'],
  ])('maps %s', async (error, status, code) => {
    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(status);
    expect(response.body.error.code).toBe(code);
  });

  it('includes validation issues as details', async () => {
    const issues = [{ path: 'steps', message: 'must be array', severity: 'error' as const }];

    const response = await request(appThrowing(new FlowValidationError('broken', issues))).get('/boom');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { code: 'FLOW_INVALID', message: 'Flow "broken" is invalid: must be array', details: issues },
    });
  });

  it('reports unknown errors as 500 and logs them', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const response = await request(appThrowing(new Error('disk full'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'disk full' } });
    expect(logged).toHaveBeenCalledTimes(1);
  });
});

describe('validateBody', () => {
  it('rejects bodies that do not match the schema', async () => {
    const app = express();
    app.use(express.json());
    app.post('/things', validateBody({ type: 'object', required: ['name'] }), (_req, res) => {
      res.json({ ok: true });
    });
    app.use(createErrorHandler());

    const bad = await request(app).post('/things').send({ label: 'x' });
    const good = await request(app).post('/things').send({ name: 'x' });

    expect(bad.status).toBe(400);
    expect(bad.body.error.code).toBe('INVALID_REQUEST');
    expect(bad.body.error.details).toEqual([
      { path: 'body', message: "must have required property 'name'", severity: 'error' },
    ]);
    expect(good.body).toEqual({ ok: true });
  });
});

describe('createContextMiddleware', () => {
  async function roleSeen(getRole?: (req: Request) => string | undefined, header?: string, path = '/whoami') {
    const { deskpilot } = await createTestApp();
    const services: DeskpilotServices = {
      runner: deskpilot.runner,
      flows: deskpilot.flows,
      actions: deskpilot.actions,
      stats: deskpilot.stats,
    };
    const app = express();
    app.use(createContextMiddleware(services, { getRole }));
    app.get('/whoami', (req, res) => {
      res.json({ role: requireRole(req).role });
    });
    app.use(createErrorHandler());

    const call = request(app).get(path);
    return header === undefined ? call : call.set('x-deskpilot-role', header);
  }

  it('reads the role header', async () => {
    const response = await roleSeen(undefined, ' operator ');

    expect(response.body).toEqual({ role: 'operator' });
  });

  it('answers 401 without a role', async () => {
    const response = await roleSeen(undefined, '');

    expect(response.status).toBe(401);
    expect(response.body.error).toEqual({ code: 'ROLE_REQUIRED', message: 'Missing x-deskpilot-role header' });
  });

  it('accepts a custom role extractor', async () => {
    const getRole = (req: Request) => (req.query.as === 'admin' ? 'admin' : undefined);

    const response = await roleSeen(getRole, 'operator', '/whoami?as=admin');

    expect(response.body).toEqual({ role: 'admin' });
  });
});
