import { describe, it, expect, vi, afterEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { ConfigurationError, FileLockManager, MemoryRunLog, type RunRecord } from '@deskpilot/core';
import { greetingFlow } from '@deskpilot/core/test';
import { createDeskpilot } from '../src/deskpilot';
import { createTestApp } from './fixtures';

function pastRun(runId: string, status: RunRecord['status']): RunRecord {
  return {
    runId,
    flowId: 'greeting',
    source: 'schedule',
    startedAt: Date.parse('2026-03-02T08:00:00Z'),
    endedAt: Date.parse('2026-03-02T08:00:01Z'),
    durationMs: 1000,
    status,
    reason: status === 'failed' ? 'TIMEOUT' : undefined,
    selectorOutcomes: [],
    stepsCompleted: 1,
  };
}

describe('createDeskpilot', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves settings from the environment and overrides', async () => {
    const deskpilot = await createDeskpilot({
      env: { DESKPILOT_RUN_LOCK: 'locks/run.lock', DESKPILOT_RBAC_DEFAULT: 'allow' },
      config: { jobLockDir: 'locks/jobs' },
    });

    expect(deskpilot.runner.lockPath).toBe('locks/run.lock');
    expect(deskpilot.config.rbacDefault).toBe('allow');
    expect(deskpilot.locks).toBeInstanceOf(FileLockManager);
    expect(deskpilot.schedule('0 0 9 * * *', () => undefined, { id: 'tidy' }).lockPath).toBe('locks/jobs/tidy.lock');
  });

  it('rejects invalid settings', async () => {
    await expect(createDeskpilot({ env: { DESKPILOT_POLL_MS: '5000' } })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('registers only the action families it has backends for', async () => {
    const deskpilot = await createDeskpilot({ env: {} });

    expect(deskpilot.actions.names()).toEqual(['log', 'set', 'wait']);
  });

  it('rebuilds stats from the run log and keeps appending to it', async () => {
    const runLog = new MemoryRunLog();
    runLog.record(pastRun('old-1', 'success'));
    runLog.record(pastRun('old-2', 'failed'));

    const { app, deskpilot } = await createTestApp({ runLog });
    expect(deskpilot.stats.snapshot().totals).toEqual({ total: 2, succeeded: 1, failed: 1, skipped: 0 });

    await request(app).post('/api/flows/greeting/run').set('x-deskpilot-role', 'operator').send({});

    expect(runLog.size).toBe(3);
    expect(deskpilot.stats.snapshot().totals.total).toBe(3);
  });

  it('mounts under a prefix with selected route groups', async () => {
    const app = express();
    await createDeskpilot({ app, env: {}, prefix: '/rpa', routes: { stats: false }, flows: [greetingFlow] });

    const health = await request(app).get('/rpa/health');
    const stats = await request(app).get('/rpa/api/stats');

    expect(health.status).toBe(200);
    expect(stats.status).toBe(404);
  });

  it('starts and shuts down the scheduler', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deskpilot } = await createTestApp();
    deskpilot.schedule('0 0 9 * * *', () => undefined, { id: 'tidy' });

    deskpilot.start();
    expect(deskpilot.scheduler.isRunning()).toBe(true);
    expect(info).toHaveBeenCalledWith('[Deskpilot] Scheduler started with 1 job(s)');

    await deskpilot.shutdown();
    expect(deskpilot.scheduler.isRunning()).toBe(false);
  });
});
