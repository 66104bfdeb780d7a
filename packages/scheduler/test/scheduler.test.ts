/**
 * CronScheduler Tests
 *
 * Covers:
 * - Due-job detection against an injected clock
 * - Conditions: short-circuit AND, false and throwing predicates skip without locking
 * - Overlap skips through job-lock contention
 * - Function targets recorded by the scheduler, flow targets by the Runner
 * - The polling loop
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryLockManager, MemoryRunLog, EventDispatcher, type DispatchedEvent } from '@deskpilot/core';
import { TestHarness, echoAction, greetingFlow } from '@deskpilot/core/test';
import { CronScheduler } from '../src/scheduler';
import { InvalidCronError } from '../src/cron';

const EVERY_SECOND = '* * * * * *';

function createGate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>(resolve => {
    open = resolve;
  });
  return { opened, open: () => open() };
}

describe('CronScheduler', () => {
  let clockNow: number;
  let locks: MemoryLockManager;
  let log: MemoryRunLog;
  let events: DispatchedEvent[];
  let scheduler: CronScheduler;

  function createScheduler(extra: Partial<ConstructorParameters<typeof CronScheduler>[0]> = {}): CronScheduler {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    dispatcher.on('*', e => events.push(e));
    return new CronScheduler({ locks, recorders: [log], events: dispatcher, clock: () => clockNow, ...extra });
  }

  /** Move the clock to the job's next firing */
  function advanceTo(jobId: string): number {
    const job = scheduler.getJob(jobId);
    if (!job) throw new Error(`no job ${jobId}`);
    clockNow = job.nextRunAt;
    return clockNow;
  }

  beforeEach(() => {
    clockNow = Date.parse('2026-01-05T10:00:00.500Z');
    locks = new MemoryLockManager();
    log = new MemoryRunLog();
    events = [];
    scheduler = createScheduler();
  });

  afterEach(async () => {
    scheduler.stop();
    await scheduler.drain();
    vi.restoreAllMocks();
  });

  describe('addJob', () => {
    it('schedules the first firing after now', () => {
      const job = scheduler.addJob('0 */5 * * * *', () => undefined, 'jobs/report.lock', [], { id: 'report' });

      expect(job).toMatchObject({ id: 'report', target: 'function', lockPath: 'jobs/report.lock' });
      expect(job.nextRunAt).toBe(Date.parse('2026-01-05T10:05:00Z'));
    });

    it('rejects invalid cron expressions', () => {
      expect(() => scheduler.addJob('every day', () => undefined, 'jobs/x.lock')).toThrow(InvalidCronError);
    });

    it('rejects duplicate ids', () => {
      scheduler.addJob(EVERY_SECOND, () => undefined, 'jobs/a.lock', [], { id: 'a' });

      expect(() => scheduler.addJob(EVERY_SECOND, () => undefined, 'jobs/b.lock', [], { id: 'a' })).toThrow(
        'Job "a" already exists'
      );
    });

    it('needs a runner for flow targets', () => {
      const target = { kind: 'flow', flowId: 'greeting', actorRole: 'operator' } as const;

      expect(() => scheduler.addJob(EVERY_SECOND, target, 'jobs/g.lock')).toThrow('Flow jobs need a scheduler');
    });

    it('lists and removes jobs', () => {
      scheduler.addJob(EVERY_SECOND, () => undefined, 'jobs/a.lock', [], { id: 'a', name: 'Cleanup' });

      expect(scheduler.listJobs().map(j => j.name)).toEqual(['Cleanup']);
      expect(scheduler.removeJob('a')).toBe(true);
      expect(scheduler.listJobs()).toEqual([]);
    });
  });

  describe('firing', () => {
    it('fires only once the job is due', async () => {
      const body = vi.fn();
      scheduler.addJob(EVERY_SECOND, body, 'jobs/tick.lock', [], { id: 'tick' });

      await scheduler.tickOnce();
      expect(body).not.toHaveBeenCalled();

      const due = advanceTo('tick');
      await scheduler.tickOnce();
      await scheduler.drain();

      expect(body).toHaveBeenCalledWith({ jobId: 'tick', firedAt: due });
      expect(scheduler.getJob('tick')?.nextRunAt).toBeGreaterThan(due);
      expect(scheduler.getJob('tick')).toMatchObject({ lastFiredAt: due, lastStatus: 'success' });
    });

    it('records function targets and releases the job lock', async () => {
      scheduler.addJob(EVERY_SECOND, () => undefined, 'jobs/tick.lock', [], { id: 'tick' });
      advanceTo('tick');

      await scheduler.tickOnce();
      await scheduler.drain();

      expect(await locks.isHeld('jobs/tick.lock')).toBe(false);
      expect(await log.list()).toHaveLength(1);
      expect((await log.list())[0]).toMatchObject({ jobId: 'tick', source: 'schedule', status: 'success' });
      expect(events.map(e => e.type)).toEqual(['job.fired', 'job.completed']);
    });

    it('records a throwing body as a failed run', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      scheduler.addJob(
        EVERY_SECOND,
        () => {
          throw new Error('disk full');
        },
        'jobs/fail.lock',
        [],
        { id: 'fail' }
      );
      advanceTo('fail');

      await scheduler.tickOnce();
      await scheduler.drain();

      expect((await log.list())[0]).toMatchObject({ status: 'failed', reason: 'ACTION_ERROR', message: 'disk full' });
      expect(await locks.isHeld('jobs/fail.lock')).toBe(false);
      expect(events.map(e => e.type)).toEqual(['job.fired', 'job.completed', 'job.failed']);
    });

    it('keeps one failing job from affecting another', async () => {
      const healthy = vi.fn();
      scheduler.addJob(
        EVERY_SECOND,
        async () => {
          throw new Error('broken');
        },
        'jobs/broken.lock',
        [],
        { id: 'broken' }
      );
      scheduler.addJob(EVERY_SECOND, healthy, 'jobs/healthy.lock', [], { id: 'healthy' });
      advanceTo('broken');

      await scheduler.tickOnce();
      await scheduler.drain();

      expect(healthy).toHaveBeenCalledTimes(1);
      expect(scheduler.getJob('healthy')?.lastStatus).toBe('success');
    });
  });

  describe('conditions', () => {
    it('never runs or locks a job whose condition is false', async () => {
      const body = vi.fn();
      const tryAcquire = vi.spyOn(locks, 'tryAcquire');
      scheduler.addJob(EVERY_SECOND, body, 'jobs/vpn.lock', [() => false], { id: 'vpn' });

      for (let i = 0; i < 3; i++) {
        advanceTo('vpn');
        await scheduler.tickOnce();
      }
      await scheduler.drain();

      expect(body).not.toHaveBeenCalled();
      expect(tryAcquire).not.toHaveBeenCalled();
      expect(log.size).toBe(0);
      expect(events.map(e => [e.type, e.reason])).toEqual([
        ['job.skipped', 'CONDITION_FALSE'],
        ['job.skipped', 'CONDITION_FALSE'],
        ['job.skipped', 'CONDITION_FALSE'],
      ]);
    });

    it('stops at the first false condition', async () => {
      const later = vi.fn(() => true);
      scheduler.addJob(EVERY_SECOND, () => undefined, 'jobs/a.lock', [() => true, () => false, later], { id: 'a' });
      advanceTo('a');

      await scheduler.tickOnce();

      expect(later).not.toHaveBeenCalled();
    });

    it('treats a throwing condition as false', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const body = vi.fn();
      scheduler.addJob(
        EVERY_SECOND,
        body,
        'jobs/a.lock',
        [
          async () => {
            throw new Error('probe failed');
          },
        ],
        { id: 'a' }
      );
      advanceTo('a');

      await scheduler.tickOnce();

      expect(body).not.toHaveBeenCalled();
      expect(error).toHaveBeenCalledTimes(1);
      expect(scheduler.getJob('a')).toMatchObject({ lastStatus: 'skipped', lastReason: 'CONDITION_FALSE' });
    });

    it('reports skips as records when asked to', async () => {
      scheduler = createScheduler({ recordSkips: true });
      scheduler.addJob(EVERY_SECOND, () => undefined, 'jobs/a.lock', [() => false], { id: 'a' });
      advanceTo('a');

      await scheduler.tickOnce();

      expect(await log.list()).toHaveLength(1);
      expect((await log.list())[0]).toMatchObject({ jobId: 'a', status: 'skipped', reason: 'CONDITION_FALSE' });
    });
  });

  describe('overlap', () => {
    it('skips firings while an earlier firing still holds the job lock', async () => {
      const gate = createGate();
      let started = 0;
      scheduler.addJob(
        EVERY_SECOND,
        async () => {
          started++;
          await gate.opened;
        },
        'jobs/long.lock',
        [],
        { id: 'long' }
      );

      advanceTo('long');
      await scheduler.tickOnce();
      expect(await locks.isHeld('jobs/long.lock')).toBe(true);

      advanceTo('long');
      await scheduler.tickOnce();
      advanceTo('long');
      await scheduler.tickOnce();

      gate.open();
      await scheduler.drain();

      expect(started).toBe(1);
      expect(await locks.isHeld('jobs/long.lock')).toBe(false);
      expect(events.filter(e => e.type === 'job.skipped').map(e => e.reason)).toEqual(['LOCK_BUSY', 'LOCK_BUSY']);
      expect((await log.list()).map(r => r.status)).toEqual(['success']);
    });

    it('keeps reporting the job as running while its own firing holds the lock', async () => {
      const gate = createGate();
      scheduler.addJob(EVERY_SECOND, () => gate.opened, 'jobs/long.lock', [], { id: 'long' });

      advanceTo('long');
      await scheduler.tickOnce();
      advanceTo('long');
      await scheduler.tickOnce();

      expect(scheduler.listJobs()[0]).toMatchObject({ id: 'long', lastStatus: 'running' });

      gate.open();
      await scheduler.drain();

      expect(scheduler.listJobs()[0]).toMatchObject({ id: 'long', lastStatus: 'success' });
    });

    it('marks a job skipped when another holder owns its lock', async () => {
      await locks.tryAcquire('jobs/shared.lock');
      scheduler.addJob(EVERY_SECOND, async () => {}, 'jobs/shared.lock', [], { id: 'blocked' });

      advanceTo('blocked');
      await scheduler.tickOnce();

      expect(scheduler.listJobs()[0]).toMatchObject({ id: 'blocked', lastStatus: 'skipped', lastReason: 'LOCK_BUSY' });
    });
  });

  describe('flow targets', () => {
    let t: TestHarness;

    beforeEach(() => {
      t = new TestHarness({ actions: [echoAction], flows: [greetingFlow], locks });
      scheduler = createScheduler({ runner: t.runner });
      scheduler.addJob(
        EVERY_SECOND,
        { kind: 'flow', flowId: 'greeting', actorRole: 'operator', variables: { name: 'Ada' } },
        'jobs/greet.lock',
        [],
        { id: 'greet' }
      );
      advanceTo('greet');
    });

    it('runs the flow through the Runner, which records it', async () => {
      await scheduler.tickOnce();
      await scheduler.drain();

      expect(await t.runLog.list()).toHaveLength(1);
      expect((await t.runLog.list())[0]).toMatchObject({
        flowId: 'greeting',
        jobId: 'greet',
        source: 'schedule',
        status: 'success',
      });
      expect(log.size).toBe(0);
      expect(scheduler.listJobs()[0]).toMatchObject({ target: 'flow', flowId: 'greeting', lastStatus: 'success' });
    });

    it('skips silently while another run holds the global run lock', async () => {
      const manual = await locks.acquire('runs/runner.lock');

      await scheduler.tickOnce();
      await scheduler.drain();
      await manual.release();

      expect(t.runLog.size).toBe(0);
      expect(scheduler.getJob('greet')).toMatchObject({ lastStatus: 'skipped', lastReason: 'LOCK_BUSY' });
      expect(await locks.isHeld('jobs/greet.lock')).toBe(false);
    });
  });

  describe('loop', () => {
    it('fires due jobs while running and stops on request', async () => {
      const body = vi.fn();
      scheduler = createScheduler({ pollIntervalMs: 10 });
      scheduler.addJob(EVERY_SECOND, body, 'jobs/loop.lock', [], { id: 'loop' });
      advanceTo('loop');

      scheduler.start();
      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);
      await vi.waitFor(() => expect(body).toHaveBeenCalledTimes(1));

      scheduler.stop();
      expect(scheduler.isRunning()).toBe(false);
    });
  });
});
