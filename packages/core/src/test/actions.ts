/**
 * Test Actions
 *
 * Reusable actions for exercising the runner.
 * Each one demonstrates a different execution pattern.
 */
import type { ActionCall, ActionHandler, ActionMetadata } from '../interfaces/action-handler';
import { Result } from '../types/result';
import type { ActionResult } from '../types/result';

function meta(name: string, title: string): ActionMetadata {
  return { name, title, category: 'custom' };
}

/**
 * Echo: returns its params unchanged.
 * Useful for testing variable substitution.
 */
export const echoAction: ActionHandler = {
  name: 'echo',
  metadata: meta('echo', 'Echo'),
  async execute({ params }) {
    return Result.success(params.value ?? params);
  },
};

/**
 * Fail: always fails with `params.code` (default TEST_FAILURE).
 */
export const failAction: ActionHandler = {
  name: 'fail',
  metadata: meta('fail', 'Fail'),
  async execute({ params }) {
    const code = typeof params.code === 'string' ? params.code : 'TEST_FAILURE';
    return Result.failure(code, `Intentional failure (${code})`);
  },
};

/**
 * Throw: throws instead of returning a failure.
 */
export const throwAction: ActionHandler = {
  name: 'throw',
  metadata: meta('throw', 'Throw'),
  async execute() {
    throw new Error('boom');
  },
};

/**
 * Action that records every call it receives.
 */
export function createRecordingAction(name = 'record'): ActionHandler & { calls: ActionCall[] } {
  const calls: ActionCall[] = [];
  return {
    name,
    metadata: meta(name, 'Record'),
    calls,
    async execute(call) {
      calls.push(call);
      return Result.success(calls.length);
    },
  };
}

/**
 * Fails `failures` times, then succeeds with the attempt number.
 */
export function createFlakyAction(failures: number, name = 'flaky'): ActionHandler & { readonly attempts: number } {
  let attempts = 0;
  return {
    name,
    metadata: meta(name, 'Flaky'),
    get attempts() {
      return attempts;
    },
    async execute(): Promise<ActionResult> {
      attempts++;
      if (attempts <= failures) {
        return Result.failure('FLAKY', `Attempt ${attempts} failed`);
      }
      return Result.success(attempts);
    },
  };
}

/**
 * Action that blocks until released. `started` resolves once the action
 * has been entered, so tests can act while a run is in flight.
 */
export function createGateAction(name = 'gate'): ActionHandler & {
  started: Promise<void>;
  release(output?: unknown): void;
} {
  let markStarted: () => void = () => undefined;
  let open: (output: unknown) => void = () => undefined;
  const started = new Promise<void>(resolve => {
    markStarted = resolve;
  });
  const opened = new Promise<unknown>(resolve => {
    open = resolve;
  });

  return {
    name,
    metadata: meta(name, 'Gate'),
    started,
    release(output?: unknown) {
      open(output);
    },
    async execute() {
      markStarted();
      return Result.success(await opened);
    },
  };
}
