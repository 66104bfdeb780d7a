/**
 * Test fixtures for @deskpilot/express tests.
 */

import express, { type Express } from 'express';
import { MemoryLockManager, type Flow } from '@deskpilot/core';
import { createFlow, echoAction, failAction, failingFlow, greetingFlow, step } from '@deskpilot/core/test';
import { createDeskpilot, type Deskpilot, type DeskpilotOptions } from '../src/deskpilot';

/** Only admins may see or run it */
export const payrollFlow: Flow = createFlow('payroll', [step('total', 'echo', { params: { value: 42 } })], {
  roles: { view: ['admin'], run: ['admin'] },
});

/** Waits ten seconds unless stopped */
export const slowFlow: Flow = createFlow('slow', [step('pause', 'wait', { params: { ms: 10_000 } })]);

export interface TestApp {
  app: Express;
  deskpilot: Deskpilot;
  locks: MemoryLockManager;
}

/**
 * An app with the deskpilot router mounted, memory locks and an empty environment.
 */
export async function createTestApp(options: DeskpilotOptions = {}): Promise<TestApp> {
  const app = express();
  const locks = new MemoryLockManager();
  const deskpilot = await createDeskpilot({
    app,
    env: {},
    locks,
    actions: [echoAction, failAction],
    flows: [greetingFlow, failingFlow, payrollFlow, slowFlow],
    ...options,
  });
  return { app, deskpilot, locks };
}
