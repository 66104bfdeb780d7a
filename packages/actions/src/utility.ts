import { setTimeout as sleep } from 'node:timers/promises';
import { ReasonCodes, Result, type ActionHandler } from '@deskpilot/core';
import { defineAction } from './define-action';

interface LogParams {
  message: string;
  level?: 'info' | 'warn' | 'error';
}

interface SetParams {
  name: string;
  value?: unknown;
}

interface WaitParams {
  ms: number;
}

export function createUtilityActions(): ActionHandler[] {
  return [
    defineAction<LogParams>({
      name: 'log',
      title: 'Log message',
      category: 'utility',
      paramsSchema: {
        type: 'object',
        required: ['message'],
        properties: {
          message: { type: 'string' },
          level: { type: 'string', enum: ['info', 'warn', 'error'], default: 'info' },
        },
      },
      async run({ message, level = 'info' }, { context }) {
        const line = `[Flow ${context.flowId}] ${message}`;
        if (level === 'error') console.error(line);
        else if (level === 'warn') console.warn(line);
        else console.info(line);
        return Result.success(message);
      },
    }),

    defineAction<SetParams>({
      name: 'set',
      title: 'Set variable',
      description: 'Store a value in the run context',
      category: 'utility',
      paramsSchema: {
        type: 'object',
        required: ['name'],
        properties: { name: { type: 'string', minLength: 1 } },
      },
      async run({ name, value }, { context }) {
        context.set(name, value);
        return Result.success(value);
      },
    }),

    defineAction<WaitParams>({
      name: 'wait',
      title: 'Wait',
      description: 'Pause for a number of milliseconds; interrupted by stop()',
      category: 'utility',
      paramsSchema: {
        type: 'object',
        required: ['ms'],
        properties: { ms: { type: 'integer', minimum: 0 } },
      },
      async run({ ms }, { signal }) {
        try {
          await sleep(ms, undefined, { signal });
        } catch (err) {
          if (signal?.aborted) return Result.failure(ReasonCodes.Cancelled, `Wait interrupted after stop`);
          throw err;
        }
        return Result.success(ms);
      },
    }),
  ];
}
