import Ajv from 'ajv';
import {
  ReasonCodes,
  Result,
  type ActionCall,
  type ActionCategory,
  type ActionHandler,
  type ActionResult,
  type JSONSchema,
} from '@deskpilot/core';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export interface ActionDefinition<P> {
  name: string;
  title: string;
  description?: string;
  category: ActionCategory;
  paramsSchema: JSONSchema;
  requiresSelector?: boolean;
  run(params: P, call: ActionCall): Promise<ActionResult>;
}

/**
 * Build an ActionHandler whose params are checked against `paramsSchema`
 * before `run` sees them. Schema violations and a missing required selector
 * come back as INVALID_PARAMS failures.
 */
export function defineAction<P>(definition: ActionDefinition<P>): ActionHandler {
  const validate = ajv.compile<P>(definition.paramsSchema);
  const { name, title, description, category, paramsSchema, requiresSelector } = definition;

  return {
    name,
    metadata: { name, title, description, category, paramsSchema, requiresSelector },

    async execute(call) {
      if (requiresSelector && (call.selector === undefined || call.selector === '')) {
        return Result.failure(ReasonCodes.InvalidParams, `Action "${name}" requires a selector`);
      }

      const params: unknown = call.params;
      if (!validate(params)) {
        const issues = (validate.errors ?? []).map(e => ({
          path: e.instancePath.replace(/^\//, '').replace(/\//g, '.') || '(params)',
          message: e.message ?? 'Invalid',
        }));
        const summary = issues.map(i => `${i.path} ${i.message}`).join('; ');
        return Result.failure(ReasonCodes.InvalidParams, `Invalid params for "${name}": ${summary}`, issues);
      }

      return definition.run(params, call);
    },
  };
}

export const TIMED_OUT: unique symbol = Symbol('timed out');

/**
 * Run `work` with its own deadline. The signal handed to `work` aborts on
 * timeout or when `outer` aborts.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<T | typeof TIMED_OUT> {
  const controller = new AbortController();
  const forward = () => controller.abort();
  outer?.addEventListener('abort', forward, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>(resolve => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(TIMED_OUT);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', forward);
  }
}

/** Shared schema fragments */
export const regionSchema: JSONSchema = {
  type: 'object',
  required: ['x', 'y', 'width', 'height'],
  properties: {
    x: { type: 'number' },
    y: { type: 'number' },
    width: { type: 'number', exclusiveMinimum: 0 },
    height: { type: 'number', exclusiveMinimum: 0 },
  },
  additionalProperties: false,
};

export const basisSchema: JSONSchema = { type: 'string', enum: ['Element', 'Window', 'Screen'], default: 'Screen' };

export const buttonSchema: JSONSchema = { type: 'string', enum: ['left', 'right', 'middle'], default: 'left' };
