import type { Selector } from '../types/flow';
import type { ActionResult } from '../types/result';
import type { ExecutionContext } from '../engine/context';

export type JSONSchemaTypeName = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null';

/**
 * JSON Schema subset used for action params. Compiled with ajv.
 */
export type JSONSchema = {
  type?: JSONSchemaTypeName | JSONSchemaTypeName[];
  properties?: Record<string, JSONSchema>;
  required?: string[];
  items?: JSONSchema;
  enum?: readonly unknown[];
  const?: unknown;
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  minLength?: number;
  minItems?: number;
  minProperties?: number;
  pattern?: string;
  description?: string;
  default?: unknown;
  additionalProperties?: boolean | JSONSchema;
  anyOf?: JSONSchema[];
};

export type ActionCategory = 'web' | 'image' | 'coordinates' | 'table' | 'utility' | 'custom';

export interface ActionMetadata {
  /** Registry key, e.g. "find_image" or "row.select" */
  name: string;
  title: string;
  description?: string;
  category: ActionCategory;
  /** Validated before execute(); failures surface as INVALID_PARAMS */
  paramsSchema?: JSONSchema;
  /** Whether the action needs a selector to do anything useful */
  requiresSelector?: boolean;
}

/**
 * Invoke another registered action from inside a composite action.
 * Resolution goes through the same registry, so hidden names stay unreachable.
 */
export type InvokeAction = (
  action: string,
  selector: Selector | undefined,
  params: Record<string, unknown>
) => Promise<ActionResult>;

export interface ActionCall {
  /** Selector after variable substitution */
  selector: Selector | undefined;
  /** Params after variable substitution */
  params: Record<string, unknown>;
  context: ExecutionContext;
  invoke: InvokeAction;
  /** Aborted once the runner has been asked to stop */
  signal?: AbortSignal;
}

/**
 * A named automation capability.
 */
export interface ActionHandler {
  readonly name: string;
  readonly metadata: ActionMetadata;
  execute(call: ActionCall): Promise<ActionResult>;
}
