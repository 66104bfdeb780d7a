import Ajv from 'ajv';
import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type {
  ActionStep,
  Condition,
  ControlBlock,
  ControlType,
  Flow,
  FlowOperation,
  FlowStatus,
  RoleMap,
  Selector,
  Step,
} from '../types/flow';
import { CONTROL_TYPES, FLOW_OPERATIONS } from '../types/flow';
import { FlowValidationError, type ValidationIssue } from '../types/errors';
import { validateFlow } from './validation';

/**
 * Step as written in a flow document. Control steps use a control type as
 * their `action` and carry nested step lists:
 *
 * - `if`: `when`, `steps`, `else`
 * - `while`: `when`, `steps`, `maxIterations`
 * - `for_each`: `items`, `as`, `steps`
 * - `try`: `steps`, `catch`, `finally`
 * - `switch`: `switch` (variable path), `cases`, `default`
 * - `subflow`: `flow` (flow id), `params` (inputs), `out`
 * - `break`, `continue`
 */
export interface FlowDocumentStep {
  id: string;
  action: string;
  selector?: Selector;
  params?: Record<string, unknown>;
  out?: string;
  retry?: number;
  timeoutMs?: number;
  onError?: { continue?: boolean; recover?: FlowDocumentStep };
  name?: string;
  when?: Condition;
  steps?: FlowDocumentStep[];
  else?: FlowDocumentStep[];
  catch?: FlowDocumentStep[];
  finally?: FlowDocumentStep[];
  items?: unknown;
  as?: string;
  maxIterations?: number;
  switch?: string;
  cases?: { value: unknown; steps: FlowDocumentStep[] }[];
  default?: FlowDocumentStep[];
  flow?: string;
}

/**
 * On-disk flow format.
 *
 * ```json
 * {
 *   "meta": { "name": "Invoice export", "roles": { "run": ["operator"], "edit": ["author"] } },
 *   "steps": [
 *     { "id": "open", "action": "open", "params": { "url": "${portal}" } },
 *     { "id": "grab", "action": "find_row", "selector": "#invoices", "params": { "criteria": { "status": "due" } }, "out": "row" },
 *     { "id": "each", "action": "for_each", "items": "${row.lines}", "as": "line", "steps": [
 *       { "id": "note", "action": "log", "params": { "message": "${line.sku}" } }
 *     ] }
 *   ]
 * }
 * ```
 */
export interface FlowDocument {
  id?: string;
  version?: string;
  status?: FlowStatus;
  meta: {
    name: string;
    description?: string;
    roles?: Record<string, string[]>;
  };
  variables?: Record<string, unknown>;
  defaults?: { retry?: number; timeoutMs?: number };
  steps: FlowDocumentStep[];
}

const VARIABLE_PATH = '^(?!(?:.*\\.)?(?:__proto__|constructor|prototype)(?:\\.|$))[^.]+(?:\\.[^.]+)*$';

const stepList = { type: 'array', items: { $ref: '#/definitions/step' } };

function requiredFor(action: string, required: string[]) {
  return { if: { required: ['action'], properties: { action: { const: action } } }, then: { required } };
}

const flowDocumentSchema = {
  type: 'object',
  required: ['meta', 'steps'],
  definitions: {
    condition: {
      anyOf: [
        { type: 'boolean' },
        {
          type: 'object',
          required: ['path', 'op'],
          properties: {
            path: { type: 'string', pattern: VARIABLE_PATH },
            op: {
              enum: ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'nin', 'contains', 'startsWith', 'endsWith',
                'exists', 'notExists', 'truthy', 'matches'],
            },
            value: {},
          },
          additionalProperties: false,
        },
        {
          type: 'object',
          required: ['all'],
          properties: { all: { type: 'array', items: { $ref: '#/definitions/condition' } } },
          additionalProperties: false,
        },
        {
          type: 'object',
          required: ['any'],
          properties: { any: { type: 'array', items: { $ref: '#/definitions/condition' } } },
          additionalProperties: false,
        },
        {
          type: 'object',
          required: ['not'],
          properties: { not: { $ref: '#/definitions/condition' } },
          additionalProperties: false,
        },
      ],
    },
    step: {
      type: 'object',
      required: ['id', 'action'],
      properties: {
        id: { type: 'string', minLength: 1 },
        action: { type: 'string', minLength: 1 },
        selector: { type: ['string', 'object'] },
        params: { type: 'object' },
        out: { type: 'string', pattern: VARIABLE_PATH },
        retry: { type: 'integer', minimum: 0 },
        timeoutMs: { type: 'number', exclusiveMinimum: 0 },
        name: { type: 'string' },
        onError: {
          type: 'object',
          properties: {
            continue: { type: 'boolean' },
            recover: { $ref: '#/definitions/step' },
          },
          additionalProperties: false,
        },
        when: { $ref: '#/definitions/condition' },
        steps: stepList,
        else: stepList,
        catch: stepList,
        finally: stepList,
        items: {},
        as: { type: 'string', pattern: '^[A-Za-z_$][\\w$]*$', not: { enum: ['__proto__', 'constructor', 'prototype'] } },
        maxIterations: { type: 'integer', minimum: 1 },
        switch: { type: 'string', pattern: VARIABLE_PATH },
        cases: {
          type: 'array',
          items: {
            type: 'object',
            required: ['value', 'steps'],
            properties: { value: {}, steps: stepList },
            additionalProperties: false,
          },
        },
        default: stepList,
        flow: { type: 'string', minLength: 1 },
      },
      allOf: [
        requiredFor('if', ['when']),
        requiredFor('while', ['when']),
        requiredFor('for_each', ['items']),
        requiredFor('switch', ['switch']),
        requiredFor('subflow', ['flow']),
      ],
    },
  },
  properties: {
    id: { type: 'string', minLength: 1 },
    version: { type: 'string', minLength: 1 },
    status: { enum: ['draft', 'published', 'archived'] },
    meta: {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string', minLength: 1 },
        description: { type: 'string' },
        roles: {
          type: 'object',
          additionalProperties: { type: 'array', items: { type: 'string' } },
        },
      },
    },
    variables: { type: 'object' },
    defaults: {
      type: 'object',
      properties: {
        retry: { type: 'integer', minimum: 0 },
        timeoutMs: { type: 'number', exclusiveMinimum: 0 },
      },
    },
    steps: stepList,
  },
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateDocument = ajv.compile<FlowDocument>(flowDocumentSchema);

function slugify(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'flow';
}

function isFlowOperation(key: string): key is FlowOperation {
  return FLOW_OPERATIONS.some(op => op === key);
}

function isControlType(action: string): action is ControlType {
  return CONTROL_TYPES.some(type => type === action);
}

function toRoleMap(roles: Record<string, string[]> | undefined): RoleMap {
  const result: Partial<Record<FlowOperation, readonly string[]>> = {};
  for (const [key, names] of Object.entries(roles ?? {})) {
    if (isFlowOperation(key)) result[key] = [...names];
  }
  return result;
}

function toSteps(docs: FlowDocumentStep[] | undefined): Step[] {
  return (docs ?? []).map(toStep);
}

function toActionStep(doc: FlowDocumentStep): ActionStep {
  return {
    id: doc.id,
    action: doc.action,
    selector: doc.selector,
    params: doc.params ?? {},
    out: doc.out,
    retry: doc.retry,
    timeoutMs: doc.timeoutMs,
    name: doc.name,
    onError: doc.onError
      ? {
          continue: doc.onError.continue,
          recover: doc.onError.recover ? toActionStep(doc.onError.recover) : undefined,
        }
      : undefined,
  };
}

function toControlBlock(type: ControlType, doc: FlowDocumentStep): ControlBlock {
  switch (type) {
    case 'break':
    case 'continue':
      return { type };
    case 'if':
      return { type, when: doc.when ?? false, then: toSteps(doc.steps), else: doc.else && toSteps(doc.else) };
    case 'while':
      return { type, when: doc.when ?? false, body: toSteps(doc.steps), maxIterations: doc.maxIterations };
    case 'for_each':
      return { type, items: doc.items ?? [], as: doc.as, body: toSteps(doc.steps) };
    case 'try':
      return {
        type,
        body: toSteps(doc.steps),
        catch: doc.catch && toSteps(doc.catch),
        finally: doc.finally && toSteps(doc.finally),
      };
    case 'switch':
      return {
        type,
        value: doc.switch ?? '',
        cases: (doc.cases ?? []).map(c => ({ value: c.value, steps: toSteps(c.steps) })),
        default: doc.default && toSteps(doc.default),
      };
    case 'subflow':
      return { type, flowId: doc.flow ?? '', inputs: doc.params, out: doc.out };
  }
}

function toStep(doc: FlowDocumentStep): Step {
  if (isControlType(doc.action)) {
    return { id: doc.id, name: doc.name, control: toControlBlock(doc.action, doc) };
  }
  return toActionStep(doc);
}

/**
 * Validate raw document data and convert it to a Flow.
 * @throws FlowValidationError when the document or the resulting flow is invalid
 */
export function parseFlowDocument(data: unknown, fallbackId?: string): Flow {
  if (!validateDocument(data)) {
    const issues: ValidationIssue[] = (validateDocument.errors ?? []).map(e => ({
      path: e.instancePath.replace(/^\//, '').replace(/\//g, '.') || '(root)',
      message: e.message ?? 'Invalid',
      severity: 'error',
    }));
    throw new FlowValidationError(fallbackId ?? 'unknown', issues);
  }

  const flow: Flow = {
    id: data.id ?? fallbackId ?? slugify(data.meta.name),
    version: data.version ?? '1',
    name: data.meta.name,
    description: data.meta.description,
    status: data.status ?? 'draft',
    roles: toRoleMap(data.meta.roles),
    approvals: [],
    variables: data.variables,
    defaults: data.defaults,
    steps: data.steps.map(toStep),
  };

  const issues = validateFlow(flow);
  if (issues.some(i => i.severity === 'error')) {
    throw new FlowValidationError(flow.id, issues);
  }
  return flow;
}

/**
 * Read and parse a JSON flow document. The file name (without extension)
 * is the flow id unless the document sets one.
 */
export async function loadFlowDocument(path: string): Promise<Flow> {
  const raw = await readFile(path, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FlowValidationError(basename(path), [{ path: '(root)', message, severity: 'error' }]);
  }
  return parseFlowDocument(data, basename(path, extname(path)));
}
