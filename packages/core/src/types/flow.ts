/**
 * Flow status for draft/publish lifecycle.
 */
export type FlowStatus = 'draft' | 'published' | 'archived';

/**
 * Operations gated by a flow's role map.
 */
export type FlowOperation = 'view' | 'edit' | 'publish' | 'approve' | 'run';

export const FLOW_OPERATIONS: readonly FlowOperation[] = ['view', 'edit', 'publish', 'approve', 'run'];

/**
 * Operation name -> role names allowed to perform it.
 * An absent key falls back to the runner's RBAC default.
 */
export type RoleMap = Partial<Record<FlowOperation, readonly string[]>>;

/**
 * Action-specific locator. Strings are passed through as-is
 * (CSS selectors, element paths); objects carry structured locators.
 */
export type Selector = string | Readonly<Record<string, unknown>>;

export interface FlowApproval {
  readonly role: string;
  readonly at: number;
}

/**
 * A Flow is an ordered automation procedure.
 */
export interface Flow {
  /** Unique identifier (kebab-case) */
  readonly id: string;

  /** Semantic version */
  readonly version: string;

  /** Human-readable name */
  readonly name: string;

  /** Description for documentation/UI */
  readonly description?: string;

  /** Steps, executed strictly in this order */
  readonly steps: readonly Step[];

  /** Per-operation role permissions */
  readonly roles: RoleMap;

  /** Flow lifecycle status */
  readonly status: FlowStatus;

  /** Approvals collected so far */
  readonly approvals: readonly FlowApproval[];

  /** Default variable values, overridden by run inputs */
  readonly variables?: Readonly<Record<string, unknown>>;

  readonly defaults?: FlowDefaults;
}

export interface FlowDefaults {
  /** Extra attempts for steps that don't set their own */
  readonly retry?: number;

  /** Timeout for steps that don't set their own */
  readonly timeoutMs?: number;
}

/**
 * A step is either one action invocation or a control block
 * wrapping nested step lists.
 */
export type Step = ActionStep | ControlStep;

export interface ActionStep {
  /** Unique within the flow */
  readonly id: string;

  /** Action name (registry key) */
  readonly action: string;

  /** Where/what to operate on */
  readonly selector?: Selector;

  /** Action parameters; `${var}` references are substituted before dispatch */
  readonly params: Readonly<Record<string, unknown>>;

  /** Variable that receives the action's output */
  readonly out?: string;

  /** Extra attempts after a failure */
  readonly retry?: number;

  /** Attempts returning later than this count as timed out */
  readonly timeoutMs?: number;

  readonly onError?: StepErrorPolicy;

  /** Optional display name */
  readonly name?: string;

  readonly control?: undefined;
}

export interface ControlStep {
  readonly id: string;
  readonly control: ControlBlock;
  readonly name?: string;
  readonly action?: undefined;
}

/**
 * What to do when a step fails after its retries.
 */
export interface StepErrorPolicy {
  /** Keep going with the next step instead of failing the run */
  readonly continue?: boolean;

  /** Step to run before continuing or failing */
  readonly recover?: ActionStep;
}

// ── Control blocks ──────────────────────────────────────────────────

/**
 * Action names a flow document uses for control blocks.
 * The registry refuses actions with these names.
 */
export const CONTROL_TYPES = ['if', 'while', 'for_each', 'try', 'switch', 'subflow', 'break', 'continue'] as const;

export type ControlType = (typeof CONTROL_TYPES)[number];

export type ControlBlock =
  | IfBlock
  | WhileBlock
  | ForEachBlock
  | TryBlock
  | SwitchBlock
  | SubflowBlock
  | LoopJump;

export interface IfBlock {
  readonly type: 'if';
  readonly when: Condition;
  readonly then: readonly Step[];
  readonly else?: readonly Step[];
}

export interface WhileBlock {
  readonly type: 'while';
  readonly when: Condition;
  readonly body: readonly Step[];
  /** The loop fails with LOOP_LIMIT past this many iterations (default: 1000) */
  readonly maxIterations?: number;
}

/**
 * Runs `body` once per element of `items`, with the element bound to
 * `as` (default `item`) and its position to `index` in a local scope.
 */
export interface ForEachBlock {
  readonly type: 'for_each';
  /** An array, or a `${var}` reference resolving to one */
  readonly items: unknown;
  readonly as?: string;
  readonly body: readonly Step[];
}

/**
 * With `catch` present, a failure in `body` is handled: the catch steps
 * run with `error` bound to `{ stepId, code, message }`. Without it the
 * failure propagates once `finally` has run. Cancellation is never caught.
 */
export interface TryBlock {
  readonly type: 'try';
  readonly body: readonly Step[];
  readonly catch?: readonly Step[];
  readonly finally?: readonly Step[];
}

export interface SwitchBlock {
  readonly type: 'switch';
  /** Variable path whose value selects the case */
  readonly value: string;
  readonly cases: readonly SwitchCase[];
  readonly default?: readonly Step[];
}

export interface SwitchCase {
  readonly value: unknown;
  readonly steps: readonly Step[];
}

/**
 * Runs a stored flow's steps inside the current run. The child context
 * starts from the child's variables, the caller's variables, then `inputs`.
 */
export interface SubflowBlock {
  readonly type: 'subflow';
  readonly flowId: string;
  readonly inputs?: Readonly<Record<string, unknown>>;
  /** Receives the child's variables when it completes */
  readonly out?: string;
}

/** Leaves (`break`) or restarts (`continue`) the innermost loop */
export interface LoopJump {
  readonly type: 'break' | 'continue';
}

// ── Conditions ──────────────────────────────────────────────────────

export type ConditionOp =
  | 'eq' | 'neq'
  | 'gt' | 'gte' | 'lt' | 'lte'
  | 'in' | 'nin'
  | 'contains' | 'startsWith' | 'endsWith'
  | 'exists' | 'notExists' | 'truthy'
  | 'matches';

export interface Comparison {
  /** Variable path (`row.status`) */
  readonly path: string;
  readonly op: ConditionOp;
  /** Compared value; `${var}` references are substituted first */
  readonly value?: unknown;
}

export type Condition =
  | boolean
  | Comparison
  | { readonly all: readonly Condition[] }
  | { readonly any: readonly Condition[] }
  | { readonly not: Condition };
