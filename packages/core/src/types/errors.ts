import type { FlowOperation } from './flow';

/**
 * Reason categories carried by failed and skipped RunRecords.
 * Any string is accepted downstream; these are the ones the runtime emits.
 */
export const ReasonCodes = {
  LockBusy: 'LOCK_BUSY',
  UnknownAction: 'UNKNOWN_ACTION',
  PermissionDenied: 'PERMISSION_DENIED',
  ActionError: 'ACTION_ERROR',
  NotFound: 'NOT_FOUND',
  RowNotFound: 'ROW_NOT_FOUND',
  Timeout: 'TIMEOUT',
  InvalidParams: 'INVALID_PARAMS',
  Cancelled: 'CANCELLED',
  ConditionFalse: 'CONDITION_FALSE',
  InvalidVariable: 'INVALID_VARIABLE',
  LoopLimit: 'LOOP_LIMIT',
  SubflowCycle: 'SUBFLOW_CYCLE',
  FlowNotFound: 'FLOW_NOT_FOUND',
  Internal: 'INTERNAL_ERROR',
} as const;

/**
 * Base error for all deskpilot errors.
 */
export class DeskpilotError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'DeskpilotError';
  }
}

/**
 * Flow definition is invalid.
 */
export class FlowValidationError extends DeskpilotError {
  constructor(
    public readonly flowId: string,
    public readonly issues: ValidationIssue[]
  ) {
    super('FLOW_INVALID', `Flow "${flowId}" is invalid: ${issues[0]?.message}`);
    this.name = 'FlowValidationError';
  }
}

export class FlowNotFoundError extends DeskpilotError {
  constructor(public readonly flowId: string) {
    super(ReasonCodes.FlowNotFound, `Flow "${flowId}" not found`);
    this.name = 'FlowNotFoundError';
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
  readonly severity: 'error' | 'warning';
}

// === Locking ===

/**
 * Lock marker already exists.
 */
export class LockBusyError extends DeskpilotError {
  constructor(public readonly path: string) {
    super(ReasonCodes.LockBusy, `Lock "${path}" is already held`);
    this.name = 'LockBusyError';
  }
}

/**
 * Lock marker outlived its staleness threshold.
 */
export class StaleLockError extends DeskpilotError {
  constructor(
    public readonly path: string,
    public readonly ageMs: number
  ) {
    super('STALE_LOCK', `Lock "${path}" is stale (held for ${ageMs}ms)`);
    this.name = 'StaleLockError';
  }
}

// === Dispatch ===

export class UnknownActionError extends DeskpilotError {
  constructor(public readonly action: string) {
    super(ReasonCodes.UnknownAction, `Unknown action "${action}"`);
    this.name = 'UnknownActionError';
  }
}

/**
 * Action-specific failure (element not found, timeout, image not matched...).
 * Handlers may throw it; the dispatcher turns it into a failure result.
 */
export class ActionError extends DeskpilotError {
  constructor(
    code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(code, message);
    this.name = 'ActionError';
  }
}

// === RBAC ===

export class PermissionDeniedError extends DeskpilotError {
  constructor(
    public readonly operation: FlowOperation,
    public readonly role: string,
    public readonly flowId: string
  ) {
    super(
      ReasonCodes.PermissionDenied,
      `Role "${role}" may not ${operation} flow "${flowId}"`
    );
    this.name = 'PermissionDeniedError';
  }
}

// === Configuration ===

export class ConfigurationError extends DeskpilotError {
  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Variable path with an empty segment or one that reaches a prototype.
 */
export class InvalidVariableNameError extends DeskpilotError {
  constructor(public readonly path: string) {
    super(ReasonCodes.InvalidVariable, `Invalid variable name "${path}"`);
    this.name = 'InvalidVariableNameError';
  }
}
