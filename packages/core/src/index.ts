// Types
export type {
  Flow,
  Step,
  ActionStep,
  ControlStep,
  ControlBlock,
  ControlType,
  IfBlock,
  WhileBlock,
  ForEachBlock,
  TryBlock,
  SwitchBlock,
  SwitchCase,
  SubflowBlock,
  LoopJump,
  Condition,
  Comparison,
  ConditionOp,
  StepErrorPolicy,
  FlowStatus,
  FlowOperation,
  FlowApproval,
  FlowDefaults,
  RoleMap,
  Selector,
} from './types/flow';
export { FLOW_OPERATIONS, CONTROL_TYPES } from './types/flow';
export type { RunRecord, RunStatus, RunSource, SelectorOutcome } from './types/run';
export type { ActionResult, ActionFailure } from './types/result';
export { Result } from './types/result';
export {
  DeskpilotError,
  FlowValidationError,
  FlowNotFoundError,
  LockBusyError,
  StaleLockError,
  UnknownActionError,
  ActionError,
  PermissionDeniedError,
  ConfigurationError,
  InvalidVariableNameError,
  ReasonCodes,
} from './types/errors';
export type { ValidationIssue } from './types/errors';

// Interfaces
export type {
  ActionHandler,
  ActionMetadata,
  ActionCategory,
  ActionCall,
  InvokeAction,
  JSONSchema,
  JSONSchemaTypeName,
} from './interfaces/action-handler';
export type { ActionRegistry } from './interfaces/action-registry';
export type { LockManager, LockHandle, LockStamp } from './interfaces/lock-manager';
export type { FlowStore } from './interfaces/flow-store';
export type { RunRecorder, RunLog, RunQuery } from './interfaces/run-recorder';
export type { EventBus } from './interfaces/event-bus';

// Implementations
export { DefaultActionRegistry } from './impl/action-registry';
export { FileLockManager, withLock, DEFAULT_STALE_AFTER_MS, type FileLockOptions } from './impl/file-lock';
export { MemoryLockManager } from './impl/memory-lock';
export { MemoryFlowStore } from './impl/memory-flow-store';
export { MemoryRunLog } from './impl/memory-run-log';
export {
  EventDispatcher,
  type EventDispatcherOptions,
  type EventType,
  type DispatchedEvent,
  type EventListener,
} from './impl/event-dispatcher';

// Engine
export {
  Runner,
  DEFAULT_RUN_LOCK_PATH,
  DEFAULT_MAX_ITERATIONS,
  type RunnerOptions,
  type ExecuteOptions,
  type FlowEdit,
  type RbacDefault,
} from './engine/runner';
export { ActionDispatcher, toFailureResult } from './engine/action-dispatcher';
export { ExecutionContext } from './engine/context';
export { interpolate, resolveParams, resolveSelector, selectorKey } from './engine/variable-resolver';
export { evaluateCondition } from './engine/conditions';

// Config
export { resolveConfig, DEFAULT_CONFIG, type DeskpilotConfig } from './config';

// Utils
export { generateId, now, getPath, setPath, isRecord, isSafePath } from './utils/id';
export { validateFlow } from './utils/validation';
export {
  parseFlowDocument,
  loadFlowDocument,
  type FlowDocument,
  type FlowDocumentStep,
} from './utils/flow-document';
