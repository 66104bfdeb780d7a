import { setTimeout as sleep } from 'node:timers/promises';
import type { ActionStep, ControlStep, Flow, FlowOperation, Step } from '../types/flow';
import type { RunRecord, RunSource, RunStatus, SelectorOutcome } from '../types/run';
import type { ActionResult } from '../types/result';
import { Result } from '../types/result';
import type { ActionRegistry } from '../interfaces/action-registry';
import type { FlowStore } from '../interfaces/flow-store';
import type { LockManager } from '../interfaces/lock-manager';
import type { EventBus } from '../interfaces/event-bus';
import type { RunRecorder } from '../interfaces/run-recorder';
import {
  DeskpilotError,
  FlowNotFoundError,
  InvalidVariableNameError,
  PermissionDeniedError,
  ReasonCodes,
  UnknownActionError,
} from '../types/errors';
import { generateId, now } from '../utils/id';
import { ActionDispatcher } from './action-dispatcher';
import { ExecutionContext } from './context';
import { evaluateCondition } from './conditions';
import { interpolate, resolveParams, resolveSelector, selectorKey } from './variable-resolver';

export const DEFAULT_RUN_LOCK_PATH = 'runs/runner.lock';

export const DEFAULT_MAX_ITERATIONS = 1000;

export type RbacDefault = 'allow' | 'deny';

export interface RunnerOptions {
  /** Global run lock (default: runs/runner.lock) */
  lockPath?: string;
  /** Outcome when an operation has no entry in the flow's role map (default: deny) */
  rbacDefault?: RbacDefault;
  events?: EventBus;
  /** Receive every reported RunRecord */
  recorders?: RunRecorder[];
  /** How often a paused run re-checks its flags (default: 100) */
  pausePollMs?: number;
}

export interface ExecuteOptions {
  source?: RunSource;
  jobId?: string;
  /**
   * What a busy run lock means for this call.
   * - `'fail'` (default): a reported failed run
   * - `'skip'`: an unreported skipped record (scheduler firings)
   */
  onLockBusy?: 'fail' | 'skip';
}

/**
 * Produces the edited flow. Runs only after the edit permission check.
 */
export type FlowEdit = (flow: Flow) => Flow | Promise<Flow>;

interface RunState {
  readonly selectorOutcomes: SelectorOutcome[];
  stepsCompleted: number;
}

interface RunOutcome {
  status: RunStatus;
  failedStepId?: string;
  reason?: string;
  message?: string;
}

/**
 * Where a step list is running: the flow it belongs to (a subflow while
 * one is active) and the variables it sees.
 */
interface Frame {
  readonly flow: Flow;
  readonly context: ExecutionContext;
  readonly signal: AbortSignal;
  readonly state: RunState;
  readonly actorRole: string;
  /** Flow ids from the top-level flow down to this one */
  readonly lineage: readonly string[];
}

/**
 * How a step list ended.
 */
type BlockExit =
  | { readonly kind: 'completed' }
  | { readonly kind: 'break' }
  | { readonly kind: 'continue' }
  | { readonly kind: 'failed'; readonly outcome: RunOutcome };

const COMPLETED: BlockExit = { kind: 'completed' };

/**
 * Store a step output; an unusable variable name fails the step.
 */
function bindOutput(context: ExecutionContext, name: string, value: unknown): ActionResult {
  try {
    context.set(name, value);
  } catch (err) {
    if (!(err instanceof InvalidVariableNameError)) throw err;
    return Result.failure(err.code, err.message);
  }
  return Result.success(value);
}

function failed(stepId: string, reason: string, message: string): BlockExit {
  return { kind: 'failed', outcome: { status: 'failed', failedStepId: stepId, reason, message } };
}

interface ActiveRun {
  readonly runId: string;
  readonly controller: AbortController;
}

/**
 * Executes flows one at a time, process-wide.
 *
 * Every run holds the global run lock from before its first step until
 * after its last; a second caller gets LOCK_BUSY instead of waiting.
 * Control flags (stop, pause, skip) are cooperative and observed only
 * between steps, including the steps nested in control blocks.
 */
export class Runner {
  readonly lockPath: string;
  private readonly rbacDefault: RbacDefault;
  private readonly events?: EventBus;
  private readonly recorders: RunRecorder[];
  private readonly pausePollMs: number;
  private readonly dispatcher: ActionDispatcher;

  private active: ActiveRun | null = null;
  private aborted = false;
  private paused = false;
  private skipNext = false;

  constructor(
    actions: ActionRegistry,
    private readonly flows: FlowStore,
    private readonly locks: LockManager,
    options: RunnerOptions = {}
  ) {
    this.dispatcher = new ActionDispatcher(actions);
    this.lockPath = options.lockPath ?? DEFAULT_RUN_LOCK_PATH;
    this.rbacDefault = options.rbacDefault ?? 'deny';
    this.events = options.events;
    this.recorders = [...(options.recorders ?? [])];
    this.pausePollMs = options.pausePollMs ?? 100;
  }

  // ── Execution ─────────────────────────────────────────────────────

  /**
   * Run a flow to completion.
   *
   * @throws PermissionDeniedError when `actorRole` may not run the flow
   */
  async execute(
    flow: Flow,
    initialVars: Record<string, unknown> = {},
    actorRole: string,
    options: ExecuteOptions = {}
  ): Promise<RunRecord> {
    this.authorize(flow, 'run', actorRole);

    const runId = generateId();
    const startedAt = now();
    const source = options.source ?? 'manual';
    const base = { runId, flowId: flow.id, flowName: flow.name, jobId: options.jobId, source, startedAt };

    const lock = await this.locks.tryAcquire(this.lockPath);
    if (!lock) {
      const skipped = options.onLockBusy === 'skip';
      const record = this.buildRecord(base, {
        status: skipped ? 'skipped' : 'failed',
        reason: ReasonCodes.LockBusy,
        message: `Run lock "${this.lockPath}" is held by another run`,
      }, { selectorOutcomes: [], stepsCompleted: 0 });
      if (!skipped) {
        this.events?.onRunFailed?.({ runId, flowId: flow.id, reason: ReasonCodes.LockBusy, message: record.message });
        await this.report(record);
      }
      return record;
    }

    const controller = new AbortController();
    this.active = { runId, controller };
    this.aborted = false;
    this.paused = false;
    this.skipNext = false;

    const state: RunState = { selectorOutcomes: [], stepsCompleted: 0 };
    let outcome: RunOutcome;

    try {
      this.events?.onRunStarted?.({ runId, flowId: flow.id, source, jobId: options.jobId });
      const context = new ExecutionContext(runId, flow.id, { ...flow.variables, ...initialVars });
      const exit = await this.runSteps(flow.steps, {
        flow,
        context,
        signal: controller.signal,
        state,
        actorRole,
        lineage: [flow.id],
      });
      outcome = exit.kind === 'failed' ? exit.outcome : { status: 'success' };
    } catch (err) {
      console.error(`[Runner] Run ${runId} of flow "${flow.id}" crashed:`, err);
      outcome = {
        status: 'failed',
        reason: err instanceof DeskpilotError ? err.code : ReasonCodes.Internal,
        message: err instanceof Error ? err.message : String(err),
      };
    } finally {
      this.active = null;
      await lock.release();
    }

    const record = this.buildRecord(base, outcome, state);

    if (record.status === 'success') {
      this.events?.onRunCompleted?.({ runId, flowId: flow.id, status: record.status, durationMs: record.durationMs });
    } else {
      if (record.reason === ReasonCodes.Cancelled) {
        this.events?.onRunCancelled?.({ runId, flowId: flow.id, stepsCompleted: state.stepsCompleted });
      }
      this.events?.onRunFailed?.({
        runId,
        flowId: flow.id,
        stepId: record.failedStepId,
        reason: record.reason ?? ReasonCodes.Internal,
        message: record.message,
      });
    }

    await this.report(record);
    return record;
  }

  /**
   * Look up a stored flow and run it.
   *
   * @throws FlowNotFoundError
   */
  async executeById(
    flowId: string,
    initialVars: Record<string, unknown>,
    actorRole: string,
    options?: ExecuteOptions
  ): Promise<RunRecord> {
    const flow = await this.flows.get(flowId);
    if (!flow) throw new FlowNotFoundError(flowId);
    return this.execute(flow, initialVars, actorRole, options);
  }

  /**
   * Ask the active run to stop at the next step boundary.
   * The action in flight is not interrupted; its abort signal fires so
   * long waits can end early. Returns false when nothing is running.
   */
  stop(): boolean {
    if (!this.active) return false;
    this.aborted = true;
    this.active.controller.abort();
    return true;
  }

  pause(): boolean {
    if (!this.active) return false;
    this.paused = true;
    return true;
  }

  resume(): void {
    this.paused = false;
  }

  /**
   * Skip the next step of the active run.
   */
  skip(): boolean {
    if (!this.active) return false;
    this.skipNext = true;
    return true;
  }

  isRunning(): boolean {
    return this.active !== null;
  }

  isPaused(): boolean {
    return this.paused;
  }

  /** Id of the run in progress, if any */
  currentRunId(): string | undefined {
    return this.active?.runId;
  }

  addRecorder(recorder: RunRecorder): void {
    this.recorders.push(recorder);
  }

  // ── Flow operations (RBAC-gated) ──────────────────────────────────

  can(flow: Flow, operation: FlowOperation, actorRole: string): boolean {
    const allowed = flow.roles[operation];
    if (!allowed) return this.rbacDefault === 'allow';
    return allowed.includes(actorRole);
  }

  viewFlow(flow: Flow, actorRole: string): Flow {
    this.authorize(flow, 'view', actorRole);
    return flow;
  }

  /**
   * Apply `edit` and persist the result. Nothing runs when the role check fails.
   */
  async editFlow(flow: Flow, actorRole: string, edit: FlowEdit): Promise<Flow> {
    this.authorize(flow, 'edit', actorRole);

    const updated = await edit(flow);
    if (updated.id !== flow.id) {
      throw new DeskpilotError('FLOW_ID_CHANGED', `Edit may not change flow id "${flow.id}" to "${updated.id}"`);
    }

    await this.flows.save(updated);
    this.events?.onFlowEdited?.({ flowId: updated.id, role: actorRole, version: updated.version });
    return updated;
  }

  async publishFlow(flow: Flow, actorRole: string): Promise<Flow> {
    this.authorize(flow, 'publish', actorRole);

    const updated: Flow = { ...flow, status: 'published' };
    await this.flows.save(updated);
    this.events?.onFlowPublished?.({ flowId: flow.id, role: actorRole, version: flow.version });
    return updated;
  }

  async approveFlow(flow: Flow, actorRole: string): Promise<Flow> {
    this.authorize(flow, 'approve', actorRole);

    const updated: Flow = { ...flow, approvals: [...flow.approvals, { role: actorRole, at: now() }] };
    await this.flows.save(updated);
    this.events?.onFlowApproved?.({ flowId: flow.id, role: actorRole, approvals: updated.approvals.length });
    return updated;
  }

  // ── Internal ──────────────────────────────────────────────────────

  private authorize(flow: Flow, operation: FlowOperation, actorRole: string): void {
    if (!this.can(flow, operation, actorRole)) {
      throw new PermissionDeniedError(operation, actorRole, flow.id);
    }
  }

  /**
   * Wait out a pause, then report a stop as a CANCELLED exit.
   */
  private async checkpoint(stepId: string): Promise<BlockExit | undefined> {
    while (this.paused && !this.aborted) {
      await sleep(this.pausePollMs);
    }
    if (this.aborted) {
      return failed(stepId, ReasonCodes.Cancelled, `Stopped before step "${stepId}"`);
    }
    return undefined;
  }

  private async runSteps(steps: readonly Step[], frame: Frame): Promise<BlockExit> {
    for (const step of steps) {
      const stopped = await this.checkpoint(step.id);
      if (stopped) return stopped;

      if (this.skipNext) {
        this.skipNext = false;
        continue;
      }

      const exit = step.control ? await this.runControl(step, frame) : await this.runAction(step, frame);
      if (exit.kind !== 'completed') return exit;
    }
    return COMPLETED;
  }

  private async runAction(step: ActionStep, frame: Frame): Promise<BlockExit> {
    const result = await this.runStep(step, frame);
    if (result.outcome === 'success') {
      frame.state.stepsCompleted++;
      return COMPLETED;
    }

    const error = result.error ?? { code: ReasonCodes.ActionError, message: 'Action failed' };
    if (error.code === ReasonCodes.Cancelled) {
      return failed(step.id, error.code, error.message);
    }

    if (step.onError?.recover) {
      const recovery = await this.runStep(step.onError.recover, frame);
      if (recovery.outcome === 'failure') {
        console.error(
          `[Runner] Recovery step "${step.onError.recover.id}" for "${step.id}" failed:`,
          recovery.error?.message
        );
      }
    }

    if (step.onError?.continue) {
      console.warn(`[Runner] Step "${step.id}" failed (${error.code}), continuing`);
      return COMPLETED;
    }

    return failed(step.id, error.code, error.message);
  }

  private async runControl(step: ControlStep, frame: Frame): Promise<BlockExit> {
    const block = step.control;
    const { context } = frame;

    this.events?.onStepStarted?.({ runId: context.runId, stepId: step.id, action: block.type });
    const started = now();

    let exit: BlockExit = COMPLETED;
    switch (block.type) {
      case 'break':
      case 'continue':
        exit = { kind: block.type };
        break;

      case 'if': {
        const branch = evaluateCondition(block.when, context.toObject()) ? block.then : block.else ?? [];
        exit = await this.runSteps(branch, frame);
        break;
      }

      case 'switch': {
        const actual = context.get(block.value);
        const vars = context.toObject();
        const match = block.cases.find(c => interpolate(c.value, vars) === actual);
        exit = await this.runSteps(match ? match.steps : block.default ?? [], frame);
        break;
      }

      case 'while': {
        const max = block.maxIterations ?? DEFAULT_MAX_ITERATIONS;
        for (let iteration = 1; evaluateCondition(block.when, context.toObject()); iteration++) {
          if (iteration > max) {
            exit = failed(step.id, ReasonCodes.LoopLimit, `Loop "${step.id}" exceeded ${max} iterations`);
            break;
          }
          const stopped = await this.checkpoint(step.id);
          if (stopped) {
            exit = stopped;
            break;
          }
          const body = await this.runSteps(block.body, frame);
          if (body.kind === 'break') break;
          if (body.kind === 'failed') {
            exit = body;
            break;
          }
        }
        break;
      }

      case 'for_each': {
        const resolved = interpolate(block.items, context.toObject());
        if (!Array.isArray(resolved)) {
          exit = failed(step.id, ReasonCodes.InvalidParams, `Loop "${step.id}" needs an array of items`);
          break;
        }
        const items: readonly unknown[] = resolved;
        for (const [index, item] of items.entries()) {
          const stopped = await this.checkpoint(step.id);
          if (stopped) {
            exit = stopped;
            break;
          }
          context.pushScope({ [block.as ?? 'item']: item, index });
          let body: BlockExit;
          try {
            body = await this.runSteps(block.body, frame);
          } finally {
            context.popScope();
          }
          if (body.kind === 'break') break;
          if (body.kind === 'failed') {
            exit = body;
            break;
          }
        }
        break;
      }

      case 'try': {
        exit = await this.runSteps(block.body, frame);
        if (exit.kind === 'failed' && block.catch && exit.outcome.reason !== ReasonCodes.Cancelled) {
          const { failedStepId, reason, message } = exit.outcome;
          context.pushScope({ error: { stepId: failedStepId, code: reason, message } });
          try {
            exit = await this.runSteps(block.catch, frame);
          } finally {
            context.popScope();
          }
        }
        if (block.finally) {
          const cleanup = await this.runSteps(block.finally, frame);
          if (cleanup.kind !== 'completed') exit = cleanup;
        }
        break;
      }

      case 'subflow':
        exit = await this.runSubflow(step.id, block.flowId, block.inputs, block.out, frame);
        break;
    }

    this.events?.onStepCompleted?.({
      runId: context.runId,
      stepId: step.id,
      action: block.type,
      outcome: exit.kind === 'failed' ? 'failure' : 'success',
      durationMs: now() - started,
    });
    return exit;
  }

  private async runSubflow(
    stepId: string,
    flowId: string,
    inputs: Readonly<Record<string, unknown>> | undefined,
    out: string | undefined,
    frame: Frame
  ): Promise<BlockExit> {
    if (frame.lineage.includes(flowId)) {
      return failed(stepId, ReasonCodes.SubflowCycle, `Subflow "${flowId}" is already running (${frame.lineage.join(' > ')})`);
    }

    const child = await this.flows.get(flowId);
    if (!child) return failed(stepId, ReasonCodes.FlowNotFound, `Flow "${flowId}" not found`);
    if (!this.can(child, 'run', frame.actorRole)) {
      return failed(stepId, ReasonCodes.PermissionDenied, `Role "${frame.actorRole}" may not run flow "${flowId}"`);
    }

    const vars = frame.context.toObject();
    const context = new ExecutionContext(frame.context.runId, child.id, {
      ...child.variables,
      ...vars,
      ...resolveParams(inputs ?? {}, vars),
    });

    const exit = await this.runSteps(child.steps, {
      ...frame,
      flow: child,
      context,
      lineage: [...frame.lineage, child.id],
    });
    if (exit.kind === 'failed') return exit;
    if (out) {
      const bound = bindOutput(frame.context, out, context.toObject());
      if (bound.outcome === 'failure') {
        return failed(stepId, bound.error?.code ?? ReasonCodes.InvalidVariable, bound.error?.message ?? '');
      }
    }
    return COMPLETED;
  }

  private async runStep(step: ActionStep, frame: Frame): Promise<ActionResult> {
    const { flow, context, signal, state } = frame;
    const vars = context.toObject();
    const selector = resolveSelector(step.selector, vars);
    const params = resolveParams(step.params, vars);
    const maxAttempts = (step.retry ?? flow.defaults?.retry ?? 0) + 1;
    const timeoutMs = step.timeoutMs ?? flow.defaults?.timeoutMs;

    this.events?.onStepStarted?.({ runId: context.runId, stepId: step.id, action: step.action });
    const stepStart = now();

    let result: ActionResult = Result.failure(ReasonCodes.ActionError, 'Step did not run');
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1 && this.aborted) {
        result = Result.failure(ReasonCodes.Cancelled, `Stopped before retrying step "${step.id}"`);
        break;
      }

      const attemptStart = now();
      try {
        result = await this.dispatcher.dispatch(step.action, selector, params, context, signal);
      } catch (err) {
        if (!(err instanceof UnknownActionError)) throw err;
        result = Result.failure(err.code, err.message);
        break;
      }

      if (result.outcome === 'success' && timeoutMs !== undefined && now() - attemptStart > timeoutMs) {
        result = Result.failure(ReasonCodes.Timeout, `Step "${step.id}" exceeded ${timeoutMs}ms`);
      }

      if (result.outcome === 'success') break;

      if (attempt < maxAttempts && !this.aborted) {
        this.events?.onStepRetry?.({
          runId: context.runId,
          stepId: step.id,
          attempt,
          maxAttempts,
          error: {
            code: result.error?.code ?? ReasonCodes.ActionError,
            message: result.error?.message ?? '',
          },
        });
      }
    }

    if (selector !== undefined && selector !== '') {
      state.selectorOutcomes.push({
        stepId: step.id,
        selector: selectorKey(selector),
        ok: result.outcome === 'success',
      });
    }

    if (result.outcome === 'success' && step.out) {
      result = bindOutput(context, step.out, result.output);
    }

    this.events?.onStepCompleted?.({
      runId: context.runId,
      stepId: step.id,
      action: step.action,
      outcome: result.outcome,
      durationMs: now() - stepStart,
    });

    return result;
  }

  private buildRecord(
    base: Pick<RunRecord, 'runId' | 'flowId' | 'flowName' | 'jobId' | 'source' | 'startedAt'>,
    outcome: RunOutcome,
    state: RunState
  ): RunRecord {
    const endedAt = now();
    return {
      ...base,
      endedAt,
      durationMs: endedAt - base.startedAt,
      status: outcome.status,
      failedStepId: outcome.failedStepId,
      reason: outcome.reason,
      message: outcome.message,
      selectorOutcomes: [...state.selectorOutcomes],
      stepsCompleted: state.stepsCompleted,
    };
  }

  private async report(record: RunRecord): Promise<void> {
    for (const recorder of this.recorders) {
      try {
        await recorder.record(record);
      } catch (err) {
        console.error(`[Runner] Recorder failed for run ${record.runId}:`, err);
      }
    }
  }
}
