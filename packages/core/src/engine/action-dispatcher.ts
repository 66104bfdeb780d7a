import type { ActionRegistry } from '../interfaces/action-registry';
import type { ActionCall, ActionHandler } from '../interfaces/action-handler';
import type { Selector } from '../types/flow';
import type { ActionResult } from '../types/result';
import { Result } from '../types/result';
import { ActionError, DeskpilotError, ReasonCodes, UnknownActionError } from '../types/errors';
import type { ExecutionContext } from './context';

/**
 * Convert anything an action throws into a failure result.
 */
export function toFailureResult(err: unknown): ActionResult {
  if (err instanceof ActionError) {
    return Result.failure(err.code, err.message, err.details);
  }
  if (err instanceof DeskpilotError) {
    return Result.failure(err.code, err.message);
  }
  if (err instanceof Error) {
    return Result.failure(ReasonCodes.ActionError, err.message);
  }
  return Result.failure(ReasonCodes.ActionError, String(err));
}

/**
 * Resolves actions by name and invokes them.
 */
export class ActionDispatcher {
  constructor(private readonly registry: ActionRegistry) {}

  /**
   * @throws UnknownActionError when the name isn't registered
   */
  resolve(name: string): ActionHandler {
    const action = this.registry.get(name);
    if (!action) throw new UnknownActionError(name);
    return action;
  }

  /**
   * Invoke an action. Unknown names throw UnknownActionError; anything the
   * action itself throws comes back as a failure result.
   */
  async dispatch(
    name: string,
    selector: Selector | undefined,
    params: Record<string, unknown>,
    context: ExecutionContext,
    signal?: AbortSignal
  ): Promise<ActionResult> {
    const action = this.resolve(name);

    const call: ActionCall = {
      selector,
      params,
      context,
      signal,
      invoke: (nested, nestedSelector, nestedParams) =>
        this.dispatch(nested, nestedSelector, nestedParams, context, signal),
    };

    try {
      return await action.execute(call);
    } catch (err) {
      return toFailureResult(err);
    }
  }
}
