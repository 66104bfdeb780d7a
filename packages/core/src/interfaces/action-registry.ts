import type { ActionHandler, ActionMetadata, ActionCategory } from './action-handler';

/**
 * Registry of action handlers.
 *
 * Whatever `listActions()` advertises is exactly what `get()` resolves.
 * There is no hidden-but-callable state: to hide an action, unregister it.
 */
export interface ActionRegistry {
  /** Register an action (throws on duplicate names) */
  register(action: ActionHandler): void;

  registerAll(actions: readonly ActionHandler[]): void;

  get(name: string): ActionHandler | undefined;

  has(name: string): boolean;

  /** All registered names, in registration order */
  names(): string[];

  unregister(name: string): boolean;

  getMetadata(name: string): ActionMetadata | undefined;

  /** Metadata advertised to end users, optionally for one category */
  listActions(category?: ActionCategory): ActionMetadata[];

  /** Names grouped by category */
  categories(): Record<string, string[]>;

  /** Search by name, title, or description */
  search(query: string): ActionMetadata[];
}
