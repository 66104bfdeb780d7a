import type { ActionHandler, ActionMetadata, ActionCategory } from '../interfaces/action-handler';
import type { ActionRegistry } from '../interfaces/action-registry';
import type { EventBus } from '../interfaces/event-bus';
import { CONTROL_TYPES } from '../types/flow';

export class DefaultActionRegistry implements ActionRegistry {
  private entries = new Map<string, ActionHandler>();

  constructor(private readonly events?: EventBus) {}

  register(action: ActionHandler): void {
    if (!action.name) {
      throw new Error('Action name is required');
    }
    if (CONTROL_TYPES.some(type => type === action.name)) {
      throw new Error(`Action name "${action.name}" is reserved for control steps`);
    }
    if (action.metadata.name !== action.name) {
      throw new Error(`Action "${action.name}" has mismatched metadata name "${action.metadata.name}"`);
    }
    if (this.entries.has(action.name)) {
      throw new Error(`Action "${action.name}" already registered`);
    }
    this.entries.set(action.name, action);
    this.events?.onActionRegistered?.({ name: action.name, category: action.metadata.category });
  }

  registerAll(actions: readonly ActionHandler[]): void {
    actions.forEach(a => this.register(a));
  }

  get(name: string): ActionHandler | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  getMetadata(name: string): ActionMetadata | undefined {
    return this.entries.get(name)?.metadata;
  }

  listActions(category?: ActionCategory): ActionMetadata[] {
    const all = Array.from(this.entries.values()).map(a => a.metadata);
    if (!category) return all;
    return all.filter(m => m.category === category);
  }

  categories(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const meta of this.listActions()) {
      (result[meta.category] ??= []).push(meta.name);
    }
    return result;
  }

  search(query: string): ActionMetadata[] {
    const q = query.toLowerCase();
    return this.listActions().filter(m =>
      m.name.toLowerCase().includes(q) ||
      m.title.toLowerCase().includes(q) ||
      (m.description || '').toLowerCase().includes(q)
    );
  }
}
