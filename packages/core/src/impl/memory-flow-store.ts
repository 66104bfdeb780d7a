import type { Flow } from '../types/flow';
import type { FlowStore } from '../interfaces/flow-store';
import type { ValidationIssue } from '../types/errors';
import { FlowValidationError } from '../types/errors';
import { validateFlow } from '../utils/validation';

/**
 * In-memory flow storage. Keeps the latest saved definition per id.
 */
export class MemoryFlowStore implements FlowStore {
  private flows = new Map<string, Flow>();

  constructor(initial: readonly Flow[] = []) {
    for (const flow of initial) {
      this.put(flow);
    }
  }

  async save(flow: Flow): Promise<void> {
    this.put(flow);
  }

  async get(id: string): Promise<Flow | undefined> {
    return this.flows.get(id);
  }

  async has(id: string): Promise<boolean> {
    return this.flows.has(id);
  }

  async list(): Promise<Flow[]> {
    return [...this.flows.values()];
  }

  validate(flow: Flow): ValidationIssue[] {
    return validateFlow(flow);
  }

  private put(flow: Flow): void {
    const issues = this.validate(flow);
    if (issues.some(i => i.severity === 'error')) {
      throw new FlowValidationError(flow.id, issues);
    }
    this.flows.set(flow.id, flow);
  }
}
