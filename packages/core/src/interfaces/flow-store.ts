import type { Flow } from '../types/flow';
import type { ValidationIssue } from '../types/errors';

/**
 * Storage for flow definitions.
 */
export interface FlowStore {
  /** Validate and store (replaces any flow with the same id) */
  save(flow: Flow): Promise<void>;

  get(id: string): Promise<Flow | undefined>;

  has(id: string): Promise<boolean>;

  list(): Promise<Flow[]>;

  /** Validate without storing */
  validate(flow: Flow): ValidationIssue[];
}
