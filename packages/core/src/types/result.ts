/**
 * Result returned by an ActionHandler.
 * This is the ONLY way actions communicate with the runner.
 */
export interface ActionResult {
  /** What happened */
  readonly outcome: 'success' | 'failure';

  /** Value stored under the step's `out` variable */
  readonly output?: unknown;

  /** Error info (for failure) */
  readonly error?: ActionFailure;
}

export interface ActionFailure {
  readonly code: string;
  readonly message: string;
  readonly details?: unknown;
}

/**
 * Helper functions for creating results.
 */
export const Result = {
  success(output?: unknown): ActionResult {
    return { outcome: 'success', output };
  },

  failure(code: string, message: string, details?: unknown): ActionResult {
    return { outcome: 'failure', error: { code, message, details } };
  },
} as const;
