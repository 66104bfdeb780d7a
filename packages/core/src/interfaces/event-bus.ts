import type { RunSource, RunStatus } from '../types/run';

/**
 * Optional event publishing.
 * Every lifecycle transition in the runtime emits an event.
 * All methods are optional: subscribe only to what you need.
 *
 * Categories:
 * - Run lifecycle: start, complete, fail, cancel
 * - Step lifecycle: start, complete, retry
 * - Job lifecycle: fire, skip, complete, fail
 * - Locks: acquire, release, stale clear
 * - Flow store: edit, publish, approve
 * - Action registry: register
 */
export interface EventBus {
  // ── Run Lifecycle ─────────────────────────────────────────────────
  onRunStarted?(e: { runId: string; flowId: string; source: RunSource; jobId?: string }): void;
  onRunCompleted?(e: { runId: string; flowId: string; status: RunStatus; durationMs: number }): void;
  onRunFailed?(e: { runId: string; flowId: string; stepId?: string; reason: string; message?: string }): void;

  /**
   * Emitted when a run stops at a step boundary after `stop()`.
   */
  onRunCancelled?(e: { runId: string; flowId: string; stepsCompleted: number }): void;

  // ── Step Lifecycle ────────────────────────────────────────────────
  onStepStarted?(e: { runId: string; stepId: string; action: string }): void;
  onStepCompleted?(e: {
    runId: string;
    stepId: string;
    action: string;
    outcome: 'success' | 'failure';
    durationMs: number;
  }): void;
  onStepRetry?(e: {
    runId: string;
    stepId: string;
    attempt: number;
    maxAttempts: number;
    error: { code: string; message: string };
  }): void;

  // ── Job Lifecycle ─────────────────────────────────────────────────
  onJobFired?(e: { jobId: string; at: number }): void;

  /**
   * Emitted when a due job does not run: a condition was false, or a
   * previous firing still holds the job lock.
   */
  onJobSkipped?(e: { jobId: string; at: number; reason: string }): void;
  onJobCompleted?(e: { jobId: string; status: RunStatus; durationMs: number }): void;
  onJobFailed?(e: { jobId: string; error: { code: string; message: string } }): void;

  // ── Locks ─────────────────────────────────────────────────────────
  onLockAcquired?(e: { path: string; owner: string }): void;
  onLockReleased?(e: { path: string; owner: string }): void;
  onStaleLockCleared?(e: { path: string; ageMs: number }): void;

  // ── Flow Store ────────────────────────────────────────────────────
  onFlowEdited?(e: { flowId: string; role: string; version: string }): void;
  onFlowPublished?(e: { flowId: string; role: string; version: string }): void;
  onFlowApproved?(e: { flowId: string; role: string; approvals: number }): void;

  // ── Action Registry ───────────────────────────────────────────────
  onActionRegistered?(e: { name: string; category: string }): void;
}
