/**
 * EventDispatcher: event bus with multi-listener support,
 * async dispatch, listener isolation, and automatic timestamping.
 *
 * Implements the EventBus interface so it drops into the Runner,
 * the scheduler, the lock manager, and anywhere else that accepts an EventBus.
 *
 * Features:
 * - Multiple listeners per event type via `.on(type, listener)`
 * - Wildcard `'*'` listener receives every event
 * - Async dispatch (queueMicrotask): listeners never block a run
 * - Sync mode for testing: events dispatched inline
 * - try/catch per listener: one bad listener can't crash the system
 * - Every dispatched event has `type` and `timestamp` fields
 * - `.on()` returns unsubscribe function for easy cleanup
 *
 * Usage:
 * ```typescript
 * const dispatcher = new EventDispatcher();
 *
 * const unsub = dispatcher.on('step.completed', (e) => {
 *   console.log(e.stepId, e.durationMs);
 * });
 *
 * // Wildcard: audit log everything
 * dispatcher.on('*', (e) => auditLog.append(e));
 *
 * const runner = new Runner(actions, flows, locks, { events: dispatcher });
 * ```
 */

import type { EventBus } from '../interfaces/event-bus';
import { now } from '../utils/id';

// ── Event Types ─────────────────────────────────────────────────

/** All event type strings emitted by the runtime. */
export type EventType =
  // Run lifecycle
  | 'run.started'
  | 'run.completed'
  | 'run.failed'
  | 'run.cancelled'
  // Step lifecycle
  | 'step.started'
  | 'step.completed'
  | 'step.retry'
  // Jobs
  | 'job.fired'
  | 'job.skipped'
  | 'job.completed'
  | 'job.failed'
  // Locks
  | 'lock.acquired'
  | 'lock.released'
  | 'lock.stale_cleared'
  // Flow store
  | 'flow.edited'
  | 'flow.published'
  | 'flow.approved'
  // Action registry
  | 'action.registered';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/** Listener callback signature. */
export type EventListener = (event: DispatchedEvent) => void;

type Payload<K extends keyof EventBus> = Parameters<NonNullable<EventBus[K]>>[0];

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default): listeners fire on next microtask via queueMicrotask.
   * - `'sync'`: listeners fire inline. Use for testing or when you need
   *   to assert events immediately after an operation.
   */
  mode?: 'sync' | 'async';

  /**
   * Called when a listener throws. Defaults to logging through console.error.
   */
  onError?: (error: unknown, event: DispatchedEvent) => void;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements EventBus {
  private readonly _listeners = new Map<string, Set<EventListener>>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError: (error: unknown, event: DispatchedEvent) => void;

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._onError =
      options.onError ??
      ((error, event) => console.error(`[EventDispatcher] Listener for "${event.type}" threw:`, error));
  }

  // ── EventBus ────────────────────────────────────────────────────

  onRunStarted(e: Payload<'onRunStarted'>): void {
    this._dispatch('run.started', e);
  }

  onRunCompleted(e: Payload<'onRunCompleted'>): void {
    this._dispatch('run.completed', e);
  }

  onRunFailed(e: Payload<'onRunFailed'>): void {
    this._dispatch('run.failed', e);
  }

  onRunCancelled(e: Payload<'onRunCancelled'>): void {
    this._dispatch('run.cancelled', e);
  }

  onStepStarted(e: Payload<'onStepStarted'>): void {
    this._dispatch('step.started', e);
  }

  onStepCompleted(e: Payload<'onStepCompleted'>): void {
    this._dispatch('step.completed', e);
  }

  onStepRetry(e: Payload<'onStepRetry'>): void {
    this._dispatch('step.retry', e);
  }

  onJobFired(e: Payload<'onJobFired'>): void {
    this._dispatch('job.fired', e);
  }

  onJobSkipped(e: Payload<'onJobSkipped'>): void {
    this._dispatch('job.skipped', e);
  }

  onJobCompleted(e: Payload<'onJobCompleted'>): void {
    this._dispatch('job.completed', e);
  }

  onJobFailed(e: Payload<'onJobFailed'>): void {
    this._dispatch('job.failed', e);
  }

  onLockAcquired(e: Payload<'onLockAcquired'>): void {
    this._dispatch('lock.acquired', e);
  }

  onLockReleased(e: Payload<'onLockReleased'>): void {
    this._dispatch('lock.released', e);
  }

  onStaleLockCleared(e: Payload<'onStaleLockCleared'>): void {
    this._dispatch('lock.stale_cleared', e);
  }

  onFlowEdited(e: Payload<'onFlowEdited'>): void {
    this._dispatch('flow.edited', e);
  }

  onFlowPublished(e: Payload<'onFlowPublished'>): void {
    this._dispatch('flow.published', e);
  }

  onFlowApproved(e: Payload<'onFlowApproved'>): void {
    this._dispatch('flow.approved', e);
  }

  onActionRegistered(e: Payload<'onActionRegistered'>): void {
    this._dispatch('action.registered', e);
  }

  // ── Public API ──────────────────────────────────────────────────

  /**
   * Subscribe to an event type. Use `'*'` to receive all events.
   * Returns an unsubscribe function.
   */
  on(type: EventType | '*', listener: EventListener): () => void {
    let set = this._listeners.get(type);
    if (!set) {
      set = new Set();
      this._listeners.set(type, set);
    }
    const listeners = set;
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  off(type: EventType | '*', listener: EventListener): void {
    this._listeners.get(type)?.delete(listener);
  }

  /**
   * Remove all listeners for a type, or all listeners if no type specified.
   */
  removeAll(type?: EventType | '*'): void {
    if (type) {
      this._listeners.delete(type);
    } else {
      this._listeners.clear();
    }
  }

  listenerCount(type?: EventType | '*'): number {
    if (type) {
      return this._listeners.get(type)?.size ?? 0;
    }
    let total = 0;
    for (const set of this._listeners.values()) {
      total += set.size;
    }
    return total;
  }

  /**
   * Wait for pending async dispatches. Resolves immediately in sync mode.
   */
  async flush(): Promise<void> {
    await Promise.resolve();
    await Promise.resolve();
  }

  // ── Internal ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: Record<string, unknown>): void {
    const specific = this._listeners.get(type);
    const wildcard = this._listeners.get('*');

    if (!specific?.size && !wildcard?.size) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: now() });

    if (this._mode === 'sync') {
      this._callListeners(specific, event);
      this._callListeners(wildcard, event);
    } else {
      queueMicrotask(() => {
        this._callListeners(specific, event);
        this._callListeners(wildcard, event);
      });
    }
  }

  private _callListeners(listeners: Set<EventListener> | undefined, event: DispatchedEvent): void {
    if (!listeners) return;
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        this._onError(err, event);
      }
    }
  }
}
