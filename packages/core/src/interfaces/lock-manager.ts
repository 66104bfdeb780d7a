/**
 * Contents of a lock marker.
 */
export interface LockStamp {
  /** Unique per acquisition */
  readonly owner: string;
  readonly pid: number;
  readonly host: string;
  /** Epoch ms */
  readonly acquiredAt: number;
}

/**
 * A held lock. Release is idempotent and only removes the
 * marker while it still carries this handle's owner.
 */
export interface LockHandle {
  readonly path: string;
  readonly owner: string;
  release(): Promise<void>;
}

/**
 * Path-addressed mutual exclusion. Marker exists = held.
 */
export interface LockManager {
  /** Create the marker, or return null if it already exists */
  tryAcquire(path: string): Promise<LockHandle | null>;

  /** Like tryAcquire, but throws LockBusyError when held */
  acquire(path: string): Promise<LockHandle>;

  isHeld(path: string): Promise<boolean>;

  /** Read the marker's stamp, null when free */
  inspect(path: string): Promise<LockStamp | null>;

  /**
   * Remove the marker if it is older than `maxAgeMs` (or the manager's
   * staleness threshold). Returns true when a marker was removed.
   */
  clearStale(path: string, maxAgeMs?: number): Promise<boolean>;
}
