import type { LockHandle, LockManager, LockStamp } from '../interfaces/lock-manager';
import { LockBusyError } from '../types/errors';
import { generateId, now } from '../utils/id';

/**
 * In-process lock manager with the same semantics as FileLockManager.
 * For tests and embedders that never share locks across processes.
 */
export class MemoryLockManager implements LockManager {
  private readonly held = new Map<string, LockStamp>();

  async tryAcquire(path: string): Promise<LockHandle | null> {
    if (this.held.has(path)) return null;

    const stamp: LockStamp = { owner: generateId(), pid: process.pid, host: 'memory', acquiredAt: now() };
    this.held.set(path, stamp);

    let released = false;
    return {
      path,
      owner: stamp.owner,
      release: async () => {
        if (released) return;
        released = true;
        if (this.held.get(path)?.owner === stamp.owner) {
          this.held.delete(path);
        }
      },
    };
  }

  async acquire(path: string): Promise<LockHandle> {
    const lock = await this.tryAcquire(path);
    if (!lock) throw new LockBusyError(path);
    return lock;
  }

  async isHeld(path: string): Promise<boolean> {
    return this.held.has(path);
  }

  async inspect(path: string): Promise<LockStamp | null> {
    return this.held.get(path) ?? null;
  }

  async clearStale(path: string, maxAgeMs = 0): Promise<boolean> {
    const stamp = this.held.get(path);
    if (!stamp || now() - stamp.acquiredAt < maxAgeMs) return false;
    this.held.delete(path);
    return true;
  }

  /** Paths currently held */
  heldPaths(): string[] {
    return [...this.held.keys()];
  }
}
