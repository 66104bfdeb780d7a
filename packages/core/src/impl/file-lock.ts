import { mkdir, open, readFile, stat, unlink, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { hostname } from 'node:os';
import type { LockHandle, LockManager, LockStamp } from '../interfaces/lock-manager';
import type { EventBus } from '../interfaces/event-bus';
import { LockBusyError } from '../types/errors';
import { generateId, isRecord, now } from '../utils/id';

export interface FileLockOptions {
  /** Age after which a marker counts as stale (default: 6 hours) */
  staleAfterMs?: number;
  /** Clear stale markers automatically when acquisition finds one (default: false) */
  autoClearStale?: boolean;
  events?: EventBus;
}

export const DEFAULT_STALE_AFTER_MS = 6 * 60 * 60 * 1000;

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function parseStamp(raw: string): LockStamp | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (
    isRecord(data) &&
    typeof data.owner === 'string' &&
    typeof data.pid === 'number' &&
    typeof data.host === 'string' &&
    typeof data.acquiredAt === 'number'
  ) {
    return { owner: data.owner, pid: data.pid, host: data.host, acquiredAt: data.acquiredAt };
  }
  return null;
}

/**
 * Lock manager backed by marker files.
 *
 * A marker is created with O_EXCL, so two acquirers racing for the same
 * path can never both succeed. The marker holds a JSON stamp naming the
 * holder; a marker whose stamp can't be read is aged by its mtime.
 */
export class FileLockManager implements LockManager {
  private readonly staleAfterMs: number;
  private readonly autoClearStale: boolean;
  private readonly events?: EventBus;

  constructor(options: FileLockOptions = {}) {
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.autoClearStale = options.autoClearStale ?? false;
    this.events = options.events;
  }

  async tryAcquire(path: string): Promise<LockHandle | null> {
    const stamp: LockStamp = {
      owner: generateId(),
      pid: process.pid,
      host: hostname(),
      acquiredAt: now(),
    };

    await mkdir(dirname(path), { recursive: true });

    let created = await this.create(path, stamp);
    if (!created && this.autoClearStale && (await this.clearStale(path))) {
      created = await this.create(path, stamp);
    }
    if (!created) return null;

    this.events?.onLockAcquired?.({ path, owner: stamp.owner });
    return this.handle(path, stamp.owner);
  }

  async acquire(path: string): Promise<LockHandle> {
    const lock = await this.tryAcquire(path);
    if (!lock) throw new LockBusyError(path);
    return lock;
  }

  async isHeld(path: string): Promise<boolean> {
    return (await this.inspect(path)) !== null;
  }

  async inspect(path: string): Promise<LockStamp | null> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw err;
    }

    const stamp = parseStamp(raw);
    if (stamp) return stamp;

    // Half-written or foreign marker
    try {
      const info = await stat(path);
      return { owner: 'unknown', pid: 0, host: 'unknown', acquiredAt: info.mtimeMs };
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw err;
    }
  }

  async clearStale(path: string, maxAgeMs: number = this.staleAfterMs): Promise<boolean> {
    const stamp = await this.inspect(path);
    if (!stamp) return false;

    const ageMs = now() - stamp.acquiredAt;
    if (ageMs < maxAgeMs) return false;

    console.warn(
      `[FileLockManager] Clearing stale lock ${path} (owner ${stamp.owner}, pid ${stamp.pid} on ${stamp.host}, age ${ageMs}ms)`
    );
    await this.remove(path);
    this.events?.onStaleLockCleared?.({ path, ageMs });
    return true;
  }

  private async create(path: string, stamp: LockStamp): Promise<boolean> {
    let file: FileHandle;
    try {
      file = await open(path, 'wx');
    } catch (err) {
      if (errorCode(err) === 'EEXIST') return false;
      throw err;
    }
    try {
      await file.writeFile(JSON.stringify(stamp), 'utf8');
    } finally {
      await file.close();
    }
    return true;
  }

  private async remove(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') throw err;
    }
  }

  private handle(path: string, owner: string): LockHandle {
    let released = false;
    return {
      path,
      owner,
      release: async () => {
        if (released) return;
        released = true;
        // Only release if we still own it
        const current = await this.inspect(path);
        if (current?.owner === owner) {
          await this.remove(path);
          this.events?.onLockReleased?.({ path, owner });
        }
      },
    };
  }
}

/**
 * Run `fn` while holding `path`. Throws LockBusyError when the lock is held;
 * the lock is released however `fn` exits.
 */
export async function withLock<T>(locks: LockManager, path: string, fn: () => Promise<T>): Promise<T> {
  const lock = await locks.acquire(path);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
