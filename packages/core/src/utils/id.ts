import { InvalidVariableNameError } from '../types/errors';
import { randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

export function now(): number {
  return Date.now();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const UNSAFE_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * True when every dot segment of `path` is non-empty and none can reach
 * an object's prototype.
 */
export function isSafePath(path: string): boolean {
  return path.split('.').every(part => part !== '' && !UNSAFE_SEGMENTS.has(part));
}

/**
 * Read a dotted path through own properties only. Unsafe paths read as undefined.
 */
export function getPath(obj: unknown, path: string): unknown {
  if (!isSafePath(path)) return undefined;
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (current == null) return undefined;
    if (Array.isArray(current)) {
      current = current[Number(part)];
    } else if (isRecord(current) && Object.hasOwn(current, part)) {
      current = current[part];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Write a dotted path, creating intermediate objects.
 * @throws InvalidVariableNameError for paths that fail isSafePath
 */
export function setPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  if (!isSafePath(path)) throw new InvalidVariableNameError(path);
  const parts = path.split('.');
  let current = obj;
  for (let i = 0; i < parts.length - 1; i++) {
    const next = Object.hasOwn(current, parts[i]) ? current[parts[i]] : undefined;
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }
  current[parts[parts.length - 1]] = value;
}
