import type { Condition, ConditionOp } from '../types/flow';
import { getPath } from '../utils/id';
import { interpolate } from './variable-resolver';

function compareOrdered(actual: unknown, expected: unknown): number | undefined {
  if (typeof actual === 'number' && typeof expected === 'number') return actual - expected;
  if (typeof actual === 'string' && typeof expected === 'string') return actual.localeCompare(expected);
  return undefined;
}

function compare(actual: unknown, op: ConditionOp, expected: unknown): boolean {
  switch (op) {
    case 'eq': return actual === expected;
    case 'neq': return actual !== expected;
    case 'gt': return (compareOrdered(actual, expected) ?? NaN) > 0;
    case 'gte': return (compareOrdered(actual, expected) ?? NaN) >= 0;
    case 'lt': return (compareOrdered(actual, expected) ?? NaN) < 0;
    case 'lte': return (compareOrdered(actual, expected) ?? NaN) <= 0;
    case 'in': return Array.isArray(expected) && expected.includes(actual);
    case 'nin': return Array.isArray(expected) && !expected.includes(actual);
    case 'contains':
      if (Array.isArray(actual)) return actual.includes(expected);
      return typeof actual === 'string' && typeof expected === 'string' && actual.includes(expected);
    case 'startsWith':
      return typeof actual === 'string' && typeof expected === 'string' && actual.startsWith(expected);
    case 'endsWith':
      return typeof actual === 'string' && typeof expected === 'string' && actual.endsWith(expected);
    case 'exists': return actual !== undefined && actual !== null;
    case 'notExists': return actual === undefined || actual === null;
    case 'truthy': return Boolean(actual) && !(Array.isArray(actual) && actual.length === 0);
    case 'matches':
      return typeof actual === 'string' && typeof expected === 'string' && new RegExp(expected).test(actual);
  }
}

/**
 * Evaluate a condition against run variables.
 *
 * ```typescript
 * evaluateCondition({ all: [
 *   { path: 'order.total', op: 'gte', value: 1000 },
 *   { not: { path: 'order.flagged', op: 'truthy' } },
 * ] }, vars);
 * ```
 */
export function evaluateCondition(condition: Condition, vars: Record<string, unknown>): boolean {
  if (typeof condition === 'boolean') return condition;
  if ('all' in condition) return condition.all.every(c => evaluateCondition(c, vars));
  if ('any' in condition) return condition.any.some(c => evaluateCondition(c, vars));
  if ('not' in condition) return !evaluateCondition(condition.not, vars);
  return compare(getPath(vars, condition.path), condition.op, interpolate(condition.value, vars));
}

