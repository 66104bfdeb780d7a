import type { Selector } from '../types/flow';
import { getPath } from '../utils/id';

/**
 * Substitute `${name}` references.
 *
 * A string that is exactly one reference resolves to the raw value
 * (objects and numbers keep their type); references embedded in longer
 * strings are stringified, with missing values becoming ''.
 */
export function interpolate(template: unknown, vars: Record<string, unknown>): unknown {
  if (typeof template === 'string') {
    const full = template.match(/^\$\{([^}]+)\}$/);
    if (full) return getPath(vars, full[1].trim());
    return template.replace(/\$\{([^}]+)\}/g, (_, p: string) => {
      const v = getPath(vars, p.trim());
      if (v === undefined || v === null) return '';
      return typeof v === 'object' ? JSON.stringify(v) : String(v);
    });
  }

  if (Array.isArray(template)) {
    return template.map(t => interpolate(t, vars));
  }

  if (template && typeof template === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(template)) {
      result[k] = interpolate(v, vars);
    }
    return result;
  }

  return template;
}

export function resolveParams(
  params: Readonly<Record<string, unknown>>,
  vars: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(params)) {
    result[k] = interpolate(v, vars);
  }
  return result;
}

/**
 * Resolve a selector. A string selector that is one whole reference
 * may resolve to an object locator stored in a variable.
 */
export function resolveSelector(
  selector: Selector | undefined,
  vars: Record<string, unknown>
): Selector | undefined {
  if (selector === undefined) return undefined;
  if (typeof selector === 'string') {
    const value = interpolate(selector, vars);
    if (typeof value === 'string') return value;
    if (value && typeof value === 'object' && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return value === undefined || value === null ? '' : String(value);
  }
  return resolveParams(selector, vars);
}

/**
 * Stable string form of a selector, used as the statistics key.
 */
export function selectorKey(selector: Selector): string {
  return typeof selector === 'string' ? selector : JSON.stringify(selector);
}
