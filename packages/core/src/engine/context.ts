import { getPath, setPath } from '../utils/id';

/**
 * Variables for one run. Seeded from the flow's defaults and the caller's
 * inputs, extended by step outputs, and dropped when the run ends.
 *
 * The seed is deep-copied, so writes never reach the stored flow or the
 * caller's objects. Loop bodies and catch blocks push local scopes that
 * shadow run variables until they are popped.
 */
export class ExecutionContext {
  private readonly vars: Record<string, unknown>;
  private readonly scopes: Record<string, unknown>[] = [];

  constructor(
    public readonly runId: string,
    public readonly flowId: string,
    initial: Readonly<Record<string, unknown>> = {}
  ) {
    this.vars = structuredClone({ ...initial });
  }

  /** Read a variable; dot paths reach into objects (`row.cells.name`) */
  get(name: string): unknown {
    return getPath(this.owner(name), name);
  }

  /**
   * Dotted names create intermediate objects. A name whose first segment
   * is bound in a local scope writes into that scope.
   */
  set(name: string, value: unknown): void {
    setPath(this.owner(name), name, value);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  pushScope(initial: Record<string, unknown>): void {
    this.scopes.push({ ...initial });
  }

  popScope(): void {
    this.scopes.pop();
  }

  /** Shallow copy of all variables, innermost scope winning */
  toObject(): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...this.vars };
    for (const scope of this.scopes) Object.assign(merged, scope);
    return merged;
  }

  private owner(name: string): Record<string, unknown> {
    const head = name.split('.')[0];
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      if (Object.hasOwn(this.scopes[i], head)) return this.scopes[i];
    }
    return this.vars;
  }
}
