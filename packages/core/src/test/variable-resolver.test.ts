import { describe, it, expect } from 'vitest';
import { interpolate, resolveParams, resolveSelector, selectorKey } from '../engine/variable-resolver';
import { ExecutionContext } from '../engine/context';
import { getPath, isSafePath, setPath } from '../utils/id';
import { InvalidVariableNameError } from '../types/errors';

const vars = {
  user: { name: 'Ada', id: 7 },
  count: 3,
  rows: [{ name: 'first' }, { name: 'second' }],
  locator: { by: 'name', value: 'Submit' },
  nothing: null,
};

describe('interpolate', () => {
  it('returns the raw value for a whole-string reference', () => {
    expect(interpolate('${user}', vars)).toEqual({ name: 'Ada', id: 7 });
    expect(interpolate('${count}', vars)).toBe(3);
  });

  it('stringifies references inside longer strings', () => {
    expect(interpolate('Hi ${user.name} (#${user.id})', vars)).toBe('Hi Ada (#7)');
  });

  it('JSON-encodes objects embedded in strings', () => {
    expect(interpolate('user=${user}', vars)).toBe('user={"name":"Ada","id":7}');
  });

  it('replaces missing and null values with an empty string', () => {
    expect(interpolate('[${missing}][${nothing}]', vars)).toBe('[][]');
    expect(interpolate('${missing}', vars)).toBeUndefined();
  });

  it('indexes into arrays with dot paths', () => {
    expect(interpolate('${rows.1.name}', vars)).toBe('second');
  });

  it('walks arrays and objects', () => {
    expect(interpolate({ list: ['${count}', 'x'], nested: { who: '${user.name}' } }, vars)).toEqual({
      list: [3, 'x'],
      nested: { who: 'Ada' },
    });
  });

  it('leaves non-string scalars alone', () => {
    expect(interpolate(5, vars)).toBe(5);
    expect(interpolate(true, vars)).toBe(true);
  });
});

describe('resolveParams', () => {
  it('resolves every top-level param', () => {
    expect(resolveParams({ a: '${count}', b: 'n=${count}' }, vars)).toEqual({ a: 3, b: 'n=3' });
  });
});

describe('resolveSelector', () => {
  it('passes through plain string selectors', () => {
    expect(resolveSelector('#submit', vars)).toBe('#submit');
  });

  it('can resolve a string reference to an object locator', () => {
    expect(resolveSelector('${locator}', vars)).toEqual({ by: 'name', value: 'Submit' });
  });

  it('resolves references inside object selectors', () => {
    expect(resolveSelector({ window: 'Orders', row: '${count}' }, vars)).toEqual({ window: 'Orders', row: 3 });
  });

  it('keeps an absent selector absent', () => {
    expect(resolveSelector(undefined, vars)).toBeUndefined();
  });
});

describe('selectorKey', () => {
  it('uses strings as-is and JSON for objects', () => {
    expect(selectorKey('#a')).toBe('#a');
    expect(selectorKey({ by: 'id', value: 'a' })).toBe('{"by":"id","value":"a"}');
  });
});

describe('ExecutionContext', () => {
  it('reads and writes dotted names', () => {
    const ctx = new ExecutionContext('run', 'flow', { a: 1 });

    ctx.set('result.row', { name: 'Ada' });

    expect(ctx.get('a')).toBe(1);
    expect(ctx.get('result.row.name')).toBe('Ada');
    expect(ctx.has('result')).toBe(true);
    expect(ctx.has('missing')).toBe(false);
    expect(ctx.toObject()).toEqual({ a: 1, result: { row: { name: 'Ada' } } });
  });

  it('does not share state with its seed', () => {
    const seed = { a: 1 };
    const ctx = new ExecutionContext('run', 'flow', seed);

    ctx.set('a', 2);

    expect(seed.a).toBe(1);
  });
});

describe('path helpers', () => {
  it('refuses prototype segments when writing', () => {
    const target: Record<string, unknown> = {};

    expect(() => setPath(target, '__proto__.polluted', 'x')).toThrow(InvalidVariableNameError);
    expect(() => setPath(target, 'a.constructor.prototype.polluted', 'x')).toThrow(InvalidVariableNameError);
    expect(Reflect.get({}, 'polluted')).toBeUndefined();
    expect(target).toEqual({});
  });

  it('reads own properties only', () => {
    expect(getPath({ a: {} }, 'a.toString')).toBeUndefined();
    expect(getPath({ a: { b: 1 } }, 'a.constructor')).toBeUndefined();
    expect(getPath({ a: { b: 1 } }, 'a.b')).toBe(1);
  });

  it('flags empty and prototype segments', () => {
    expect(isSafePath('row.cells.name')).toBe(true);
    expect(isSafePath('row..name')).toBe(false);
    expect(isSafePath('prototype')).toBe(false);
  });
});

describe('ExecutionContext scopes', () => {
  it('shadows run variables until the scope is popped', () => {
    const ctx = new ExecutionContext('run', 'flow', { item: 'outer' });

    ctx.pushScope({ item: { id: 1 } });
    ctx.set('item.seen', true);
    ctx.set('total', 3);

    expect(ctx.get('item')).toEqual({ id: 1, seen: true });
    expect(ctx.toObject()).toEqual({ item: { id: 1, seen: true }, total: 3 });

    ctx.popScope();

    expect(ctx.get('item')).toBe('outer');
    expect(ctx.get('total')).toBe(3);
  });

  it('deep-copies nested seed values', () => {
    const seed = { row: { id: 1 } };
    const ctx = new ExecutionContext('run', 'flow', seed);

    ctx.set('row.found', 'x');

    expect(seed).toEqual({ row: { id: 1 } });
  });
});
