import { describe, it, expect } from 'vitest';
import { Context } from '../context/index.js';
import { ContextKeyNotFoundError } from '../errors/index.js';

describe('Context', () => {
  it('resolves nested values from ordered sources', () => {
    const ctx = Context.from({ a: { x: 1, y: 2 } }, { a: { y: 3 } });
    expect(ctx.resolve('a.x')._unsafeUnwrap()).toBe(1);
    expect(ctx.resolve('a.y')._unsafeUnwrap()).toBe(3);
  });

  it('lets the later source win a shared nested key while siblings survive', () => {
    const a = Context.from({ db: { host: 'a-host', port: 5432 }, name: 'a' });
    const b = Context.from({ db: { host: 'b-host' } });
    expect(a.merge(b).toObject()).toEqual({ db: { host: 'b-host', port: 5432 }, name: 'a' });
    expect(b.merge(a).get('db.host')).toBe('a-host');
  });

  it('merges deterministically and associatively', () => {
    const a = { svc: { retries: 1, tags: ['x'] } };
    const b = { svc: { retries: 2 }, mode: 'batch' };
    const c = { svc: { timeout: 30 }, mode: 'stream' };
    const left = Context.from(a).merge(b).merge(c);
    const right = Context.from(a).merge(Context.from(b).merge(c));
    expect(left.toObject()).toEqual(right.toObject());
    expect(Context.from(a, b, c).toObject()).toEqual(left.toObject());
    expect(left.toObject()).toEqual({ svc: { retries: 2, tags: ['x'], timeout: 30 }, mode: 'stream' });
  });

  it('replaces on kind conflicts and never concatenates sequences', () => {
    expect(Context.from({ a: { x: 1 } }, { a: 5 }).get('a')).toBe(5);
    expect(Context.from({ a: 5 }, { a: { x: 1 } }).toObject()).toEqual({ a: { x: 1 } });
    expect(Context.from({ list: [1, 2] }, { list: [3] }).get('list')).toEqual([3]);
  });

  it('leaves both operands untouched', () => {
    const base = Context.from({ a: { x: 1 } });
    const other = Context.from({ a: { x: 2, y: 3 } });
    const merged = base.merge(other);
    const overridden = base.withOverrides({ 'a.x': 9 });
    expect(base.toObject()).toEqual({ a: { x: 1 } });
    expect(other.toObject()).toEqual({ a: { x: 2, y: 3 } });
    expect(merged.get('a.x')).toBe(2);
    expect(overridden.get('a.x')).toBe(9);
    expect(overridden).not.toBe(base);
  });

  it('freezes its tree', () => {
    const ctx = Context.from({ a: { list: [1, 2] } });
    expect(Object.isFrozen(ctx.resolve('a')._unsafeUnwrap())).toBe(true);
    expect(Object.isFrozen(ctx.resolve('a.list')._unsafeUnwrap())).toBe(true);
  });

  it('does not share state with the source mapping', () => {
    const source = { a: { x: 1 } };
    const ctx = Context.from(source);
    source.a.x = 2;
    expect(ctx.get('a.x')).toBe(1);
  });

  it('reports the full path and the namespace where resolution stopped', () => {
    const ctx = Context.from({ a: { b: { c: 1 } } });
    const error = ctx.resolve('a.x.c')._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ContextKeyNotFoundError);
    expect(error.path).toBe('a.x.c');
    expect(error.segment).toBe('x');
    expect(error.stoppedAt).toBe('a');
    expect(error.message).toBe("Context key not found: 'a.x.c' (no 'x' in namespace 'a')");
  });

  it('stops at the root or at a scalar', () => {
    const ctx = Context.from({ a: { b: { c: 1 } } });
    expect(ctx.resolve('zzz')._unsafeUnwrapErr().message).toBe("Context key not found: 'zzz' (no 'zzz' in <root>)");
    const scalar = ctx.resolve('a.b.c.d')._unsafeUnwrapErr();
    expect(scalar.segment).toBe('d');
    expect(scalar.stoppedAt).toBe('a.b.c');
  });

  it('expands dotted keys and skips undefined values', () => {
    const ctx = Context.from({ 'db.host': 'h', 'db.port': 1, unset: undefined });
    expect(ctx.toObject()).toEqual({ db: { host: 'h', port: 1 } });
    expect(ctx.has('unset')).toBe(false);
  });

  it('rejects empty key segments', () => {
    expect(() => Context.from({ 'a..b': 1 })).toThrow(TypeError);
  });

  it('flattens to dotted keys', () => {
    const ctx = Context.from({ a: { x: 1, y: [1, 2], empty: {} }, b: true });
    expect(ctx.flatten()).toEqual({ 'a.x': 1, 'a.y': [1, 2], b: true });
  });

  it('narrows to a namespace', () => {
    const ctx = Context.from({ reader: { path: 'in.json' }, flag: true });
    expect(ctx.namespace('reader')._unsafeUnwrap().get('path')).toBe('in.json');
    expect(ctx.namespace('flag').isErr()).toBe(true);
    expect(ctx.namespace('missing').isErr()).toBe(true);
  });

  it('falls back for missing paths', () => {
    const ctx = Context.empty();
    expect(ctx.get('a.b', 'dflt')).toBe('dflt');
    expect(ctx.get('a.b')).toBeUndefined();
    expect(ctx.keys()).toEqual([]);
  });

  it('rejects keys that would reach the object prototype', () => {
    const parsed = JSON.parse('{"a":{"b":2,"__proto__":{"z":1}}}');
    expect(() => Context.from(parsed)).toThrow(new TypeError("Reserved context key '__proto__' in 'a.__proto__'"));
    expect(() => Context.from({ 'svc.constructor': 1 })).toThrow(TypeError);
    expect(Context.from({ a: { b: 2 } }).resolve('a.b')._unsafeUnwrap()).toBe(2);
  });
});
