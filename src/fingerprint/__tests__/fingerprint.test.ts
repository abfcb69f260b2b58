import { describe, it, expect } from 'vitest';
import { canonicalize, fingerprint } from '../fingerprint.js';

describe('fingerprint', () => {
  it('returns a 64-char SHA-256 hex digest', () => {
    const key = fingerprint({ method: 'GET', endpoint: '/users' });
    expect(key).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is independent of parameter insertion order', () => {
    const a = fingerprint({ method: 'GET', endpoint: '/search', params: { a: 1, b: 2 }, body: { q: 'x' } });
    const b = fingerprint({ method: 'GET', endpoint: '/search', params: { b: 2, a: 1 }, body: { q: 'x' } });
    expect(a).toBe(b);
  });

  it('sorts nested body keys but keeps array order', () => {
    const a = fingerprint({ method: 'POST', endpoint: '/items', body: { outer: { y: 1, x: 2 }, list: [1, 2] } });
    const b = fingerprint({ method: 'POST', endpoint: '/items', body: { list: [1, 2], outer: { x: 2, y: 1 } } });
    const c = fingerprint({ method: 'POST', endpoint: '/items', body: { list: [2, 1], outer: { x: 2, y: 1 } } });
    expect(a).toBe(b);
    expect(a).not.toBe(c);
  });

  it('treats the method case-insensitively', () => {
    expect(fingerprint({ method: 'get', endpoint: '/users' })).toBe(
      fingerprint({ method: 'GET', endpoint: '/users' }),
    );
  });

  it('distinguishes method, endpoint, params and body', () => {
    const base = fingerprint({ method: 'GET', endpoint: '/users', params: { page: 1 } });
    expect(fingerprint({ method: 'POST', endpoint: '/users', params: { page: 1 } })).not.toBe(base);
    expect(fingerprint({ method: 'GET', endpoint: '/users/', params: { page: 1 } })).not.toBe(base);
    expect(fingerprint({ method: 'GET', endpoint: '/users', params: { page: 2 } })).not.toBe(base);
    expect(fingerprint({ method: 'GET', endpoint: '/users', params: { page: 1 }, body: {} })).not.toBe(base);
  });

  it('distinguishes a number from its string form', () => {
    expect(fingerprint({ method: 'GET', endpoint: '/u', params: { id: 1 } })).not.toBe(
      fingerprint({ method: 'GET', endpoint: '/u', params: { id: '1' } }),
    );
  });

  it('ignores headers by default', () => {
    const a = fingerprint({ method: 'GET', endpoint: '/me', headers: { Authorization: 'Bearer test-a' } });
    const b = fingerprint({ method: 'GET', endpoint: '/me', headers: { Authorization: 'Bearer test-b' } });
    expect(a).toBe(b);
  });

  it('includes opted-in headers case-insensitively', () => {
    const options = { includeHeaders: ['Accept-Language'] };
    const en = fingerprint({ method: 'GET', endpoint: '/page', headers: { 'accept-language': 'en' } }, options);
    const enUpper = fingerprint({ method: 'GET', endpoint: '/page', headers: { 'Accept-Language': 'en' } }, options);
    const fr = fingerprint({ method: 'GET', endpoint: '/page', headers: { 'accept-language': 'fr' } }, options);
    const absent = fingerprint({ method: 'GET', endpoint: '/page' }, options);
    expect(en).toBe(enUpper);
    expect(en).not.toBe(fr);
    expect(en).not.toBe(absent);
  });

  it('drops undefined-valued params', () => {
    expect(fingerprint({ method: 'GET', endpoint: '/u', params: { a: 1, b: undefined } })).toBe(
      fingerprint({ method: 'GET', endpoint: '/u', params: { a: 1 } }),
    );
  });

  it('does not throw on circular or exotic values', () => {
    const circular: Record<string, unknown> = { name: 'loop' };
    circular['self'] = circular;
    expect(() =>
      fingerprint({
        method: 'POST',
        endpoint: '/odd',
        body: { circular, fn: () => 1, sym: Symbol('s'), big: 10n, when: new Date(0) },
      }),
    ).not.toThrow();
  });

  it('does not throw for objects whose prototype has no constructor', () => {
    const orphan: unknown = Object.create(Object.create(null));
    expect(() => fingerprint({ method: 'POST', endpoint: '/x', body: orphan })).not.toThrow();
    expect(canonicalize(orphan)).toBe('anonymous{}');
  });

  it('does not throw when toJSON and string coercion both throw', () => {
    class Hostile {
      toJSON(): never {
        throw new Error('no json');
      }
      [Symbol.toPrimitive](): never {
        throw new Error('no string');
      }
    }
    expect(() => fingerprint({ method: 'POST', endpoint: '/x', body: new Hostile() })).not.toThrow();
    expect(canonicalize(new Hostile())).toBe('Hostile(uncoercible)');
  });

  it('does not throw on throwing getters', () => {
    const trap = {
      get boom(): number {
        throw new Error('getter');
      },
    };
    expect(canonicalize({ trap })).toBe('{"trap":unserializable}');
  });
});

describe('canonicalize', () => {
  it('tags primitive types', () => {
    expect(canonicalize('a')).toBe('s:"a"');
    expect(canonicalize(1)).toBe('n:1');
    expect(canonicalize(true)).toBe('b:true');
    expect(canonicalize(null)).toBe('null');
    expect(canonicalize(undefined)).toBe('undefined');
    expect(canonicalize(5n)).toBe('i:5');
    expect(canonicalize(NaN)).toBe('n:NaN');
  });

  it('sorts object keys', () => {
    expect(canonicalize({ b: 2, a: 'x' })).toBe('{"a":s:"x","b":n:2}');
  });

  it('serializes arrays in order', () => {
    expect(canonicalize([2, 'a'])).toBe('[n:2,s:"a"]');
  });

  it('serializes dates as ISO strings', () => {
    expect(canonicalize(new Date(0))).toBe('d:1970-01-01T00:00:00.000Z');
  });

  it('orders Set and Map entries', () => {
    expect(canonicalize(new Set([2, 1]))).toBe(canonicalize(new Set([1, 2])));
    expect(canonicalize(new Map([['b', 1], ['a', 2]]))).toBe(canonicalize(new Map([['a', 2], ['b', 1]])));
  });

  it('serializes bytes as hex', () => {
    expect(canonicalize(new Uint8Array([0, 255]))).toBe('bytes:00ff');
  });

  it('marks circular references', () => {
    const node: Record<string, unknown> = {};
    node['next'] = node;
    expect(canonicalize(node)).toBe('{"next":circular}');
  });

  it('uses toJSON for class instances that provide it', () => {
    expect(canonicalize(new URL('https://example.com/a'))).toBe('URL(s:"https://example.com/a")');
  });

  it('tags plain class instances with their constructor name', () => {
    class Point {
      constructor(public y: number, public x: number) {}
    }
    expect(canonicalize(new Point(2, 1))).toBe('Point{"x":n:1,"y":n:2}');
  });
});
