/**
 * Request fingerprinting.
 * Derives a stable cache key from a logical request's method, endpoint,
 * params and body. Headers are left out unless explicitly opted in, since
 * per-caller authorization headers would otherwise fragment the cache.
 */

import { createHash } from 'node:crypto';

/** The identifying fields of a logical request. */
export interface FingerprintInput {
  method: string;
  endpoint: string;
  params?: unknown;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface FingerprintOptions {
  /** Header names (case-insensitive) whose values affect the response content. */
  includeHeaders?: readonly string[];
}

/**
 * Compute the SHA-256 hex fingerprint of a logical request.
 * Total: never throws, whatever the params and body contain.
 */
export function fingerprint(input: FingerprintInput, options: FingerprintOptions = {}): string {
  const parts = [
    input.method.toUpperCase(),
    input.endpoint,
    canonicalize(input.params),
    canonicalize(input.body),
  ];

  const included = options.includeHeaders ?? [];
  if (included.length > 0) {
    parts.push(canonicalHeaders(input.headers ?? {}, included));
  }

  return createHash('sha256').update(parts.join('\n')).digest('hex');
}

/**
 * Type-tagged canonical serialization.
 * Object keys are sorted recursively; array order is kept. `1` and `"1"`
 * serialize differently. Values with no natural ordering fall back to a
 * tagged String() form.
 */
export function canonicalize(value: unknown): string {
  return serialize(value, new WeakSet<object>());
}

function serialize(value: unknown, seen: WeakSet<object>): string {
  if (value === null) return 'null';

  switch (typeof value) {
    case 'undefined':
      return 'undefined';
    case 'string':
      return `s:${JSON.stringify(value)}`;
    case 'number':
      return `n:${String(value)}`;
    case 'bigint':
      return `i:${value.toString()}`;
    case 'boolean':
      return `b:${String(value)}`;
    case 'symbol':
      return `sym:${JSON.stringify(value.toString())}`;
    case 'function':
      return `fn:${JSON.stringify(value.name)}`;
    case 'object':
      break;
  }

  if (!isObject(value)) {
    return `?:${safeString(value)}`;
  }

  if (seen.has(value)) return 'circular';
  seen.add(value);
  try {
    return serializeObject(value, seen);
  } catch {
    // Throwing getters, proxies and the like
    return 'unserializable';
  } finally {
    seen.delete(value);
  }
}

function serializeObject(value: object, seen: WeakSet<object>): string {
  if (value instanceof Date) {
    const time = value.getTime();
    return `d:${Number.isNaN(time) ? 'invalid' : value.toISOString()}`;
  }

  if (value instanceof Uint8Array) {
    return `bytes:${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex')}`;
  }

  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => serialize(item, seen)).join(',')}]`;
  }

  if (value instanceof Map) {
    const entries = Array.from(value.entries(), ([k, v]: [unknown, unknown]) => {
      return `${serialize(k, seen)}=>${serialize(v, seen)}`;
    });
    return `map{${entries.sort().join(',')}}`;
  }

  if (value instanceof Set) {
    const items = Array.from(value.values(), (item: unknown) => serialize(item, seen));
    return `set{${items.sort().join(',')}}`;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === Object.prototype || proto === null) {
    return serializeEntries(value, seen);
  }

  // Class instances: tag with the constructor name, prefer toJSON (URL, Decimal, ...)
  const ctor: unknown = value.constructor;
  const tag = (typeof ctor === 'function' && ctor.name) || 'anonymous';
  if ('toJSON' in value && typeof value.toJSON === 'function') {
    try {
      const json: unknown = value.toJSON();
      return `${tag}(${serialize(json, seen)})`;
    } catch {
      return `${tag}(${safeString(value)})`;
    }
  }
  return `${tag}${serializeEntries(value, seen)}`;
}

function serializeEntries(value: object, seen: WeakSet<object>): string {
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${serialize(v, seen)}`);
  return `{${entries.join(',')}}`;
}

function canonicalHeaders(headers: Record<string, string>, names: readonly string[]): string {
  const lowered = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    lowered.set(name.toLowerCase(), value);
  }

  const wanted = Array.from(new Set(names.map((n) => n.toLowerCase()))).sort();
  return wanted
    .map((name) => {
      const value = lowered.get(name);
      return `${name}=${value === undefined ? 'absent' : JSON.stringify(value)}`;
    })
    .join(';');
}

/** JSON-quoted String(value), or a fixed marker when coercion throws. */
function safeString(value: unknown): string {
  try {
    return JSON.stringify(String(value));
  } catch {
    return 'uncoercible';
  }
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}
