/**
 * In-process response store backed by a Map.
 */

import type { CacheStoreOptions, ResponseCache } from './types.js';

interface MemoryEntry<T> {
  value: T;
  storedAt: number;
}

export class MemoryCache<T> implements ResponseCache<T> {
  private readonly entries = new Map<string, MemoryEntry<T>>();
  private readonly ttlMs?: number;
  private readonly clock: () => number;

  constructor(options: CacheStoreOptions = {}) {
    if (options.ttlMs !== undefined && (!Number.isInteger(options.ttlMs) || options.ttlMs <= 0)) {
      throw new RangeError(`ttlMs must be a positive integer, got ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.ttlMs !== undefined && this.clock() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  put(key: string, value: T): void {
    this.entries.set(key, { value, storedAt: this.clock() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Stored entries, expired ones included until they are next read. */
  get size(): number {
    return this.entries.size;
  }
}
