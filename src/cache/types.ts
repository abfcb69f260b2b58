/**
 * Response cache contract.
 * Keys are request fingerprints; values are whatever the client's
 * processResponseForCache produced.
 */

import type { MaybePromise } from '../shared/types.js';

/**
 * Pluggable response store.
 * `get` returns undefined for a miss. Any other value, null included, is a hit.
 * Implementations signal failure by throwing (or rejecting).
 */
export interface ResponseCache<T> {
  get(key: string): MaybePromise<T | undefined>;
  put(key: string, value: T): MaybePromise<void>;
}

/** Options shared by the bundled stores. */
export interface CacheStoreOptions {
  /** Entries older than this read as misses. Unset means entries never expire. */
  ttlMs?: number;
  /** Time source, epoch milliseconds. Defaults to Date.now. */
  clock?: () => number;
}
