/**
 * Types for ApiManager configuration and results.
 */

import type { ResponseCache } from '../cache/types.js';
import type { ApiClient } from '../clients/types.js';
import type { FingerprintOptions } from '../fingerprint/fingerprint.js';
import type { QuotaInitialState } from '../quota/types.js';
import type { QuotaResync } from './resync.js';

export interface ApiManagerOptions<TResponse, TCached = TResponse> {
  /** Length of the quota window in milliseconds. */
  windowMs: number;
  /** Maximum live calls per window. */
  threshold: number;
  client: ApiClient<TResponse, TCached>;
  cache: ResponseCache<TCached>;
  /** Run the resync strategy before every request. Default false. */
  resyncBeforeRequest?: boolean;
  /** How updateState learns the authoritative count. Default: no-op. */
  resync?: QuotaResync;
  /** Added to windowMs to absorb clock skew against the remote limiter. Default 0. */
  bufferMs?: number;
  /** Seed the window, e.g. with usage reported by the remote at startup. */
  initialState?: QuotaInitialState;
  /** Store processResponseForCache(null) after a failed live call. Default false. */
  cacheOnFailure?: boolean;
  /** Count failed live calls against the quota. Default true. */
  consumeQuotaOnFailure?: boolean;
  fingerprint?: FingerprintOptions;
  /** Time source, epoch milliseconds. Defaults to Date.now. */
  clock?: () => number;
}

export interface RequestOptions {
  /** Cache key to use instead of the request's fingerprint. */
  key?: string;
}

/** Where a request's result came from. */
export type RequestOutcome<TResponse, TCached = TResponse> =
  | { source: 'cache'; key: string; value: TCached }
  | { source: 'live'; key: string; value: TResponse };
