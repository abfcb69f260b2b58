/**
 * API client contract.
 * The manager works exclusively through this interface; concrete transports
 * (the bundled HttpApiClient, or an integrator's own SDK wrapper) plug in here.
 */

import type { LogicalRequest } from '../shared/types.js';

/**
 * A capability that performs live calls against the remote API.
 * @typeParam TResponse - Raw result of a live call, returned to callers on a cache miss.
 * @typeParam TCached - Value stored in the cache and returned on a cache hit.
 */
export interface ApiClient<TResponse, TCached = TResponse> {
  /**
   * Perform one live call.
   * @throws TransportError (or a subclass) when the call fails; the client
   *   decides what counts as failure, e.g. a non-2xx status.
   */
  request(req: LogicalRequest): Promise<TResponse>;

  /**
   * Shape a response into the value to cache.
   * Called with `null` after a failed call when failure caching is enabled.
   * @returns The value to store, or undefined to skip caching.
   */
  processResponseForCache(response: TResponse | null): TCached | undefined;
}

/** Normalized rate limit information from a response's headers. */
export interface RateLimitInfo {
  /** Maximum requests allowed in the remote window. */
  limitRequests?: number;
  /** Requests remaining in the remote window. */
  remainingRequests?: number;
  /** Milliseconds until the remote window resets. */
  resetRequestsMs?: number;
  /** Explicit retry-after from a 429 response, in milliseconds. */
  retryAfterMs?: number;
}

/** Result of a successful HttpApiClient call. */
export interface HttpResponse {
  /** HTTP status code from the remote. */
  status: number;
  /** Raw response headers. */
  headers: Headers;
  /** Parsed JSON body, or text when the response is not JSON. */
  body: unknown;
  /** Time taken for the request in milliseconds. */
  latencyMs: number;
}

/** What HttpApiClient stores in the cache for a response. */
export interface CachedHttpResponse {
  status: number;
  body: unknown;
  contentType: string | null;
  /** Epoch milliseconds when the response was cached. */
  storedAt: number;
}

/** Options for constructing an HttpApiClient. */
export interface HttpApiClientOptions {
  /** Identifier used in logs and errors. */
  id: string;
  /** Base URL, e.g. "https://api.example.com". A trailing slash is ignored. */
  baseUrl: string;
  /** Sent as `Authorization: Bearer <apiKey>` when present. */
  apiKey?: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs?: number;
  /** Headers sent with every request; request headers take precedence. */
  headers?: Record<string, string>;
}
