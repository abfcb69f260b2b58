/**
 * Quota window types.
 */

/** Options for constructing a QuotaWindow. */
export interface QuotaWindowOptions {
  /** Length of one quota window, in milliseconds. */
  windowMs: number;
  /** Maximum calls permitted per window. */
  threshold: number;
  /** Extra milliseconds added to every window to absorb clock skew with the remote limiter. */
  bufferMs?: number;
  /** Seed state, e.g. usage already reported by the remote service at startup. */
  initialState?: QuotaInitialState;
  /** Time source, epoch milliseconds. Defaults to Date.now. */
  clock?: () => number;
}

/** Starting count and window start for a freshly constructed window. */
export interface QuotaInitialState {
  count: number;
  /** Epoch milliseconds. Defaults to construction time. */
  windowStart?: number;
}

/** Point-in-time view of a QuotaWindow, safe to serialize. */
export interface QuotaSnapshot {
  count: number;
  threshold: number;
  /** Effective window length including any buffer. */
  windowMs: number;
  windowStart: number;
  /** Epoch milliseconds at which the current window ends. */
  resetAt: number;
  /** Calls left in the current window (never negative). */
  remaining: number;
}
