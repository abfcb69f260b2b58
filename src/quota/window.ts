/**
 * Fixed-window quota accounting.
 * Tracks how many live calls were made since the window started and decides
 * whether another one may be admitted. The window resets lazily: the first
 * admission check after it elapses zeroes the count and restarts it at "now".
 */

import { logger } from '../shared/logger.js';
import type { QuotaSnapshot, QuotaWindowOptions } from './types.js';

export class QuotaWindow {
  /** Effective window length in milliseconds, buffer included. */
  public readonly windowMs: number;
  public readonly threshold: number;
  private readonly clock: () => number;
  private _count: number;
  private _windowStart: number;

  constructor(options: QuotaWindowOptions) {
    const bufferMs = options.bufferMs ?? 0;
    assertPositiveInteger('windowMs', options.windowMs);
    assertPositiveInteger('threshold', options.threshold);
    assertNonNegativeInteger('bufferMs', bufferMs);

    this.windowMs = options.windowMs + bufferMs;
    this.threshold = options.threshold;
    this.clock = options.clock ?? Date.now;

    const now = this.clock();
    const initial = options.initialState;
    if (initial) {
      assertNonNegativeInteger('initialState.count', initial.count);
      if (initial.windowStart !== undefined && initial.windowStart > now) {
        throw new RangeError(`initialState.windowStart must not be in the future, got ${initial.windowStart}`);
      }
    }
    this._count = initial?.count ?? 0;
    this._windowStart = initial?.windowStart ?? now;
  }

  /** Calls recorded in the current window. */
  get count(): number {
    return this._count;
  }

  /** Epoch milliseconds at which the current window started. */
  get windowStart(): number {
    return this._windowStart;
  }

  /** Epoch milliseconds at which the current window ends. */
  get resetAt(): number {
    return this._windowStart + this.windowMs;
  }

  /**
   * Whether one more live call fits in the current window.
   * Advisory: does not increment the count. Resets an elapsed window first.
   */
  admit(): boolean {
    this.refresh();
    return this._count < this.threshold;
  }

  /** Count one live call against the current window. */
  record(): void {
    this._count++;
  }

  /**
   * Overwrite the count with an authoritative value (resync).
   * The window start is left untouched. Values above the threshold are kept
   * as-is, so admission stays closed until the window elapses.
   */
  setCount(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Quota count must be a non-negative integer, got ${count}`);
    }
    if (count !== this._count) {
      logger.debug({ from: this._count, to: count }, 'Quota count resynced');
    }
    this._count = count;
  }

  /** Close admission for the rest of the window (the remote reported its limit as reached). */
  exhaust(): void {
    this.setCount(Math.max(this._count, this.threshold));
  }

  /** Calls left in the current window. Resets an elapsed window first. */
  remainingRequests(): number {
    this.refresh();
    return Math.max(0, this.threshold - this._count);
  }

  /** Milliseconds until the current window ends. */
  remainingMs(): number {
    return Math.max(0, this.resetAt - this.clock());
  }

  /** Current state without resetting an elapsed window. */
  snapshot(): QuotaSnapshot {
    return {
      count: this._count,
      threshold: this.threshold,
      windowMs: this.windowMs,
      windowStart: this._windowStart,
      resetAt: this.resetAt,
      remaining: Math.max(0, this.threshold - this._count),
    };
  }

  private refresh(): void {
    const now = this.clock();
    if (now - this._windowStart >= this.windowMs) {
      logger.debug(
        { previousCount: this._count, previousStart: this._windowStart, windowStart: now },
        'Quota window elapsed, resetting',
      );
      this._count = 0;
      this._windowStart = now;
    }
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function assertNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}
