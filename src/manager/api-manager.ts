/**
 * Request orchestrator.
 * Serves repeated requests from the cache, admits live calls only while the
 * quota window has room, and records every live call it makes.
 *
 * Admission is a reservation: a slot is taken under the mutex before the
 * client is called and settled (recorded, released) under the mutex after.
 * Concurrent callers awaiting the client therefore never exceed `threshold`.
 */

import { fingerprint, type FingerprintOptions } from '../fingerprint/fingerprint.js';
import type { ResponseCache } from '../cache/types.js';
import type { ApiClient } from '../clients/types.js';
import { Mutex } from '../quota/mutex.js';
import { QuotaWindow } from '../quota/window.js';
import { CacheError, ConfigError, RateLimitExceededError, RemoteRateLimitError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { LogicalRequest } from '../shared/types.js';
import { noopResync, type QuotaResync } from './resync.js';
import type { ApiManagerOptions, RequestOptions, RequestOutcome } from './types.js';

export class ApiManager<TResponse, TCached = TResponse> {
  private readonly _quota: QuotaWindow;
  private readonly client: ApiClient<TResponse, TCached>;
  private readonly cache: ResponseCache<TCached>;
  private readonly resync: QuotaResync;
  private readonly resyncBeforeRequest: boolean;
  private readonly cacheOnFailure: boolean;
  private readonly consumeQuotaOnFailure: boolean;
  private readonly fingerprintOptions: FingerprintOptions;
  private readonly mutex = new Mutex();
  private _inFlight = 0;

  constructor(options: ApiManagerOptions<TResponse, TCached>) {
    try {
      this._quota = new QuotaWindow({
        windowMs: options.windowMs,
        threshold: options.threshold,
        bufferMs: options.bufferMs,
        initialState: options.initialState,
        clock: options.clock,
      });
    } catch (err) {
      if (err instanceof RangeError) {
        throw new ConfigError(`Invalid quota options: ${err.message}`);
      }
      throw err;
    }

    this.client = options.client;
    this.cache = options.cache;
    this.resync = options.resync ?? noopResync;
    this.resyncBeforeRequest = options.resyncBeforeRequest ?? false;
    this.cacheOnFailure = options.cacheOnFailure ?? false;
    this.consumeQuotaOnFailure = options.consumeQuotaOnFailure ?? true;
    this.fingerprintOptions = options.fingerprint ?? {};
  }

  get quota(): QuotaWindow {
    return this._quota;
  }

  /** Live calls admitted but not yet settled. */
  get inFlight(): number {
    return this._inFlight;
  }

  /**
   * Pull the authoritative quota count through the resync strategy.
   * Runs under the quota lock so it never interleaves with an admission.
   */
  async updateState(): Promise<void> {
    await this.mutex.runExclusive(() => this.resync.updateState(this._quota));
  }

  /**
   * Perform a logical request and return the cached value or the live response.
   * @throws RateLimitExceededError when the window is full and the cache missed.
   * @throws CacheError when the cache fails; a failed read makes no live call.
   * Client errors propagate unchanged.
   */
  async request(req: LogicalRequest, options: RequestOptions = {}): Promise<TResponse | TCached> {
    const outcome = await this.requestDetailed(req, options);
    return outcome.value;
  }

  /** Like request, but also reports whether the value came from the cache. */
  async requestDetailed(
    req: LogicalRequest,
    options: RequestOptions = {},
  ): Promise<RequestOutcome<TResponse, TCached>> {
    if (this.resyncBeforeRequest) {
      await this.updateState();
    }

    const key = options.key ?? fingerprint(req, this.fingerprintOptions);

    const cached = await this.readCache(key);
    if (cached !== undefined) {
      logger.debug({ key, method: req.method, endpoint: req.endpoint }, 'Cache hit');
      return { source: 'cache', key, value: cached };
    }

    await this.reserve(key);

    let response: TResponse;
    try {
      response = await this.client.request(req);
    } catch (err) {
      await this.handleFailure(key, err);
      throw err;
    }

    try {
      const value = this.client.processResponseForCache(response);
      if (value !== undefined) {
        await this.writeCache(key, value);
      }
    } finally {
      await this.settle(true, false);
    }

    logger.debug(
      { key, method: req.method, endpoint: req.endpoint, count: this._quota.count },
      'Live call recorded',
    );
    return { source: 'live', key, value: response };
  }

  private async readCache(key: string): Promise<TCached | undefined> {
    try {
      return await this.cache.get(key);
    } catch (err) {
      logger.error({ key, err }, 'Cache read failed, refusing live call');
      throw new CacheError('read', key, err);
    }
  }

  private async writeCache(key: string, value: TCached): Promise<void> {
    try {
      await this.cache.put(key, value);
    } catch (err) {
      logger.error({ key, err }, 'Cache write failed');
      throw new CacheError('write', key, err);
    }
  }

  private async reserve(key: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      const quota = this._quota;
      if (quota.admit() && quota.count + this._inFlight < quota.threshold) {
        this._inFlight++;
        return;
      }

      const remaining = Math.max(0, quota.threshold - quota.count - this._inFlight);
      const retryAfterMs = quota.remainingMs();
      logger.warn(
        { key, count: quota.count, inFlight: this._inFlight, threshold: quota.threshold, retryAfterMs },
        'Quota exhausted, rejecting request',
      );
      throw new RateLimitExceededError(quota.threshold, remaining, quota.resetAt, retryAfterMs);
    });
  }

  private async settle(consume: boolean, exhaust: boolean): Promise<void> {
    await this.mutex.runExclusive(() => {
      this._inFlight--;
      if (consume) this._quota.record();
      if (exhaust) this._quota.exhaust();
    });
  }

  private async handleFailure(key: string, err: unknown): Promise<void> {
    const remoteLimited = err instanceof RemoteRateLimitError;
    try {
      if (this.cacheOnFailure) {
        const value = this.client.processResponseForCache(null);
        if (value !== undefined) {
          await this.cache.put(key, value);
        }
      }
    } catch (cacheErr) {
      // The client's error is what the caller sees
      logger.error({ key, err: cacheErr }, 'Failed to cache failure result');
    } finally {
      await this.settle(this.consumeQuotaOnFailure, remoteLimited);
    }

    if (remoteLimited) {
      logger.warn({ key, resetAt: this._quota.resetAt }, 'Remote reported rate limit, closing window');
    }
  }
}
