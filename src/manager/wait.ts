/**
 * Caller-side waiting on top of ApiManager.
 * The manager itself fails fast; this helper sleeps until the window
 * resets and tries again, within a total wait budget.
 */

import { QuotaWaitTimeoutError, RateLimitExceededError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { LogicalRequest } from '../shared/types.js';
import type { ApiManager } from './api-manager.js';
import type { RequestOptions } from './types.js';

export interface WaitOptions extends RequestOptions {
  /** Total time the caller is willing to spend sleeping. */
  maxWaitMs: number;
  /** Aborts a pending sleep; the promise rejects with the signal's reason. */
  signal?: AbortSignal;
}

/**
 * Issue a request, sleeping through RateLimitExceededError until the quota frees up.
 * @throws QuotaWaitTimeoutError when the next sleep would exceed maxWaitMs.
 */
export async function requestWithWait<TResponse, TCached>(
  manager: ApiManager<TResponse, TCached>,
  req: LogicalRequest,
  options: WaitOptions,
): Promise<TResponse | TCached> {
  let waitedMs = 0;

  for (;;) {
    options.signal?.throwIfAborted();
    try {
      return await manager.request(req, { key: options.key });
    } catch (err) {
      if (!(err instanceof RateLimitExceededError)) throw err;

      const delayMs = Math.max(1, err.retryAfterMs);
      if (waitedMs + delayMs > options.maxWaitMs) {
        throw new QuotaWaitTimeoutError(waitedMs);
      }

      logger.info({ endpoint: req.endpoint, delayMs, waitedMs }, 'Waiting for quota window to reset');
      await sleep(delayMs, options.signal);
      waitedMs += delayMs;
    }
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
