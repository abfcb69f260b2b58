/**
 * Quota resync strategies.
 * A strategy overwrites the local count with what the remote (or a shared
 * store) says has actually been used, so several processes sharing one quota
 * converge on the same view.
 */

import type { RateLimitInfo } from '../clients/types.js';
import type { QuotaWindow } from '../quota/window.js';
import { logger } from '../shared/logger.js';
import type { MaybePromise } from '../shared/types.js';

export interface QuotaResync {
  /** Bring `quota` up to date. Errors propagate to the caller of updateState. */
  updateState(quota: QuotaWindow): MaybePromise<void>;
}

/** Leaves the quota alone. */
export const noopResync: QuotaResync = {
  updateState(): void {},
};

/** Returns the remote's remaining request count, or null/undefined when unknown. */
export type RemainingRequestsSource = () => MaybePromise<number | null | undefined>;

/**
 * Resync from a remaining-requests figure: count = max(0, threshold - remaining).
 * Unknown or non-integer figures leave the count untouched.
 */
export function remainingRequestsResync(source: RemainingRequestsSource): QuotaResync {
  return {
    async updateState(quota: QuotaWindow): Promise<void> {
      const remaining = await source();
      if (remaining === null || remaining === undefined) return;
      if (!Number.isInteger(remaining)) {
        logger.warn({ remaining }, 'Ignoring non-integer remaining request count');
        return;
      }
      quota.setCount(Math.max(0, quota.threshold - remaining));
    },
  };
}

/** Anything that remembers the rate limit headers of its last response, such as HttpApiClient. */
export interface RateLimitAware {
  readonly lastRateLimit: RateLimitInfo | null;
}

/** Resync from the remaining count in the client's most recent rate limit headers. */
export function headerResync(client: RateLimitAware): QuotaResync {
  return remainingRequestsResync(() => client.lastRateLimit?.remainingRequests);
}
