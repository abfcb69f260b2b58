/**
 * Library entry point.
 */

export { ApiManager } from './manager/api-manager.js';
export type { ApiManagerOptions, RequestOptions, RequestOutcome } from './manager/types.js';
export {
  headerResync,
  noopResync,
  remainingRequestsResync,
  type QuotaResync,
  type RateLimitAware,
  type RemainingRequestsSource,
} from './manager/resync.js';
export { requestWithWait, type WaitOptions } from './manager/wait.js';

export { QuotaWindow } from './quota/window.js';
export { Mutex } from './quota/mutex.js';
export type { QuotaInitialState, QuotaSnapshot, QuotaWindowOptions } from './quota/types.js';

export { canonicalize, fingerprint, type FingerprintInput, type FingerprintOptions } from './fingerprint/fingerprint.js';

export type { CacheStoreOptions, ResponseCache } from './cache/types.js';
export { MemoryCache } from './cache/memory-cache.js';
export { SqliteCache, type SqliteCacheOptions } from './cache/sqlite-cache.js';
export { initializeDatabase } from './persistence/db.js';
export { migrateSchema } from './persistence/schema.js';

export { HttpApiClient } from './clients/http-client.js';
export { parseCachedHttpResponse } from './clients/schema.js';
export type {
  ApiClient,
  CachedHttpResponse,
  HttpApiClientOptions,
  HttpResponse,
  RateLimitInfo,
} from './clients/types.js';

export {
  CacheError,
  ConfigError,
  HttpStatusError,
  QuotaWaitTimeoutError,
  RateLimitExceededError,
  RemoteRateLimitError,
  TransportError,
} from './shared/errors.js';
export type { HttpMethod, LogicalRequest, MaybePromise, RequestParams } from './shared/types.js';
export { logger } from './shared/logger.js';
