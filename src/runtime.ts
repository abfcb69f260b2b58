/**
 * Builds the client, cache and manager a config describes.
 */

import type Database from 'better-sqlite3';
import type { ProxyManager } from './api/types.js';
import { MemoryCache } from './cache/memory-cache.js';
import { SqliteCache } from './cache/sqlite-cache.js';
import type { ResponseCache } from './cache/types.js';
import { HttpApiClient } from './clients/http-client.js';
import { parseCachedHttpResponse } from './clients/schema.js';
import type { CachedHttpResponse } from './clients/types.js';
import type { Config } from './config/types.js';
import { ApiManager } from './manager/api-manager.js';
import { headerResync, noopResync } from './manager/resync.js';
import { initializeDatabase } from './persistence/db.js';
import { migrateSchema } from './persistence/schema.js';

export interface Runtime {
  manager: ProxyManager;
  client: HttpApiClient;
  cache: ResponseCache<CachedHttpResponse>;
  /** Remove expired entries from a persistent cache; returns how many. */
  prune(): number;
  /** Release the database, if any. */
  close(): void;
}

export interface RuntimeOptions {
  clock?: () => number;
}

export function createRuntime(config: Config, options: RuntimeOptions = {}): Runtime {
  const { upstream, quota, cache: cacheConfig } = config;

  const client = new HttpApiClient({
    id: upstream.id,
    baseUrl: upstream.baseUrl,
    apiKey: upstream.apiKey,
    timeoutMs: upstream.timeoutMs,
    headers: upstream.headers,
  });

  let db: Database.Database | undefined;
  let sqliteCache: SqliteCache<CachedHttpResponse> | undefined;
  let cache: ResponseCache<CachedHttpResponse>;

  if (cacheConfig.driver === 'sqlite') {
    db = initializeDatabase(cacheConfig.dbPath);
    migrateSchema(db);
    sqliteCache = new SqliteCache({
      db,
      ttlMs: cacheConfig.ttlMs,
      clock: options.clock,
      decode: parseCachedHttpResponse,
    });
    cache = sqliteCache;
  } else {
    cache = new MemoryCache<CachedHttpResponse>({ ttlMs: cacheConfig.ttlMs, clock: options.clock });
  }

  const manager = new ApiManager({
    windowMs: quota.windowMs,
    threshold: quota.threshold,
    bufferMs: quota.bufferMs,
    initialState: { count: quota.initialCount },
    resyncBeforeRequest: quota.resyncBeforeRequest,
    resync: quota.resyncFromHeaders ? headerResync(client) : noopResync,
    consumeQuotaOnFailure: quota.consumeQuotaOnFailure,
    cacheOnFailure: cacheConfig.cacheOnFailure,
    fingerprint: { includeHeaders: config.fingerprint.includeHeaders },
    client,
    cache,
    clock: options.clock,
  });

  return {
    manager,
    client,
    cache,
    prune: () => sqliteCache?.prune() ?? 0,
    close: () => {
      db?.close();
    },
  };
}
