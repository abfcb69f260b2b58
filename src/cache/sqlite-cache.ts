/**
 * Persistent response store on better-sqlite3.
 * Values are stored as JSON text and decoded on read, so a cache survives
 * restarts and can be shared by processes on the same host.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';
import type { CacheStoreOptions, ResponseCache } from './types.js';

interface CacheRow {
  value: string;
  expiresAt: number | null;
}

export interface SqliteCacheOptions<T> extends CacheStoreOptions {
  /** A database migrated with migrateSchema. */
  db: Database.Database;
  /**
   * Turns the parsed JSON of a stored value back into a T.
   * Throwing here surfaces as a failed read.
   */
  decode: (raw: unknown) => T;
}

export class SqliteCache<T> implements ResponseCache<T> {
  private readonly ttlMs?: number;
  private readonly clock: () => number;
  private readonly decode: (raw: unknown) => T;
  private readonly getStmt: Database.Statement<[string], CacheRow>;
  private readonly putStmt: Database.Statement<[string, string, number, number | null]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly pruneStmt: Database.Statement<[number]>;
  private readonly countStmt: Database.Statement<[], { count: number }>;

  constructor(options: SqliteCacheOptions<T>) {
    if (options.ttlMs !== undefined && (!Number.isInteger(options.ttlMs) || options.ttlMs <= 0)) {
      throw new RangeError(`ttlMs must be a positive integer, got ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
    this.decode = options.decode;

    const { db } = options;
    this.getStmt = db.prepare<[string], CacheRow>(`
      SELECT value, expires_at as expiresAt
      FROM response_cache
      WHERE key = ?
    `);
    this.putStmt = db.prepare<[string, string, number, number | null]>(`
      INSERT INTO response_cache (key, value, stored_at, expires_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        stored_at = excluded.stored_at,
        expires_at = excluded.expires_at
    `);
    this.deleteStmt = db.prepare<[string]>('DELETE FROM response_cache WHERE key = ?');
    this.pruneStmt = db.prepare<[number]>(
      'DELETE FROM response_cache WHERE expires_at IS NOT NULL AND expires_at <= ?',
    );
    this.countStmt = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM response_cache');
  }

  get(key: string): T | undefined {
    const row = this.getStmt.get(key);
    if (!row) return undefined;
    if (row.expiresAt !== null && row.expiresAt <= this.clock()) {
      this.deleteStmt.run(key);
      return undefined;
    }
    const parsed: unknown = JSON.parse(row.value);
    return this.decode(parsed);
  }

  put(key: string, value: T): void {
    const json = JSON.stringify(value);
    if (json === undefined) {
      throw new TypeError(`Value for key ${key} is not JSON-serializable`);
    }
    const now = this.clock();
    const expiresAt = this.ttlMs === undefined ? null : now + this.ttlMs;
    this.putStmt.run(key, json, now, expiresAt);
  }

  delete(key: string): boolean {
    return this.deleteStmt.run(key).changes > 0;
  }

  /**
   * Remove expired rows.
   * @returns Number of rows removed.
   */
  prune(): number {
    const removed = this.pruneStmt.run(this.clock()).changes;
    if (removed > 0) {
      logger.debug({ removed }, 'Pruned expired cache entries');
    }
    return removed;
  }

  get size(): number {
    return this.countStmt.get()?.count ?? 0;
  }
}
