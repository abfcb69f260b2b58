/**
 * Database schema migration system using PRAGMA user_version.
 * Manages schema evolution with idempotent migrations.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';

/** Schema version after all migrations have run. */
export const SCHEMA_VERSION = 1;

/**
 * Run schema migrations to bring database to current version.
 * @param db - Database instance to migrate
 */
export function migrateSchema(db: Database.Database): void {
  const version: unknown = db.pragma('user_version', { simple: true });
  const currentVersion = typeof version === 'number' ? version : 0;
  logger.debug({ currentVersion }, 'Database schema version check');

  const migrations: Array<() => void> = [
    // Migration 1: response cache keyed by request fingerprint
    () => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS response_cache (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          stored_at INTEGER NOT NULL,
          expires_at INTEGER
        );

        CREATE INDEX IF NOT EXISTS idx_response_cache_expires ON response_cache(expires_at)
          WHERE expires_at IS NOT NULL;
      `);
    },
  ];

  for (const [index, migrate] of migrations.entries()) {
    const targetVersion = index + 1;
    if (targetVersion <= currentVersion) continue;
    logger.info({ from: currentVersion, to: targetVersion }, 'Running database migration');
    migrate();
    db.pragma(`user_version = ${targetVersion}`);
  }

  if (currentVersion < migrations.length) {
    logger.info({ version: migrations.length }, 'Database migrations complete');
  }
}
