/**
 * Database initialization for the SQLite response cache.
 * Sets up connection with WAL mode and performance pragmas.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';

const IN_MEMORY = ':memory:';

/**
 * Initialize SQLite database with WAL mode and performance pragmas.
 * @param dbPath - Path to SQLite database file, or ":memory:"
 * @returns Database instance ready for use
 */
export function initializeDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  // In-memory databases report "memory" and ignore WAL
  const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true });
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -64000');
  db.pragma('temp_store = MEMORY');

  logger.info({ dbPath, journalMode }, 'SQLite database initialized');

  return db;
}
