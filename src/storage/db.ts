/**
 * Database Connection Factory
 *
 * Opens a SQLite database through better-sqlite3 and wraps it with Drizzle
 * ORM.
 *
 * Usage:
 *   import { createDatabase } from './db';
 *   const db = createDatabase(config.database.path);
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

/**
 * Creates a Drizzle ORM database instance connected to the given SQLite file.
 *
 * File-backed databases use WAL journaling so reads are not blocked while a
 * session record is being written.
 *
 * @param dbPath - Path to the SQLite file, or ':memory:'
 */
export function createDatabase(dbPath: string = 'interview-copilot.db') {
  const sqlite = new Database(dbPath);

  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = ReturnType<typeof createDatabase>;
