/**
 * Schema bootstrap.
 *
 * There is a single table, so instead of a migrations folder the schema is
 * created idempotently at startup (and for every in-memory test database).
 * Keep this statement in step with `schema.ts`.
 */

import { sql } from 'drizzle-orm';
import type { AppDatabase } from './db';

export function ensureSchema(db: AppDatabase): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS session_records (
      id TEXT PRIMARY KEY NOT NULL,
      payload TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);
  db.run(sql`
    CREATE INDEX IF NOT EXISTS session_records_updated_at_idx
      ON session_records (updated_at)
  `);
}
