/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema for SQLite. Each session is stored whole, as one JSON
 * document (see `core/session/session-record.ts` for its shape), keyed by the
 * session id.
 *
 * Timestamps are stored as milliseconds since epoch (integer).
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

/**
 * Session Records Table
 *
 * `payload` is validated on load, not on write, so a record edited by hand
 * or written by an older version is skipped rather than crashing startup.
 */
export const sessionRecords = sqliteTable(
  'session_records',
  {
    // Session UUID, duplicated from the payload for lookups
    id: text('id').primaryKey(),

    // Serialized SessionRecord JSON
    payload: text('payload').notNull(),

    // When the record was last written
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    updatedAtIdx: index('session_records_updated_at_idx').on(table.updatedAt),
  })
);

export type SessionRecordRow = typeof sessionRecords.$inferSelect;
export type NewSessionRecordRow = typeof sessionRecords.$inferInsert;
