/**
 * Session Record Repository
 *
 * Drizzle-backed `SessionRecordStore`. Sessions are upserted whole on every
 * save; loading hands back the raw payloads so the SessionStore can validate
 * each one and skip the ones that do not parse.
 */

import { desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { sessionRecords, type SessionRecordRow } from '../schema';
import type { Session } from '@/core/models';
import type { PersistedSessionRecord, SessionRecordStore } from '@/core/session/record-store';
import { serializeSession } from '@/core/session/session-record';
import type { Repository } from './base';

function mapToDomain(row: SessionRecordRow): PersistedSessionRecord {
  return {
    id: row.id,
    payload: row.payload,
  };
}

/**
 * @example
 * ```typescript
 * const repo = new SessionRecordRepository(db);
 * const store = new SessionStore(repo);
 * await store.load();
 * ```
 */
export class SessionRecordRepository
  implements SessionRecordStore, Repository<PersistedSessionRecord>
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<PersistedSessionRecord | null> {
    const result = await this.db
      .select()
      .from(sessionRecords)
      .where(eq(sessionRecords.id, id))
      .limit(1);

    const row = result[0];
    return row ? mapToDomain(row) : null;
  }

  /**
   * All records, most recently written first.
   */
  async findAll(): Promise<PersistedSessionRecord[]> {
    const rows = await this.db
      .select()
      .from(sessionRecords)
      .orderBy(desc(sessionRecords.updatedAt));
    return rows.map(mapToDomain);
  }

  loadAll(): Promise<PersistedSessionRecord[]> {
    return this.findAll();
  }

  /**
   * Inserts or replaces the session's record.
   */
  async save(session: Session): Promise<void> {
    const payload = serializeSession(session);
    const updatedAt = session.lastUpdate;

    await this.db
      .insert(sessionRecords)
      .values({ id: session.id, payload, updatedAt })
      .onConflictDoUpdate({
        target: sessionRecords.id,
        set: { payload, updatedAt },
      });
  }

  /**
   * Writes a payload as-is, without serializing a Session.
   */
  async saveRaw(id: string, payload: string, updatedAt: Date = new Date()): Promise<void> {
    await this.db
      .insert(sessionRecords)
      .values({ id, payload, updatedAt })
      .onConflictDoUpdate({
        target: sessionRecords.id,
        set: { payload, updatedAt },
      });
  }

  async delete(id: string): Promise<void> {
    await this.db.delete(sessionRecords).where(eq(sessionRecords.id, id));
  }
}
