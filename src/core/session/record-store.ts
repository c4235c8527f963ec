import type { Session } from '../models';

/**
 * A stored session document before validation.
 */
export interface PersistedSessionRecord {
  id: string;
  payload: string;
}

/**
 * Persistence behind the SessionStore. `save` upserts the whole session.
 */
export interface SessionRecordStore {
  loadAll(): Promise<PersistedSessionRecord[]>;
  save(session: Session): Promise<void>;
  delete(id: string): Promise<void>;
}
