/**
 * Session Module - Barrel Export
 *
 * The SessionStore and the pieces it is built from: the serial mutation
 * queue, the persisted record format and the persistence interface.
 */

export { SessionStore, type SessionStoreOptions, type LoadReport } from './session-store';
export { SerialQueue } from './serial-queue';
export type { SessionRecordStore, PersistedSessionRecord } from './record-store';
export {
  sessionRecordSchema,
  toSessionRecord,
  serializeSession,
  parseSessionRecord,
  type SessionRecord,
} from './session-record';
