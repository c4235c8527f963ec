/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { createDatabase, ensureSchema, SessionRecordRepository } from '@/storage';
 *   const db = createDatabase(config.database.path);
 *   ensureSchema(db);
 */

export { createDatabase } from './db';
export type { AppDatabase } from './db';
export { ensureSchema } from './migrate';

export { sessionRecords } from './schema';
export type { SessionRecordRow, NewSessionRecordRow } from './schema';

export { SessionRecordRepository, type Repository } from './repositories';
