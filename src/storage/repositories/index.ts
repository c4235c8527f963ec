/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { SessionRecordRepository } from '@/storage/repositories';
 * const repo = new SessionRecordRepository(db);
 * ```
 */

export type { Repository } from './base';
export { SessionRecordRepository } from './session-record.repository';
