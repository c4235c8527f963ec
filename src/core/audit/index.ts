import { JsonlAuditSink, NoopAuditSink } from './jsonl-audit-sink';
import type { AuditSink } from './types';

export type { AuditEntry, AuditRecordType, AuditSink } from './types';
export { JsonlAuditSink, NoopAuditSink } from './jsonl-audit-sink';

/** JSONL sink when a path is configured, otherwise a no-op. */
export function createAuditSink(path: string | undefined): AuditSink {
  return path ? new JsonlAuditSink(path) : new NoopAuditSink();
}
