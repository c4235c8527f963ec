/**
 * Audit records are flat JSON objects tagged with a `type`. The sink adds
 * the timestamp.
 */

export type AuditRecordType =
  | 'qna'
  | 'evaluation'
  | 'auto_evaluation'
  | 'auto_evaluation_error'
  | 'profile_upload'
  | 'session_deleted';

export interface AuditEntry {
  type: AuditRecordType;
  [field: string]: unknown;
}

export interface AuditSink {
  /** Fire-and-forget: never rejects. */
  record(entry: AuditEntry): Promise<void>;
}
