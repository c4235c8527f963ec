/**
 * Persisted Session Records
 *
 * Sessions are stored as one JSON document each, with snake_case keys and
 * ISO-8601 timestamps:
 *
 * ```json
 * {
 *   "session_id": "…",
 *   "qna": [{ "question": "…", "answer": "…", "created_at": "2026-01-01T00:00:00.000Z" }],
 *   "partial_transcript": "",
 *   "last_update": "2026-01-01T00:00:00.000Z",
 *   "profile_text": null
 * }
 * ```
 *
 * Records are validated with zod on load; anything that fails is reported to
 * the caller, which skips it.
 */

import { z } from 'zod';
import type { Session } from '../models';

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' });

export const sessionRecordSchema = z.object({
  session_id: z.string().min(1),
  qna: z
    .array(
      z.object({
        question: z.string(),
        answer: z.string(),
        created_at: isoTimestamp,
      })
    )
    .default([]),
  partial_transcript: z.string().default(''),
  last_update: isoTimestamp,
  profile_text: z.string().nullable().default(null),
});

export type SessionRecord = z.infer<typeof sessionRecordSchema>;

export function toSessionRecord(session: Session): SessionRecord {
  return {
    session_id: session.id,
    qna: session.turns.map((turn) => ({
      question: turn.question,
      answer: turn.answer,
      created_at: turn.createdAt.toISOString(),
    })),
    partial_transcript: session.partialTranscript,
    last_update: session.lastUpdate.toISOString(),
    profile_text: session.profileText,
  };
}

export function serializeSession(session: Session): string {
  return JSON.stringify(toSessionRecord(session));
}

/**
 * Parses and validates a stored payload.
 *
 * @throws SyntaxError for malformed JSON, ZodError for a schema mismatch
 */
export function parseSessionRecord(payload: string): Session {
  const record = sessionRecordSchema.parse(JSON.parse(payload));
  return {
    id: record.session_id,
    turns: record.qna.map((entry) => ({
      question: entry.question,
      answer: entry.answer,
      createdAt: new Date(entry.created_at),
    })),
    profileText: record.profile_text ? record.profile_text : null,
    partialTranscript: record.partial_transcript,
    lastUpdate: new Date(record.last_update),
  };
}
