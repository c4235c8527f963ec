/**
 * Session Domain Types
 *
 * A Session is one candidate's interview-preparation conversation: the
 * question/answer turns so far, an optional profile (resume text) used to
 * answer personal questions, and the speech transcript buffered between
 * questions.
 *
 * Turns are append-only except for deletion by index and a full clear.
 * The SessionStore is the only owner; everything else sees snapshots.
 */

/**
 * One answered question.
 */
export interface Turn {
  question: string;
  /** The normalized answer as returned to the client */
  answer: string;
  /** Set by the server when the turn is appended */
  createdAt: Date;
}

export interface Session {
  /** Opaque UUID */
  id: string;
  /** Insertion-ordered turns */
  turns: Turn[];
  /** Trimmed profile text, or null when none was uploaded */
  profileText: string | null;
  /** Transcript chunks joined with single spaces */
  partialTranscript: string;
  lastUpdate: Date;
}

/**
 * Lightweight listing entry, sorted newest first by the store.
 */
export interface SessionSummary {
  id: string;
  lastUpdate: Date;
  turnCount: number;
}
