/**
 * Session Store
 *
 * Owns every Session. State lives in a Map for fast reads and is written
 * through to a `SessionRecordStore` on each mutation.
 *
 * Concurrency rules:
 * - every mutation runs on one SerialQueue, so mutations never interleave
 * - a mutation works on a copy, persists it, then swaps it into the map, so
 *   reads (which skip the queue) always see a whole session
 * - callers only ever get snapshot copies
 *
 * The model call in the question flow happens outside the queue; only the
 * final `appendTurn` is serialized.
 */

import { randomUUID } from 'node:crypto';
import { IndexOutOfRangeError, SessionNotFoundError } from '../errors';
import type { Session, SessionSummary, Turn } from '../models';
import type { SessionRecordStore } from './record-store';
import { parseSessionRecord } from './session-record';
import { SerialQueue } from './serial-queue';

export interface SessionStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

export interface LoadReport {
  loaded: number;
  skipped: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly queue = new SerialQueue();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly records: SessionRecordStore,
    options: SessionStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Rebuilds in-memory state from every persisted record. Records that are
   * not valid JSON or do not match the schema are skipped with a warning.
   */
  load(): Promise<LoadReport> {
    return this.queue.run(async () => {
      const rows = await this.records.loadAll();
      const report: LoadReport = { loaded: 0, skipped: 0 };
      this.sessions.clear();

      for (const row of rows) {
        try {
          const session = parseSessionRecord(row.payload);
          this.sessions.set(session.id, session);
          report.loaded++;
        } catch (err) {
          report.skipped++;
          console.warn(
            `[Store] Skipping unreadable session record ${row.id}:`,
            err instanceof Error ? err.message : err
          );
        }
      }

      return report;
    });
  }

  create(): Promise<Session> {
    return this.queue.run(async () => {
      const session: Session = {
        id: this.generateId(),
        turns: [],
        profileText: null,
        partialTranscript: '',
        lastUpdate: this.now(),
      };
      await this.records.save(session);
      this.sessions.set(session.id, session);
      return structuredClone(session);
    });
  }

  async get(id: string): Promise<Session | null> {
    const session = this.sessions.get(id);
    return session ? structuredClone(session) : null;
  }

  /**
   * @throws {SessionNotFoundError} When the id is unknown
   */
  async require(id: string): Promise<Session> {
    const session = await this.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  appendTurn(id: string, question: string, answer: string): Promise<Turn> {
    return this.mutate(id, (draft, now) => {
      const turn: Turn = { question, answer, createdAt: now };
      draft.turns.push(turn);
      return structuredClone(turn);
    });
  }

  setProfile(id: string, text: string): Promise<void> {
    return this.mutate(id, (draft) => {
      const trimmed = text.trim();
      draft.profileText = trimmed ? trimmed : null;
    });
  }

  /**
   * Appends a trimmed transcript chunk, separated by one space from what is
   * already buffered. Returns the whole buffer.
   */
  appendTranscriptChunk(id: string, text: string): Promise<string> {
    return this.mutate(id, (draft) => {
      const chunk = text.trim();
      if (!chunk) return draft.partialTranscript;
      const buffer = draft.partialTranscript;
      const separator = buffer && !/\s$/.test(buffer) ? ' ' : '';
      draft.partialTranscript = `${buffer}${separator}${chunk}`;
      return draft.partialTranscript;
    });
  }

  clearHistory(id: string): Promise<void> {
    return this.mutate(id, (draft) => {
      draft.turns = [];
    });
  }

  /**
   * @throws {SessionNotFoundError} When the id is unknown (checked first)
   * @throws {IndexOutOfRangeError} When the index is not an integer in range
   */
  removeTurn(id: string, index: number): Promise<void> {
    return this.mutate(id, (draft) => {
      if (!Number.isInteger(index) || index < 0 || index >= draft.turns.length) {
        throw new IndexOutOfRangeError(index, draft.turns.length);
      }
      draft.turns.splice(index, 1);
    });
  }

  /**
   * Removes the session and its persisted record. Returns false when the
   * session was not known.
   */
  delete(id: string): Promise<boolean> {
    return this.queue.run(async () => {
      const existed = this.sessions.has(id);
      await this.records.delete(id);
      this.sessions.delete(id);
      return existed;
    });
  }

  async list(): Promise<SessionSummary[]> {
    return [...this.sessions.values()]
      .map((session) => ({
        id: session.id,
        lastUpdate: new Date(session.lastUpdate),
        turnCount: session.turns.length,
      }))
      .sort((a, b) => b.lastUpdate.getTime() - a.lastUpdate.getTime());
  }

  /**
   * Runs `change` on a copy of the session inside the queue, persists the
   * copy and only then publishes it. A throwing change leaves state untouched.
   */
  private mutate<T>(id: string, change: (draft: Session, now: Date) => T): Promise<T> {
    return this.queue.run(async () => {
      const current = this.sessions.get(id);
      if (!current) {
        throw new SessionNotFoundError(id);
      }

      const draft = structuredClone(current);
      const now = this.now();
      const result = change(draft, now);
      draft.lastUpdate = now;

      await this.records.save(draft);
      this.sessions.set(id, draft);
      return result;
    });
  }
}
