/**
 * Session and History Routes
 *
 * Endpoints:
 * - POST   /session                  - Create a session
 * - GET    /sessions                 - Summaries, most recently updated first
 * - GET    /history/:id              - Turns, profile flag and transcript buffer
 * - DELETE /session/:id              - Delete a session and its stored record
 * - DELETE /history/:id              - Clear all turns
 * - DELETE /history/:id/:index       - Remove one turn by zero-based index
 * - POST   /session/:id/transcript   - Append a speech-to-text chunk
 *
 * Missing sessions surface as SessionNotFoundError (404) and bad indices as
 * IndexOutOfRangeError (400) through the error handler.
 */

import { Hono } from 'hono';
import { SessionNotFoundError } from '../../core/errors';
import type { SessionStore } from '../../core/session';
import type { AuditSink } from '../../core/audit';
import { success } from '../utils/response';
import { validate, getValidatedBody } from '../middleware/validate';
import { transcriptChunkSchema } from '../types';

export interface SessionRouteDeps {
  store: SessionStore;
  audit: AuditSink;
}

// ============================================================================
// Response Types
// ============================================================================

export interface TurnView {
  index: number;
  question: string;
  answer: string;
  createdAt: string;
}

export interface SessionHistoryView {
  sessionId: string;
  turns: TurnView[];
  profileLoaded: boolean;
  partialTranscript: string;
  lastUpdate: string;
}

export interface SessionSummaryView {
  sessionId: string;
  lastUpdate: string;
  turnCount: number;
}

// ============================================================================
// Route Definitions
// ============================================================================

export function sessionRoutes({ store, audit }: SessionRouteDeps): Hono {
  const router = new Hono();

  router.post('/session', async (c) => {
    const session = await store.create();
    return success(c, { sessionId: session.id }, 201);
  });

  router.get('/sessions', async (c) => {
    const summaries = await store.list();
    const items: SessionSummaryView[] = summaries.map((summary) => ({
      sessionId: summary.id,
      lastUpdate: summary.lastUpdate.toISOString(),
      turnCount: summary.turnCount,
    }));
    return success(c, items);
  });

  router.get('/history/:id', async (c) => {
    const session = await store.require(c.req.param('id'));
    const history: SessionHistoryView = {
      sessionId: session.id,
      turns: session.turns.map((turn, index) => ({
        index,
        question: turn.question,
        answer: turn.answer,
        createdAt: turn.createdAt.toISOString(),
      })),
      profileLoaded: session.profileText !== null,
      partialTranscript: session.partialTranscript,
      lastUpdate: session.lastUpdate.toISOString(),
    };
    return success(c, history);
  });

  router.delete('/session/:id', async (c) => {
    const sessionId = c.req.param('id');
    const deleted = await store.delete(sessionId);
    if (!deleted) {
      throw new SessionNotFoundError(sessionId);
    }

    void audit.record({ type: 'session_deleted', sessionId });
    return success(c, { status: 'ok', deleted: true });
  });

  router.delete('/history/:id', async (c) => {
    await store.clearHistory(c.req.param('id'));
    return success(c, { status: 'ok' });
  });

  router.delete('/history/:id/:index', async (c) => {
    // Non-numeric indices become NaN and are rejected by the store
    const index = Number(c.req.param('index'));
    await store.removeTurn(c.req.param('id'), index);
    return success(c, { status: 'ok' });
  });

  router.post('/session/:id/transcript', validate(transcriptChunkSchema), async (c) => {
    const { text } = getValidatedBody(c, transcriptChunkSchema);
    const partialTranscript = await store.appendTranscriptChunk(c.req.param('id'), text);
    return success(c, { partialTranscript });
  });

  return router;
}
