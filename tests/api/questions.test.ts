/**
 * API Tests: Question Route
 *
 * Covers the JSON and the server-sent-events forms of POST /api/question,
 * and the relay that feeds answer chunks into the event stream.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';
import { z } from 'zod';
import { LLMError } from '../../src/llm/types';
import { relayAnswerStream, type AnswerEventSink } from '../../src/api/routes/questions';
import { createTestContext, createTestApp, cleanupTestDatabase, type TestContext } from '../setup';
import { createSessionWithTurns, jsonRequest, parseSseEvents, readData, readError } from '../helpers';

const answerSchema = z.object({ answer: z.string(), createdAt: z.string() });

describe('POST /api/question', () => {
  let ctx: TestContext;
  let app: Hono;
  let sessionId: string;

  beforeEach(async () => {
    ctx = createTestContext();
    app = createTestApp(ctx);
    sessionId = (await createSessionWithTurns(ctx.store)).id;
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
    vi.restoreAllMocks();
  });

  describe('JSON responses', () => {
    it('should answer and persist the turn', async () => {
      // Act
      const res = await app.request('/api/question', jsonRequest('POST', { sessionId, question: 'What is a B-tree?' }));

      // Assert
      expect(res.status).toBe(200);
      const body = await readData(res, answerSchema);
      expect(body.answer).toBe('A test answer.');

      const session = await ctx.store.require(sessionId);
      expect(session.turns.map((turn) => [turn.question, turn.answer])).toEqual([
        ['What is a B-tree?', 'A test answer.'],
      ]);
      expect(session.turns[0]?.createdAt.toISOString()).toBe(body.createdAt);
    });

    it('should pass the custom system prompt to the model', async () => {
      await app.request(
        '/api/question',
        jsonRequest('POST', { sessionId, question: 'What is a B-tree?', systemPrompt: 'You are terse.' })
      );

      expect(ctx.model.requests[0]?.system.startsWith('You are terse.')).toBe(true);
    });

    it('should return 404 for an unknown session without calling the model', async () => {
      const res = await app.request('/api/question', jsonRequest('POST', { sessionId: 'missing', question: 'Hi?' }));

      expect(res.status).toBe(404);
      expect((await readError(res)).code).toBe('SESSION_NOT_FOUND');
      expect(ctx.model.requests).toEqual([]);
    });

    it('should reject a blank question', async () => {
      const res = await app.request('/api/question', jsonRequest('POST', { sessionId, question: '   ' }));

      expect(res.status).toBe(400);
      const error = await readError(res);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual([{ path: 'question', message: 'question is required' }]);
    });

    it('should reject a body that is not JSON', async () => {
      const res = await app.request('/api/question', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: 'not json',
      });

      expect(res.status).toBe(400);
      expect(await readError(res)).toEqual({
        code: 'INVALID_JSON',
        message: 'Request body must be valid JSON',
      });
    });

    it('should map a model failure to 502 and persist nothing', async () => {
      // Arrange
      vi.spyOn(console, 'error').mockImplementation(() => {});
      ctx.model.error = new LLMError('overloaded', 'server_error');

      // Act
      const res = await app.request('/api/question', jsonRequest('POST', { sessionId, question: 'What is a B-tree?' }));

      // Assert
      expect(res.status).toBe(502);
      expect(await readError(res)).toEqual({
        code: 'MODEL_CALL_FAILED',
        message: 'Model call failed: overloaded',
        details: { type: 'server_error' },
      });
      expect((await ctx.store.require(sessionId)).turns).toEqual([]);
    });
  });

  describe('streaming responses', () => {
    it('should stream raw chunks and end with the persisted answer', async () => {
      // Act
      const res = await app.request(
        '/api/question',
        jsonRequest('POST', { sessionId, question: 'What is a B-tree?', stream: true })
      );

      // Assert
      expect(res.headers.get('Content-Type')).toContain('text/event-stream');
      const events = parseSseEvents(await res.text());
      expect(events.slice(0, 3)).toEqual([
        { event: 'message', data: 'A tes' },
        { event: 'message', data: 't ans' },
        { event: 'message', data: 'wer.' },
      ]);

      const end = events[3];
      expect(end?.event).toBe('end');
      expect(answerSchema.parse(JSON.parse(end?.data ?? '')).answer).toBe('A test answer.');
      expect(events).toHaveLength(4);

      const turns = (await ctx.store.require(sessionId)).turns;
      expect(turns.map((turn) => turn.answer)).toEqual(['A test answer.']);
    });

    it('should send an error event and keep the partial answer', async () => {
      // Arrange
      vi.spyOn(console, 'error').mockImplementation(() => {});
      ctx.model.error = new LLMError('connection reset', 'network');
      ctx.model.failAfterChunks = 1;

      // Act
      const res = await app.request(
        '/api/question',
        jsonRequest('POST', { sessionId, question: 'What is a B-tree?', stream: true })
      );

      // Assert
      const events = parseSseEvents(await res.text());
      expect(events).toEqual([
        { event: 'message', data: 'A tes' },
        {
          event: 'error',
          data: JSON.stringify({ code: 'MODEL_CALL_FAILED', message: 'Model call failed: connection reset' }),
        },
      ]);
      const turns = (await ctx.store.require(sessionId)).turns;
      expect(turns.map((turn) => turn.answer)).toEqual(['A tes']);
    });

    it('should answer 404 before opening a stream for an unknown session', async () => {
      const res = await app.request(
        '/api/question',
        jsonRequest('POST', { sessionId: 'missing', question: 'Hi?', stream: true })
      );

      expect(res.status).toBe(404);
      expect(res.headers.get('Content-Type')).toContain('application/json');
    });
  });

  describe('relayAnswerStream', () => {
    it('should close the answer stream and keep the partial answer when a write fails', async () => {
      // Arrange
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const events: string[] = [];
      const sink: AnswerEventSink = {
        aborted: false,
        writeSSE: async (message) => {
          if (message.event === undefined && events.length === 1) {
            throw new Error('socket closed');
          }
          events.push(message.event ?? 'message');
        },
      };

      // Act
      await relayAnswerStream(sink, ctx.answers.streamAnswer({ sessionId, question: 'What is a B-tree?' }));

      // Assert
      expect(events).toEqual(['message', 'error']);
      const turns = (await ctx.store.require(sessionId)).turns;
      expect(turns.map((turn) => turn.answer)).toEqual(['A test ans']);
    });

    it('should stop writing once the client has gone', async () => {
      // Arrange
      const written: string[] = [];
      const sink: AnswerEventSink = {
        aborted: false,
        writeSSE: async (message) => {
          written.push(await message.data);
          sink.aborted = true;
        },
      };

      // Act
      await relayAnswerStream(sink, ctx.answers.streamAnswer({ sessionId, question: 'What is a B-tree?' }));

      // Assert
      expect(written).toEqual(['A tes']);
      const turns = (await ctx.store.require(sessionId)).turns;
      expect(turns.map((turn) => turn.answer)).toEqual(['A test ans']);
    });
  });
});
