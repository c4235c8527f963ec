/**
 * Question Routes
 *
 * POST /question answers one interview question inside a session.
 *
 * - `stream: false` (default): `{ success: true, data: { answer, createdAt } }`
 * - `stream: true`: a `text/event-stream` of raw model chunks as `data:`
 *   events, closed by `event: end` carrying `{ answer, createdAt }` (the
 *   normalized, persisted answer) or by `event: error` carrying the error
 *   envelope's `{ code, message }`.
 *
 * The session is checked before the stream opens so a bad id still gets a
 * plain 404. A client disconnect or a failed write closes the answer stream,
 * which aborts the model call; whatever text had arrived is persisted.
 */

import { Hono } from 'hono';
import { streamSSE, type SSEStreamingApi } from 'hono/streaming';
import type { AnswerService, AnswerResult } from '../../core/answering';
import type { SessionStore } from '../../core/session';
import type { StyleOptions } from '../../core/prompting';
import { success } from '../utils/response';
import { validate, getValidatedBody } from '../middleware/validate';
import { formatErrorResponse } from '../middleware/error-handler';
import { questionSchema, type QuestionRequest } from '../types';

export interface QuestionRouteDeps {
  store: SessionStore;
  answers: AnswerService;
}

export interface AnswerView {
  answer: string;
  createdAt: string;
}

function styleOf(body: QuestionRequest): StyleOptions {
  return {
    styleMode: body.styleMode,
    tone: body.tone,
    layout: body.layout,
    variability: body.variability,
    seed: body.seed,
  };
}

function toView(result: AnswerResult | null): AnswerView {
  return {
    answer: result?.answer ?? '',
    createdAt: (result?.createdAt ?? new Date()).toISOString(),
  };
}

/** The part of Hono's SSE stream the relay writes to */
export type AnswerEventSink = Pick<SSEStreamingApi, 'aborted' | 'writeSSE'>;

/**
 * Writes each chunk as a `data:` event, then `end` or `error`. Unless the
 * answer ran to completion, the generator is closed on the way out.
 */
export async function relayAnswerStream(
  stream: AnswerEventSink,
  chunks: AsyncGenerator<string, AnswerResult | null>
): Promise<void> {
  let finished = false;
  try {
    let step = await chunks.next();
    while (!step.done && !stream.aborted) {
      await stream.writeSSE({ data: step.value });
      step = await chunks.next();
    }
    if (step.done) {
      finished = true;
      await stream.writeSSE({ event: 'end', data: JSON.stringify(toView(step.value)) });
    }
  } catch (err) {
    const { response } = formatErrorResponse(err);
    console.error('[API] Streaming answer failed:', response.error.message);
    await stream.writeSSE({
      event: 'error',
      data: JSON.stringify({ code: response.error.code, message: response.error.message }),
    });
  } finally {
    if (!finished) {
      await chunks.return(null);
    }
  }
}

export function questionRoutes({ store, answers }: QuestionRouteDeps): Hono {
  const router = new Hono();

  router.post('/question', validate(questionSchema), async (c) => {
    const body = getValidatedBody(c, questionSchema);
    const input = {
      sessionId: body.sessionId,
      question: body.question,
      systemPrompt: body.systemPrompt,
      style: styleOf(body),
    };

    if (!body.stream) {
      const result = await answers.answer(input);
      return success(c, toView(result));
    }

    await store.require(body.sessionId);

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => controller.abort());

      await relayAnswerStream(stream, answers.streamAnswer({ ...input, signal: controller.signal }));
    });
  });

  return router;
}
