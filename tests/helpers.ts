/**
 * Test Helpers Module
 *
 * Fixtures and small utilities shared across the suite.
 */

import { z } from 'zod';
import type { Session, Turn } from '../src/core/models';
import type { EvaluationResult } from '../src/core/evaluation';
import type { SessionStore } from '../src/core/session';

// ============================================================================
// Dates
// ============================================================================

/**
 * A clock that starts at `start` and advances `stepMs` on every call.
 */
export function steppingClock(start: string = '2026-01-01T00:00:00.000Z', stepMs: number = 1000): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}

// ============================================================================
// Fixtures
// ============================================================================

export function makeTurn(overrides: Partial<Turn> = {}): Turn {
  return {
    question: 'What is a hash map?',
    answer: 'A key-value store with average O(1) lookups.',
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: 'session-1',
    turns: [],
    profileText: null,
    partialTranscript: '',
    lastUpdate: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function makeEvaluationResult(overrides: Partial<EvaluationResult> = {}): EvaluationResult {
  return {
    sessionId: 'session-1',
    problem: 'two sum',
    language: 'python',
    approachAutoExplanation: 'Uses a hash map.',
    feedbackSummary: 'Uses a hash map.',
    strengths: ['Linear time'],
    weaknesses: [],
    recommendations: [],
    scores: {
      correctness: 5,
      optimization: 4,
      approachExplanation: 3,
      complexityDiscussion: 3,
      edgeCasesTesting: 2,
      total: 17,
    },
    staticSignals: {
      usesRecursion: false,
      usesMemoization: false,
      usesDynamicProgramming: false,
      loopNestingDepth: 1,
      usesSlicingHeavily: false,
      usesListOrSetComprehension: false,
      functionCount: 1,
      commentDensity: 0,
      estimatedTimeComplexityHint: null,
    },
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/**
 * Creates a session and appends the given question/answer pairs in order.
 */
export async function createSessionWithTurns(
  store: SessionStore,
  turns: Array<[question: string, answer: string]> = []
): Promise<Session> {
  const session = await store.create();
  for (const [question, answer] of turns) {
    await store.appendTurn(session.id, question, answer);
  }
  return store.require(session.id);
}

// ============================================================================
// Responses
// ============================================================================

const successEnvelope = z.object({ success: z.literal(true), data: z.unknown() });

const errorEnvelope = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

export type ErrorBody = z.infer<typeof errorEnvelope>['error'];

/**
 * Reads a success envelope and validates its `data` with `schema`.
 */
export async function readData<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.output<T>> {
  const body = successEnvelope.parse(await response.json());
  return schema.parse(body.data);
}

export async function readError(response: Response): Promise<ErrorBody> {
  return errorEnvelope.parse(await response.json()).error;
}

export function jsonRequest(method: string, body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

/**
 * Parses a `text/event-stream` body into its events.
 */
export function parseSseEvents(body: string): Array<{ event: string; data: string }> {
  return body
    .split('\n\n')
    .filter((block) => block.trim() !== '')
    .map((block) => {
      let event = 'message';
      const data: string[] = [];
      for (const line of block.split('\n')) {
        if (line.startsWith('event:')) event = line.slice(6).trim();
        else if (line.startsWith('data:')) data.push(line.slice(5).replace(/^ /, ''));
      }
      return { event, data: data.join('\n') };
    });
}
