/**
 * Evaluation cache keys.
 *
 * The key covers everything that can change a critique: the session, the
 * recent conversation, the code, the problem and the language.
 */

import { createHash } from 'node:crypto';

export const DEFAULT_EVALUATION_LANGUAGE = 'python';

/** Number of trailing turns folded into the evaluation context. */
export const EVALUATION_CONTEXT_TURNS = 2;

export interface EvaluationKeyInput {
  sessionId: string;
  context: string;
  code: string;
  problem?: string | null;
  language?: string | null;
}

export function normalizeLanguage(language: string | null | undefined): string {
  const normalized = (language ?? '').trim().toLowerCase();
  return normalized || DEFAULT_EVALUATION_LANGUAGE;
}

/**
 * Renders the last two turns as `Q: ...\nA: ...\n` blocks.
 */
export function renderEvaluationContext(
  turns: ReadonlyArray<{ question: string; answer: string }>
): string {
  return turns
    .slice(-EVALUATION_CONTEXT_TURNS)
    .map((turn) => `Q: ${turn.question}\nA: ${turn.answer}\n`)
    .join('');
}

export function deriveEvaluationCacheKey(input: EvaluationKeyInput): string {
  const material = [
    input.sessionId,
    input.context,
    input.code.trim(),
    input.problem ?? '',
    normalizeLanguage(input.language),
  ].join('|');
  return createHash('sha256').update(material, 'utf8').digest('hex');
}
