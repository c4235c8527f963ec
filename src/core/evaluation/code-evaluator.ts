/**
 * Code Evaluator
 *
 * Produces an `EvaluationResult` for a candidate's code: static signals read
 * from the source plus a model critique parsed into sections and scores.
 * Results are cached per (session, context, code, problem, language); a hit
 * returns the stored result with the caller's session id.
 *
 * Without a configured model the fixed offline critique is parsed instead,
 * so the endpoint still answers with zero scores.
 */

import type { AuditSink } from '../audit';
import type { ModelClient } from '../../llm/types';
import {
  CODE_CRITIQUE_SYSTEM_PROMPT,
  CODE_CRITIQUE_TEMPERATURE,
  CODE_CRITIQUE_MAX_TOKENS,
  OFFLINE_CRITIQUE,
  buildCodeCritiqueUserMessage,
} from '../../llm/prompts';
import { deriveEvaluationCacheKey, normalizeLanguage } from './cache-key';
import type { EvaluationCache } from './evaluation-cache';
import { parseCritique } from './critique-parser';
import { analyzeStaticSignals } from './static-signals';
import type { EvaluationRequest, EvaluationResult } from './types';

export interface CodeEvaluatorDeps {
  model: ModelClient;
  cache: EvaluationCache;
  audit: AuditSink;
  now?: () => Date;
}

export class CodeEvaluator {
  private readonly now: () => Date;

  constructor(private readonly deps: CodeEvaluatorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async evaluate(request: EvaluationRequest): Promise<EvaluationResult> {
    const language = normalizeLanguage(request.language);
    const problem = request.problem ?? null;
    const context = request.context ?? '';
    const key = deriveEvaluationCacheKey({
      sessionId: request.sessionId,
      context,
      code: request.code,
      problem,
      language,
    });

    const cached = this.deps.cache.get(key);
    if (cached) {
      return { ...cached, sessionId: request.sessionId };
    }

    const staticSignals = analyzeStaticSignals(request.code, language);
    const critiqueText = await this.critique(problem ?? '', request.code, language, context);
    const critique = parseCritique(critiqueText);

    const result: EvaluationResult = {
      sessionId: request.sessionId,
      problem,
      language,
      approachAutoExplanation: critique.summary,
      feedbackSummary: critique.summary,
      strengths: critique.strengths,
      weaknesses: critique.weaknesses,
      recommendations: critique.recommendations,
      scores: critique.scores,
      staticSignals,
      createdAt: this.now().toISOString(),
    };

    this.deps.cache.put(key, result);
    await this.deps.audit.record({
      type: 'evaluation',
      sessionId: request.sessionId,
      problem,
      language,
      scores: result.scores,
    });

    return result;
  }

  private async critique(
    problem: string,
    code: string,
    language: string,
    context: string
  ): Promise<string> {
    if (!this.deps.model.enabled) {
      return OFFLINE_CRITIQUE;
    }

    const userMessage = buildCodeCritiqueUserMessage({ problem, code, language });
    return this.deps.model.complete({
      system: context
        ? `${CODE_CRITIQUE_SYSTEM_PROMPT}\n\nRecent conversation:\n${context}`
        : CODE_CRITIQUE_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: userMessage }],
      maxTokens: CODE_CRITIQUE_MAX_TOKENS,
      temperature: CODE_CRITIQUE_TEMPERATURE,
    });
  }
}
