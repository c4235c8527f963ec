/**
 * Answer Service
 *
 * Runs the question flow end to end:
 *
 * 1. Read the session (history and profile) without taking the store queue
 * 2. Classify the question and assemble the layered system prompt
 * 3. Call the model, outside any lock
 * 4. Normalize the raw answer
 * 5. Append the turn (the only serialized step) and write a `qna` audit record
 * 6. If the answer carries a code block, evaluate it in the background
 *
 * Streaming yields raw model chunks as they arrive. Whatever was collected is
 * normalized and persisted when the stream finishes, when the consumer stops
 * early, and when the model fails midway (the failure is rethrown after).
 */

import { classifyQuestion } from '../classification';
import {
  assemblePrompt,
  buildMessages,
  estimateMaxTokens,
  type OverridePolicy,
  type StyleOptions,
  type TokenBudget,
} from '../prompting';
import { normalizeResponse } from '../formatting';
import {
  largestCodeBlock,
  renderEvaluationContext,
  type CodeEvaluator,
} from '../evaluation';
import type { SessionStore } from '../session';
import type { AuditSink } from '../audit';
import type { CompletionRequest, ModelClient } from '../../llm/types';

export interface AnswerSettings {
  temperature: number;
  topP?: number;
  /** Fixed output ceiling; when unset the per-question estimate applies */
  maxTokens?: number;
  tokenBudget: TokenBudget;
  policy: OverridePolicy;
}

export interface AnswerServiceDeps {
  store: SessionStore;
  model: ModelClient;
  audit: AuditSink;
  settings: AnswerSettings;
  /** Background evaluation of code in answers; disabled when null */
  evaluator: CodeEvaluator | null;
}

export interface QuestionInput {
  sessionId: string;
  question: string;
  systemPrompt?: string | null;
  style?: StyleOptions;
  signal?: AbortSignal;
}

export interface AnswerResult {
  answer: string;
  createdAt: Date;
}

export class AnswerService {
  private readonly pendingEvaluations = new Set<Promise<void>>();

  constructor(private readonly deps: AnswerServiceDeps) {}

  estimateMaxTokens(question: string): number {
    const { tokenBudget, maxTokens } = this.deps.settings;
    return estimateMaxTokens(question, tokenBudget, maxTokens);
  }

  /**
   * @throws {SessionNotFoundError} Before the model is called
   * @throws {LLMError} When the model call fails; nothing is persisted
   */
  async answer(input: QuestionInput): Promise<AnswerResult> {
    const request = await this.prepare(input);
    const raw = await this.deps.model.complete(request);
    const persisted = await this.persist(input, raw);
    return persisted ?? { answer: '', createdAt: new Date() };
  }

  /**
   * Yields raw chunks; the generator's return value is the persisted result,
   * or null when the model produced no text.
   */
  async *streamAnswer(input: QuestionInput): AsyncGenerator<string, AnswerResult | null> {
    const request = await this.prepare(input);
    let raw = '';
    let persisted: AnswerResult | null = null;

    try {
      for await (const chunk of this.deps.model.stream(request)) {
        raw += chunk;
        yield chunk;
      }
    } finally {
      persisted = await this.persist(input, raw);
    }

    return persisted;
  }

  /** Resolves once every background evaluation started so far has settled. */
  async settled(): Promise<void> {
    await Promise.all([...this.pendingEvaluations]);
  }

  private async prepare(input: QuestionInput): Promise<CompletionRequest> {
    const session = await this.deps.store.require(input.sessionId);
    const hasHistory = session.turns.length > 0;
    const classification = classifyQuestion(input.question, hasHistory);

    const system = assemblePrompt({
      basePrompt: input.systemPrompt,
      profileText: session.profileText,
      classification,
      style: input.style,
      policy: this.deps.settings.policy,
    });

    return {
      system,
      messages: buildMessages(session.turns, input.question),
      maxTokens: this.estimateMaxTokens(input.question),
      temperature: this.deps.settings.temperature,
      topP: this.deps.settings.topP,
      signal: input.signal,
    };
  }

  private async persist(input: QuestionInput, raw: string): Promise<AnswerResult | null> {
    const answer = normalizeResponse(raw);
    if (!answer) {
      return null;
    }

    const turn = await this.deps.store.appendTurn(input.sessionId, input.question, answer);
    void this.deps.audit.record({
      type: 'qna',
      sessionId: input.sessionId,
      question: input.question,
      answer,
    });

    this.scheduleEvaluation(input.sessionId, input.question, answer);
    return { answer: turn.answer, createdAt: turn.createdAt };
  }

  private scheduleEvaluation(sessionId: string, question: string, answer: string): void {
    const evaluator = this.deps.evaluator;
    if (!evaluator) return;

    const block = largestCodeBlock(answer);
    if (!block) return;

    const task = this.autoEvaluate(evaluator, sessionId, question, block.body, block.language);
    this.pendingEvaluations.add(task);
    void task.finally(() => this.pendingEvaluations.delete(task));
  }

  private async autoEvaluate(
    evaluator: CodeEvaluator,
    sessionId: string,
    question: string,
    code: string,
    language: string
  ): Promise<void> {
    try {
      const session = await this.deps.store.require(sessionId);
      await evaluator.evaluate({
        sessionId,
        problem: question,
        code,
        language: language || 'python',
        context: renderEvaluationContext(session.turns),
      });
      void this.deps.audit.record({
        type: 'auto_evaluation',
        sessionId,
        question,
        language: language || 'python',
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[Evaluation] Auto-evaluation failed for session ${sessionId}:`, message);
      void this.deps.audit.record({ type: 'auto_evaluation_error', sessionId, error: message });
    }
  }
}
