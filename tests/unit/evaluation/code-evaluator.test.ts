/**
 * Unit Tests: Code Evaluator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CodeEvaluator, EvaluationCache } from '../../../src/core/evaluation';
import { CODE_CRITIQUE_SYSTEM_PROMPT, CODE_CRITIQUE_TEMPERATURE } from '../../../src/llm/prompts';
import { FakeModelClient, RecordingAuditSink } from '../../setup';
import { steppingClock } from '../../helpers';

const CRITIQUE = [
  'Summary:',
  'Correct two-pointer solution.',
  '',
  'Strengths:',
  '- Linear time',
  '',
  'Weaknesses:',
  '- No input validation',
  '',
  'Scores: {"correctness":0.9,"optimization":0.8,"approach_explanation":0.6,"complexity_discussion":0.5,"edge_cases_testing":0.4,"total":0.7}',
  '',
  'Recommendations:',
  '- Handle empty input',
].join('\n');

describe('CodeEvaluator', () => {
  let model: FakeModelClient;
  let audit: RecordingAuditSink;
  let evaluator: CodeEvaluator;

  beforeEach(() => {
    model = new FakeModelClient();
    model.reply = () => CRITIQUE;
    audit = new RecordingAuditSink();
    evaluator = new CodeEvaluator({
      model,
      audit,
      cache: new EvaluationCache({ maxEntries: 10, ttlMs: 0, policy: 'lru' }),
      now: steppingClock('2026-03-01T10:00:00.000Z'),
    });
  });

  it('should combine static signals and the parsed critique', async () => {
    // Act
    const result = await evaluator.evaluate({
      sessionId: 's1',
      problem: 'two sum',
      code: 'def solve(nums):\n    return nums',
      language: 'Python',
    });

    // Assert
    expect(result.sessionId).toBe('s1');
    expect(result.language).toBe('python');
    expect(result.problem).toBe('two sum');
    expect(result.approachAutoExplanation).toBe('Correct two-pointer solution.');
    expect(result.feedbackSummary).toBe('Correct two-pointer solution.');
    expect(result.strengths).toEqual(['Linear time']);
    expect(result.weaknesses).toEqual(['No input validation']);
    expect(result.recommendations).toEqual(['Handle empty input']);
    expect(result.scores.total).toBe(0.7);
    expect(result.staticSignals.functionCount).toBe(1);
    expect(result.createdAt).toBe('2026-03-01T10:00:00.000Z');
  });

  it('should send the critique prompt with the conversation context', async () => {
    await evaluator.evaluate({ sessionId: 's1', code: 'x = 1', context: 'Q: q\nA: a\n' });

    expect(model.requests).toHaveLength(1);
    const request = model.requests[0];
    expect(request?.system).toBe(`${CODE_CRITIQUE_SYSTEM_PROMPT}\n\nRecent conversation:\nQ: q\nA: a\n`);
    expect(request?.temperature).toBe(CODE_CRITIQUE_TEMPERATURE);
    expect(request?.messages).toEqual([
      { role: 'user', content: 'Problem: N/A\nLanguage: python\n\nCode:\n```python\nx = 1\n```' },
    ]);
  });

  it('should serve a repeated request from the cache', async () => {
    // Arrange
    const request = { sessionId: 's1', problem: 'p', code: 'x = 1' };

    // Act
    const first = await evaluator.evaluate(request);
    const second = await evaluator.evaluate({ ...request, code: 'x = 1\n' });

    // Assert
    expect(second).toEqual(first);
    expect(model.requests).toHaveLength(1);
    expect(audit.ofType('evaluation')).toHaveLength(1);
  });

  it('should not share results between sessions', async () => {
    await evaluator.evaluate({ sessionId: 's1', code: 'x = 1' });
    const other = await evaluator.evaluate({ sessionId: 's2', code: 'x = 1' });

    expect(other.sessionId).toBe('s2');
    expect(model.requests).toHaveLength(2);
  });

  it('should parse the offline critique without a model', async () => {
    model.enabled = false;

    const result = await evaluator.evaluate({ sessionId: 's1', code: 'x = 1' });

    expect(model.requests).toHaveLength(0);
    expect(result.feedbackSummary).toBe('Offline mode. Cannot evaluate without a language model.');
    expect(result.scores.total).toBe(0);
  });

  it('should record an audit entry per fresh evaluation', async () => {
    await evaluator.evaluate({ sessionId: 's1', problem: 'p', code: 'x = 1', language: 'go' });

    expect(audit.entries).toEqual([
      {
        type: 'evaluation',
        sessionId: 's1',
        problem: 'p',
        language: 'go',
        scores: {
          correctness: 0.9,
          optimization: 0.8,
          approachExplanation: 0.6,
          complexityDiscussion: 0.5,
          edgeCasesTesting: 0.4,
          total: 0.7,
        },
      },
    ]);
  });

  it('should propagate model failures', async () => {
    model.error = new Error('model down');

    await expect(evaluator.evaluate({ sessionId: 's1', code: 'x = 1' })).rejects.toThrow('model down');
  });
});
