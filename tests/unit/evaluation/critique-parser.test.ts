/**
 * Unit Tests: Critique Parsing and Code Block Extraction
 */

import { describe, it, expect } from 'vitest';
import { largestCodeBlock, parseCritique, parseScores, ZERO_SCORES } from '../../../src/core/evaluation';
import { OFFLINE_CRITIQUE } from '../../../src/llm/prompts';

describe('parseCritique', () => {
  it('should parse the offline critique', () => {
    expect(parseCritique(OFFLINE_CRITIQUE)).toEqual({
      summary: 'Offline mode. Cannot evaluate without a language model.',
      strengths: ['Runs locally'],
      weaknesses: ['No language model available'],
      recommendations: ['Configure ANTHROPIC_API_KEY'],
      scores: ZERO_SCORES,
    });
  });

  it('should tolerate preamble, missing sections and drifted score keys', () => {
    // Arrange
    const text = [
      'Here is my review.',
      'Summary:',
      'Solid hash map solution.',
      'Strengths:',
      '- Linear time',
      '-   ',
      '- Clear names',
      'Scores: {"correctness": "0.9", "optimization": 0.8, "approachExplanation": 0.5, "total": 0.7} trailing',
    ].join('\n');

    // Act
    const critique = parseCritique(text);

    // Assert
    expect(critique).toEqual({
      summary: 'Solid hash map solution.',
      strengths: ['Linear time', 'Clear names'],
      weaknesses: [],
      recommendations: [],
      scores: {
        correctness: 0.9,
        optimization: 0.8,
        approachExplanation: 0.5,
        complexityDiscussion: 0,
        edgeCasesTesting: 0,
        total: 0.7,
      },
    });
  });

  it('should return empty parts for free text', () => {
    expect(parseCritique('Looks fine to me.')).toEqual({
      summary: '',
      strengths: [],
      weaknesses: [],
      recommendations: [],
      scores: ZERO_SCORES,
    });
  });
});

describe('parseScores', () => {
  it('should keep zeros when the object is not valid JSON', () => {
    expect(parseScores('{correctness: high}')).toEqual(ZERO_SCORES);
  });

  it('should keep zeros when there is no object', () => {
    expect(parseScores('n/a')).toEqual(ZERO_SCORES);
    expect(parseScores(undefined)).toEqual(ZERO_SCORES);
  });

  it('should read snake_case keys', () => {
    expect(parseScores('{"complexity_discussion": 0.4, "edge_cases_testing": 0.3}')).toEqual({
      ...ZERO_SCORES,
      complexityDiscussion: 0.4,
      edgeCasesTesting: 0.3,
    });
  });
});

describe('largestCodeBlock', () => {
  it('should pick the longest non-diagram block', () => {
    const text = [
      '```mermaid',
      'flowchart LR',
      'A-->B',
      'C-->D',
      '```',
      'text',
      '```python',
      'x = 1',
      '```',
      '```js',
      'console.log(1)',
      '```',
    ].join('\n');

    expect(largestCodeBlock(text)).toEqual({ language: 'js', body: 'console.log(1)' });
  });

  it('should return null without code blocks', () => {
    expect(largestCodeBlock('```mermaid\nA-->B\n```')).toBeNull();
    expect(largestCodeBlock('no code here')).toBeNull();
  });
});
