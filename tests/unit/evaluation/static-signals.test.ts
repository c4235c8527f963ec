/**
 * Unit Tests: Static Code Signals
 */

import { describe, it, expect } from 'vitest';
import { analyzeStaticSignals, commentDensity } from '../../../src/core/evaluation';

const MEMO_FIB = [
  'def fib(n, memo={}):',
  '    if n in memo:',
  '        return memo[n]',
  '    if n < 2:',
  '        return n',
  '    memo[n] = fib(n - 1, memo) + fib(n - 2, memo)',
  '    return memo[n]',
].join('\n');

const NESTED_PAIRS = [
  'def pairs(nums):',
  '    # brute force',
  '    out = []',
  '    for i in range(len(nums)):',
  '        for j in range(i + 1, len(nums)):',
  '            out.append((nums[i], nums[j]))',
  '    return out',
].join('\n');

const JS_FACTORIAL = [
  'function fact(n) {',
  '  if (n <= 1) return 1;',
  '  return n * fact(n - 1);',
  '}',
  'const doubled = [1, 2].map((x) => x * 2);',
].join('\n');

describe('analyzeStaticSignals', () => {
  it('should detect memoized recursion in Python', () => {
    expect(analyzeStaticSignals(MEMO_FIB, 'python')).toEqual({
      usesRecursion: true,
      usesMemoization: true,
      usesDynamicProgramming: false,
      loopNestingDepth: 0,
      usesSlicingHeavily: false,
      usesListOrSetComprehension: false,
      functionCount: 1,
      commentDensity: 0,
      estimatedTimeComplexityHint: 'Recursive with memoization; likely polynomial',
    });
  });

  it('should measure loop nesting from indentation', () => {
    expect(analyzeStaticSignals(NESTED_PAIRS, 'python')).toEqual({
      usesRecursion: false,
      usesMemoization: false,
      usesDynamicProgramming: false,
      loopNestingDepth: 2,
      usesSlicingHeavily: false,
      usesListOrSetComprehension: false,
      functionCount: 1,
      commentDensity: 0.167,
      estimatedTimeComplexityHint: 'Likely O(n^2) due to nested loops',
    });
  });

  it('should fall back to keyword heuristics for other languages', () => {
    expect(analyzeStaticSignals(JS_FACTORIAL, 'javascript')).toEqual({
      usesRecursion: true,
      usesMemoization: false,
      usesDynamicProgramming: false,
      loopNestingDepth: 0,
      usesSlicingHeavily: false,
      usesListOrSetComprehension: true,
      functionCount: 1,
      commentDensity: 0,
      estimatedTimeComplexityHint: 'Recursive without memoization; may be exponential',
    });
  });

  it('should detect a dp table and brace-delimited nested loops', () => {
    const code = [
      'for (let i = 0; i < n; i++) {',
      '  for (let j = 0; j < n; j++) {',
      '    dp[i][j] = 0;',
      '  }',
      '}',
    ].join('\n');

    const signals = analyzeStaticSignals(code, 'typescript');

    expect(signals.loopNestingDepth).toBe(2);
    expect(signals.usesDynamicProgramming).toBe(true);
  });

  it('should flag heavy slicing by colon count', () => {
    const code = 'a = b[1:2] + b[2:3] + b[3:4] + b[4:5] + b[5:6] + b[6:7] + b[7:8] + b[8:9] + b[9:10] + b[0:1] + b[1:3]';

    expect(analyzeStaticSignals(code, 'python').usesSlicingHeavily).toBe(true);
  });
});

describe('commentDensity', () => {
  it('should cap the ratio at 1', () => {
    expect(commentDensity('// a\n// b\nx = 1', 'javascript')).toBe(1);
  });

  it('should return 0 when there are no code lines', () => {
    expect(commentDensity('# only a comment', 'python')).toBe(0);
  });

  it('should only count hash comments in Python', () => {
    expect(commentDensity('x = 7\n// not a comment\n# note', 'python')).toBe(0.5);
  });
});
