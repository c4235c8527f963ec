/**
 * Per-question output token estimate. A configured ceiling always wins;
 * otherwise the question's wording picks one of three tiers.
 */

export interface TokenBudget {
  simple: number;
  code: number;
  complex: number;
}

const SIMPLE_INDICATORS = ['what is', 'define', 'explain briefly', 'simple', 'basic'];
const CODE_INDICATORS = ['code', 'implement', 'write', 'function', 'class', 'algorithm'];
const COMPLEX_INDICATORS = [
  'architecture',
  'design',
  'system',
  'compare',
  'advantages',
  'disadvantages',
  'best practices',
];

export function estimateResponseTokens(question: string, budget: TokenBudget): number {
  const q = question.toLowerCase();
  if (SIMPLE_INDICATORS.some((indicator) => q.includes(indicator))) return budget.simple;
  if (CODE_INDICATORS.some((indicator) => q.includes(indicator))) return budget.code;
  if (COMPLEX_INDICATORS.some((indicator) => q.includes(indicator))) return budget.complex;
  return Math.floor((budget.simple + budget.code) / 2);
}

/**
 * @param fixedLimit - `ANTHROPIC_MAX_TOKENS`, when configured
 */
export function estimateMaxTokens(question: string, budget: TokenBudget, fixedLimit?: number): number {
  if (fixedLimit) return fixedLimit;
  return Math.min(estimateResponseTokens(question, budget), budget.complex * 2);
}
