/**
 * Evaluation Module - Barrel Export
 *
 * Code evaluation for interview answers: static signals, the model
 * critique parser, the bounded result cache and the evaluator tying them
 * together.
 */

export type {
  EvaluationScores,
  StaticSignals,
  EvaluationResult,
  EvaluationRequest,
} from './types';

export {
  DEFAULT_EVALUATION_LANGUAGE,
  EVALUATION_CONTEXT_TURNS,
  deriveEvaluationCacheKey,
  normalizeLanguage,
  renderEvaluationContext,
  type EvaluationKeyInput,
} from './cache-key';

export {
  EvaluationCache,
  type EvaluationCacheOptions,
  type EvictionPolicy,
} from './evaluation-cache';

export { analyzeStaticSignals, commentDensity, isPythonLanguage } from './static-signals';
export { parseCritique, parseBullets, parseScores, ZERO_SCORES, type ParsedCritique } from './critique-parser';
export { extractFencedBlocks, largestCodeBlock, type FencedBlock } from './code-blocks';
export { CodeEvaluator, type CodeEvaluatorDeps } from './code-evaluator';
