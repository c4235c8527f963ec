/**
 * Evaluation Types
 *
 * Shapes produced by the code evaluator and stored in the evaluation cache.
 * Timestamps are ISO-8601 strings so results serialize unchanged.
 */

export interface EvaluationScores {
  correctness: number;
  optimization: number;
  approachExplanation: number;
  complexityDiscussion: number;
  edgeCasesTesting: number;
  total: number;
}

/**
 * Signals read from the source without running it. Python gets a
 * line-structure analysis, other languages keyword heuristics.
 */
export interface StaticSignals {
  usesRecursion: boolean;
  usesMemoization: boolean;
  usesDynamicProgramming: boolean;
  loopNestingDepth: number;
  usesSlicingHeavily: boolean;
  usesListOrSetComprehension: boolean;
  functionCount: number;
  /** comment lines / code lines, capped at 1 */
  commentDensity: number;
  estimatedTimeComplexityHint: string | null;
}

export interface EvaluationResult {
  sessionId: string;
  problem: string | null;
  language: string;
  approachAutoExplanation: string;
  feedbackSummary: string;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  scores: EvaluationScores;
  staticSignals: StaticSignals;
  createdAt: string;
}

export interface EvaluationRequest {
  sessionId: string;
  problem?: string | null;
  code: string;
  language?: string | null;
  /** Recent conversation, rendered with `renderEvaluationContext` */
  context?: string;
}
