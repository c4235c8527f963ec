/**
 * Question classification: keyword-driven response-mode tags.
 */

export type { ClassificationResult } from './question-classifier';
export {
  classifyQuestion,
  isGreeting,
  isOffTopic,
  isAmbiguous,
  needsComparison,
  needsFirstPerson,
  isTechnicalStrategy,
  isSystemDesign,
  isDatabaseSchema,
  isUiDesign,
  isAlgorithm,
  hasSufficientContext,
} from './question-classifier';
export { default as classifierKeywords } from './keywords.json';
