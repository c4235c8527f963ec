/**
 * Question Classifier
 *
 * Tags an incoming question with independent response-mode flags. Every
 * predicate is a substring check over the lowercased question against the
 * lists in `keywords.json`; none of them look at the model or the network,
 * and none of them throw.
 *
 * The tags drive which override blocks the prompt assembler emits. They are
 * recomputed per request and never stored.
 */

import keywords from './keywords.json';

/**
 * Result of classifying a single question.
 */
export interface ClassificationResult {
  readonly greeting: boolean;
  readonly offTopic: boolean;
  readonly ambiguous: boolean;
  readonly needsComparison: boolean;
  readonly needsFirstPerson: boolean;
  readonly technicalStrategy: boolean;
  readonly systemDesign: boolean;
  readonly databaseSchema: boolean;
  readonly uiDesign: boolean;
  readonly algorithm: boolean;
  /** Only ever true when there is prior history to lean on */
  readonly hasSufficientContext: boolean;
}

function containsAny(text: string, needles: readonly string[]): boolean {
  return needles.some((needle) => text.includes(needle));
}

export function isGreeting(question: string): boolean {
  const q = question.replace(/[!.,]/g, '').trim().toLowerCase();
  if (!q) return false;
  if (keywords.greeting.exact.includes(q)) return true;
  return keywords.greeting.prefixes.some((prefix) => q.startsWith(prefix));
}

export function isOffTopic(question: string): boolean {
  const q = question.toLowerCase();
  if (!q.trim()) return false;
  return containsAny(q, keywords.offTopic.keywords) || containsAny(q, keywords.offTopic.smallTalk);
}

export function isAmbiguous(question: string): boolean {
  const trimmed = question.trim();
  if (trimmed.length < 10) return true;

  const q = trimmed.toLowerCase();
  if (!containsAny(q, keywords.ambiguous.openers)) return false;

  const wordCount = trimmed.split(/\s+/).length;
  return wordCount < 5 || !containsAny(q, keywords.ambiguous.technicalTerms);
}

export function needsComparison(question: string): boolean {
  return containsAny(question.toLowerCase(), keywords.comparison);
}

export function isTechnicalStrategy(question: string): boolean {
  const q = question.toLowerCase();
  const { indicators, questionWords, personalPhrases } = keywords.technicalStrategy;
  return containsAny(q, indicators) && containsAny(q, questionWords) && !containsAny(q, personalPhrases);
}

/**
 * Behavioral and resume questions, answered in the candidate's voice.
 * Strategy questions ("how would you improve latency") win over the
 * personal wording they often contain.
 */
export function needsFirstPerson(question: string): boolean {
  if (isTechnicalStrategy(question)) return false;
  const q = question.toLowerCase();
  return containsAny(q, keywords.firstPerson.indicators) || containsAny(q, keywords.firstPerson.references);
}

export function isSystemDesign(question: string): boolean {
  const q = question.toLowerCase();
  if (containsAny(q, keywords.systemDesign.exclusions)) return false;
  return containsAny(q, keywords.systemDesign.keywords);
}

export function isDatabaseSchema(question: string): boolean {
  return containsAny(question.toLowerCase(), keywords.databaseSchema);
}

export function isUiDesign(question: string): boolean {
  return containsAny(question.toLowerCase(), keywords.uiDesign);
}

export function isAlgorithm(question: string): boolean {
  return containsAny(question.toLowerCase(), keywords.algorithm);
}

export function hasSufficientContext(question: string, hasHistory: boolean): boolean {
  if (!hasHistory) return false;
  const q = question.toLowerCase();
  const { pronouns, references, followUps } = keywords.context;
  return containsAny(q, pronouns) || containsAny(q, references) || containsAny(q, followUps);
}

export function classifyQuestion(question: string, hasHistory: boolean): ClassificationResult {
  return Object.freeze({
    greeting: isGreeting(question),
    offTopic: isOffTopic(question),
    ambiguous: isAmbiguous(question),
    needsComparison: needsComparison(question),
    needsFirstPerson: needsFirstPerson(question),
    technicalStrategy: isTechnicalStrategy(question),
    systemDesign: isSystemDesign(question),
    databaseSchema: isDatabaseSchema(question),
    uiDesign: isUiDesign(question),
    algorithm: isAlgorithm(question),
    hasSufficientContext: hasSufficientContext(question, hasHistory),
  });
}
