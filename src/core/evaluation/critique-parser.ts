/**
 * Parses the fixed-format critique text returned by the model (or the
 * offline stand-in) into sections, bullets and scores.
 *
 * Model output drifts, so every part is optional: a missing section yields
 * an empty string or list and unreadable scores stay at zero.
 */

import { z } from 'zod';
import type { EvaluationScores } from './types';

export interface ParsedCritique {
  summary: string;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  scores: EvaluationScores;
}

const SECTION_TITLES = ['Summary', 'Strengths', 'Weaknesses', 'Scores', 'Recommendations'] as const;
type SectionTitle = (typeof SECTION_TITLES)[number];

export const ZERO_SCORES: Readonly<EvaluationScores> = Object.freeze({
  correctness: 0,
  optimization: 0,
  approachExplanation: 0,
  complexityDiscussion: 0,
  edgeCasesTesting: 0,
  total: 0,
});

const score = z.coerce.number().finite().optional();

/** Accepts snake_case (as the prompt asks) and camelCase keys. */
const scoresSchema = z
  .object({
    correctness: score,
    optimization: score,
    approach_explanation: score,
    approachExplanation: score,
    complexity_discussion: score,
    complexityDiscussion: score,
    edge_cases_testing: score,
    edgeCasesTesting: score,
    total: score,
  })
  .passthrough();

const HEADING_PATTERN = new RegExp(`^\\s*(${SECTION_TITLES.join('|')}):`, 'gm');

function sections(text: string): Map<SectionTitle, string> {
  const found = [...text.matchAll(HEADING_PATTERN)];
  const result = new Map<SectionTitle, string>();

  found.forEach((match, i) => {
    const title = SECTION_TITLES.find((t) => t === match[1]);
    if (!title || result.has(title)) return;
    const start = (match.index ?? 0) + match[0].length;
    const end = found[i + 1]?.index ?? text.length;
    result.set(title, text.slice(start, end).trim());
  });

  return result;
}

export function parseBullets(section: string): string[] {
  return section
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.startsWith('- '))
    .map((line) => line.slice(2).trim())
    .filter((line) => line.length > 0);
}

/**
 * Reads the first `{...}` object after `Scores:` and merges it over zeros.
 */
export function parseScores(section: string | undefined): EvaluationScores {
  const scores: EvaluationScores = { ...ZERO_SCORES };
  if (!section) return scores;

  const start = section.indexOf('{');
  const end = section.indexOf('}', start);
  if (start === -1 || end === -1) return scores;

  const raw = safeJsonParse(section.slice(start, end + 1));
  const parsed = scoresSchema.safeParse(raw);
  if (!parsed.success) return scores;

  const s = parsed.data;
  return {
    correctness: s.correctness ?? scores.correctness,
    optimization: s.optimization ?? scores.optimization,
    approachExplanation: s.approach_explanation ?? s.approachExplanation ?? scores.approachExplanation,
    complexityDiscussion:
      s.complexity_discussion ?? s.complexityDiscussion ?? scores.complexityDiscussion,
    edgeCasesTesting: s.edge_cases_testing ?? s.edgeCasesTesting ?? scores.edgeCasesTesting,
    total: s.total ?? scores.total,
  };
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function parseCritique(text: string): ParsedCritique {
  const found = sections(text);
  return {
    summary: found.get('Summary') ?? '',
    strengths: parseBullets(found.get('Strengths') ?? ''),
    weaknesses: parseBullets(found.get('Weaknesses') ?? ''),
    recommendations: parseBullets(found.get('Recommendations') ?? ''),
    scores: parseScores(found.get('Scores')),
  };
}
