/**
 * Bracketed placeholder removal. Models sometimes leave template slots such
 * as `[SPECIFIC FEATURE]` in answers; each becomes a neutral phrase or, when
 * unknown, its own lowercased text.
 */

import { mapLinesOutsideFences, mapOutsideInlineCode } from '../text/transform-pipeline';

const PLACEHOLDER_PHRASES: Readonly<Record<string, string>> = {
  'SPECIFIC FEATURE': 'the feature',
  'SPECIFIC PRODUCT': 'the product',
  'PROJECT GOAL': 'the project goal',
  'SPECIFIC COMPROMISE DETAIL': 'a balanced compromise',
  'FEATURE/PROJECT TASK': 'the task',
  SITUATION: 'the situation',
  TASK: 'the task',
  ACTION: 'the action',
  RESULT: 'the result',
};

/**
 * Innermost `[...]` span of 1 to 80 characters. Escaped brackets (math) and
 * markdown links are not placeholders.
 */
const PLACEHOLDER = /(?<!\\)\[([^\[\]\n]{1,80})\](?!\()/g;

const MAX_PASSES = 10;

export function placeholderReplacement(inner: string): string {
  const trimmed = inner.trim();
  const exact = PLACEHOLDER_PHRASES[trimmed.toUpperCase()];
  if (exact) return exact;

  for (const part of trimmed.split(/[\s/_-]+/)) {
    const phrase = PLACEHOLDER_PHRASES[part.toUpperCase()];
    if (phrase) return phrase;
  }
  return trimmed.toLowerCase();
}

function replaceInSegment(segment: string): string {
  let current = segment;
  // Nested brackets resolve from the inside out
  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const next = current.replace(PLACEHOLDER, (_match, inner: string) => placeholderReplacement(inner));
    if (next === current) break;
    current = next;
  }
  return current;
}

export function removePlaceholders(text: string): string {
  return mapLinesOutsideFences(text, (line) => mapOutsideInlineCode(line, replaceInSegment));
}
