/**
 * Diagram source clean-up that runs before any structural repair, plus the
 * size guard callers apply before repairing or rendering.
 */

import { DiagramTooLargeError } from '../errors';

/** Largest diagram source accepted for repair or rendering. */
export const MAX_DIAGRAM_CHARS = 40_000;

/**
 * Removes leading fence lines (```` ``` ```` or ```` ```mermaid ````) and their
 * closing fences, as many layers as the model wrapped the body in.
 */
export function stripDiagramFences(source: string): string {
  let text = source.trim();
  while (text.startsWith('```')) {
    const firstNewline = text.indexOf('\n');
    text = firstNewline === -1 ? '' : text.slice(firstNewline + 1);
    if (text.trimEnd().endsWith('```')) {
      text = text.slice(0, text.lastIndexOf('```'));
    }
    text = text.trim();
  }
  return text;
}

/** A line left over from a broken fence: backticks, optionally `mermaid`. */
const BACKTICK_ARTIFACT_LINE = /^`+\s*(mermaid)?$/i;

/**
 * Drops leftover fence lines and backticks outside double-quoted labels.
 * Quoted labels keep theirs: Mermaid reads "`text`" as a markdown string.
 */
export function stripStrayBackticks(source: string): string {
  return source
    .split('\n')
    .filter((line) => !BACKTICK_ARTIFACT_LINE.test(line.trim()))
    .map((line) =>
      line
        .split('"')
        .map((part, index) => (index % 2 === 0 ? part.replace(/`/g, '') : part))
        .join('"')
    )
    .join('\n');
}

const CHARACTER_REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/\r\n?/g, '\n'],
  // Smart double and single quotes, primes
  [/[\u201C\u201D\u201E\u201F\u2033]/g, '"'],
  [/[\u2018\u2019\u201A\u201B\u2032]/g, "'"],
  // Hyphen, dash and minus variants
  [/[\u2010-\u2015\u2212]/g, '-'],
  // Non-breaking and narrow spaces
  [/[\u00A0\u2007\u202F]/g, ' '],
  // Zero-width characters and BOM
  [/[\u200B-\u200D\u2060\uFEFF]/g, ''],
];

/**
 * Maps typographic characters that break the Mermaid lexer to ASCII, drops
 * invisible characters and trailing whitespace.
 */
export function normalizeDiagramText(source: string): string {
  let text = source;
  for (const [pattern, replacement] of CHARACTER_REPLACEMENTS) {
    text = text.replace(pattern, replacement);
  }
  return text
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();
}

/**
 * @throws {DiagramTooLargeError} When the source exceeds `limit` characters
 */
export function assertDiagramSize(source: string, limit: number = MAX_DIAGRAM_CHARS): void {
  if (source.length > limit) {
    throw new DiagramTooLargeError(source.length, limit);
  }
}
