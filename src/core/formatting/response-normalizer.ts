/**
 * Response Normalizer
 *
 * Rewrites raw model markdown into the shape the front end renders. The
 * text's content kind picks a transform list:
 *
 * - diagram: repair every Mermaid block, fence bare diagrams, drop
 *   placeholders outside fences. No table or bullet heuristics.
 * - code: undo pipe-formatted code lines; with a fence present, also the
 *   prose clean-ups outside fences. Never builds a table.
 * - explanation: metric rows become labelled lines, summary headings move
 *   to level 2, then prose clean-ups.
 * - general: summary headings, canonical pipe tables, Complete Answer label
 *   stripping, then prose clean-ups. Any diagram routes the text to the
 *   diagram path instead.
 *
 * Every step keeps its input when it throws, so normalization never fails.
 */

import { normalizeEmbeddedDiagrams } from '../diagrams';
import { applyTransforms, hasFence, type TextTransform } from '../text/transform-pipeline';
import { repairPipeFormattedCode } from './code-cleanup';
import { detectContentKind, type ContentKind } from './content-kind';
import { cleanExplanationFormatting } from './explanation';
import { boldHeadings, formatSummaryHeadings, stripCompleteAnswerLabels, stripMathMarkers } from './markdown';
import { removePlaceholders } from './placeholders';
import { formatPipeTables } from './tables';

const step = (name: string, apply: (text: string) => string): TextTransform => ({ name, apply });

const PLACEHOLDERS = step('remove-placeholders', removePlaceholders);
const HEADINGS = step('bold-headings', boldHeadings);
const MATH = step('strip-math', stripMathMarkers);
const DIAGRAMS = step('normalize-diagrams', normalizeEmbeddedDiagrams);
const SUMMARIES = step('format-summary-headings', formatSummaryHeadings);

export function buildNormalizationSteps(kind: ContentKind, text: string): TextTransform[] {
  switch (kind) {
    case 'diagram':
      return [DIAGRAMS, PLACEHOLDERS];
    case 'code':
      return hasFence(text)
        ? [step('repair-pipe-code', repairPipeFormattedCode), PLACEHOLDERS, HEADINGS, MATH]
        : [step('repair-pipe-code', repairPipeFormattedCode)];
    case 'explanation':
      return [step('clean-explanation', cleanExplanationFormatting), SUMMARIES, PLACEHOLDERS, HEADINGS, MATH];
    case 'general':
      return [
        SUMMARIES,
        step('format-tables', formatPipeTables),
        step('strip-complete-answer-labels', stripCompleteAnswerLabels),
        PLACEHOLDERS,
        HEADINGS,
        MATH,
      ];
  }
}

export function normalizeResponse(raw: string): string {
  const text = raw.trim();
  if (!text) return '';
  const kind = detectContentKind(text);
  return applyTransforms(text, buildNormalizationSteps(kind, text), '[Formatting]');
}
