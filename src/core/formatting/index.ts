/**
 * Model output normalization.
 */

export { normalizeResponse, buildNormalizationSteps } from './response-normalizer';
export {
  detectContentKind,
  isCodeContent,
  isExplanationContent,
  countCodeSignals,
  CODE_SIGNAL_THRESHOLD,
  type ContentKind,
} from './content-kind';
export { formatPipeTables, canonicalizeTable, isPipeRow, splitRow } from './tables';
export { removePlaceholders, placeholderReplacement } from './placeholders';
export { boldHeadings, formatSummaryHeadings, stripMathMarkers, stripCompleteAnswerLabels } from './markdown';
export { repairPipeFormattedCode, unpipeCodeLine } from './code-cleanup';
export { cleanExplanationFormatting, canonicalMetricName } from './explanation';
