/**
 * Content kind detection. Order matters: diagrams are checked before code,
 * and code before explanations, because each later path runs rewrites that
 * would damage the earlier kinds.
 */

import { containsDiagram } from '../diagrams';

export type ContentKind = 'diagram' | 'code' | 'explanation' | 'general';

/** Line-anchored signals that a text is source code rather than prose. */
const CODE_SIGNALS: readonly RegExp[] = [
  /^\s*def\s+\w+\s*\(/m,
  /^\s*class\s+\w+/m,
  /^\s*import\s+\w+/m,
  /^\s*from\s+[\w.]+\s+import\b/m,
  /^\s*if\s+__name__\s*==\s*["']__main__["']/m,
  /^\s*return\b/m,
  /^\s*while\b.*:\s*$/m,
  /^\s*for\s+\w+\s+in\s+.+:\s*$/m,
  // Indented so a markdown H1 never counts
  /^\s+#\s*[A-Z]/m,
];

export const CODE_SIGNAL_THRESHOLD = 2;
const INDENTED_RATIO = 0.3;

const EXPLANATION_PATTERNS: readonly RegExp[] = [
  /Time\s*Complexity/i,
  /Space\s*Complexity/i,
  /How\s+it\s+works/i,
  /Key\s+Features/i,
  /Time:\s*O\(/i,
  /Space:\s*O\(/i,
  /Input\s+type:/i,
  /Output:/i,
  /Error\s+handling:/i,
];

const EXPLANATION_PIPE_KEYWORDS = ['time', 'space', 'complexity', 'feature', 'input', 'output'];

export function countCodeSignals(text: string): number {
  return CODE_SIGNALS.filter((signal) => signal.test(text)).length;
}

export function isCodeContent(text: string): boolean {
  if (text.includes('```')) return true;
  if (countCodeSignals(text) >= CODE_SIGNAL_THRESHOLD) return true;

  const nonBlank = text.split('\n').filter((line) => line.trim());
  if (nonBlank.length === 0) return false;
  const indented = nonBlank.filter((line) => line.startsWith('    ')).length;
  return indented / nonBlank.length > INDENTED_RATIO;
}

export function isExplanationContent(text: string): boolean {
  if (EXPLANATION_PATTERNS.some((pattern) => pattern.test(text))) return true;
  return text.split('\n').some((line) => {
    if (!line.includes('|')) return false;
    const lower = line.toLowerCase();
    return EXPLANATION_PIPE_KEYWORDS.some((keyword) => lower.includes(keyword));
  });
}

export function detectContentKind(text: string): ContentKind {
  if (containsDiagram(text)) return 'diagram';
  if (isCodeContent(text)) return 'code';
  if (isExplanationContent(text)) return 'explanation';
  return 'general';
}
