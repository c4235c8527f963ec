/**
 * Long-label wrapping. Mermaid does not wrap node text on its own in every
 * renderer, so labels over the threshold get explicit `<br/>` breaks.
 */

import { isFlowchartLike, isStatementLine } from './syntax';

export const WRAP_THRESHOLD = 30;
export const WRAP_LINE_WIDTH = 24;

const SQUARE_LABEL = /([A-Za-z_]\w*)\[([^\[\]\n]+)\]/g;
const ROUND_LABEL = /([A-Za-z_]\w*)\(([^()\n]+)\)/g;
const CURLY_LABEL = /([A-Za-z_]\w*)\{([^{}\n]+)\}/g;

/**
 * Greedy word wrap. Words longer than the width get a line of their own and
 * are never split.
 */
export function wrapWords(text: string, width: number = WRAP_LINE_WIDTH): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/**
 * Returns the label with breaks inserted, or unchanged when it is short,
 * already broken, or has nowhere to break.
 */
export function wrapLabel(label: string): string {
  const quoted = label.length >= 2 && label.startsWith('"') && label.endsWith('"');
  const inner = quoted ? label.slice(1, -1) : label;

  if (inner.length <= WRAP_THRESHOLD || /<br\s*\/?>/i.test(inner) || inner.includes('\\n')) {
    return label;
  }

  const lines = wrapWords(inner);
  if (lines.length < 2) {
    return label;
  }

  const wrapped = lines.join('<br/>');
  return quoted ? `"${wrapped}"` : wrapped;
}

export function wrapLongLabels(source: string): string {
  if (!isFlowchartLike(source)) {
    return source;
  }
  return source
    .split('\n')
    .map((line) => {
      if (isStatementLine(line)) return line;
      return line
        .replace(SQUARE_LABEL, (_match, id: string, label: string) => `${id}[${wrapLabel(label)}]`)
        .replace(ROUND_LABEL, (_match, id: string, label: string) => `${id}(${wrapLabel(label)})`)
        .replace(CURLY_LABEL, (_match, id: string, label: string) => `${id}{${wrapLabel(label)}}`);
    })
    .join('\n');
}
