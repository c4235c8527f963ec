/**
 * Edge label rewrites: the parenthetical label form models like to emit,
 * and numbered step labels.
 */

import { isEdgeLine, isFlowchartLike } from './syntax';

const ENDPOINT = '[A-Za-z_]\\w*(?:\\[[^\\[\\]\\n]*\\]|\\{[^{}\\n]*\\}|\\([^()\\n]*\\))?';

/** `A --> B (Label)`, where the label is separated from B by whitespace */
const PARENTHETICAL_EDGE = new RegExp(
  `^(\\s*)(${ENDPOINT})\\s*-->\\s*([A-Za-z_]\\w*(?:\\[[^\\[\\]\\n]*\\]|\\{[^{}\\n]*\\})?)\\s+\\(([^()\\n]+)\\)\\s*;?\\s*$`
);

/**
 * Rewrites `A --> B (Label)` to `A -- Label --> B`. Mermaid reads the
 * original as an edge to B followed by a stray round node.
 */
export function repairParentheticalLabels(source: string): string {
  if (!isFlowchartLike(source)) {
    return source;
  }
  return source
    .split('\n')
    .map((line) => {
      const match = PARENTHETICAL_EDGE.exec(line);
      if (!match) return line;
      const [, indent = '', from = '', to = '', label = ''] = match;
      return `${indent}${from} -- ${label.trim()} --> ${to}`;
    })
    .join('\n');
}

/**
 * Reduces numbered step labels to their number: `-- 1. Send -->` becomes
 * `-- 1 -->` and `|2. Reply|` becomes `|2|`.
 */
export function prettifyNumberedLabels(source: string): string {
  return source
    .split('\n')
    .map((line) => {
      if (!isEdgeLine(line)) return line;
      return line
        .replace(/--\s*(\d+)\.(?!\d)[^\n]*?-->/g, '-- $1 -->')
        .replace(/==\s*(\d+)\.(?!\d)[^\n]*?==>/g, '== $1 ==>')
        .replace(/\|\s*(\d+)\.(?!\d)[^|\n]*\|/g, '|$1|');
    })
    .join('\n');
}
