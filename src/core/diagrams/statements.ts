/**
 * Statement-level flowchart clean-ups: a default header for headerless
 * bodies, parentheses out of bracketed labels and subgraph titles, and
 * class statements moved below the graph.
 */

import { diagramHeader, isFlowchartLike } from './syntax';

export const DEFAULT_DIAGRAM_HEADER = 'flowchart LR';

/**
 * Inserts `flowchart LR` before the first statement of a body that has no
 * diagram keyword. Leading `%%` lines stay above it.
 */
export function ensureDiagramHeader(source: string): string {
  if (diagramHeader(source) !== null) {
    return source;
  }
  const lines = source.split('\n');
  const first = lines.findIndex((line) => {
    const trimmed = line.trim();
    return trimmed !== '' && !trimmed.startsWith('%%');
  });
  if (first === -1) {
    return source;
  }
  return [...lines.slice(0, first), DEFAULT_DIAGRAM_HEADER, ...lines.slice(first)].join('\n');
}

const BRACKET_LABEL = /\[([^[\]\n]*)\]/g;
const SUBGRAPH_TITLE = /^(\s*subgraph\s+)([^[\n]*)(.*)$/;

function dropParentheses(text: string): string {
  return text.replace(/[()]/g, ' ').replace(/\s+/g, ' ').trim();
}

function unwrapLabel(label: string): string {
  const trimmed = label.trim();
  if (!/[()]/.test(label) || trimmed.startsWith('"')) {
    return label;
  }
  // [(text)] is the cylinder shape
  if (trimmed.startsWith('(') && trimmed.endsWith(')')) {
    return label;
  }
  return dropParentheses(label);
}

/**
 * `A[Cache (LRU)]` becomes `A[Cache LRU]` and `subgraph API (v2)[...]`
 * becomes `subgraph API_v2[...]`. Unquoted parentheses inside a square label
 * end the label early in the Mermaid lexer.
 */
export function stripLabelParentheses(source: string): string {
  if (!isFlowchartLike(source)) {
    return source;
  }
  return source
    .split('\n')
    .map((line) => {
      if (line.trim().startsWith('%%')) return line;
      let result = line.replace(BRACKET_LABEL, (_match, label: string) => `[${unwrapLabel(label)}]`);
      const subgraph = SUBGRAPH_TITLE.exec(result);
      if (subgraph) {
        const [, keyword = '', title = '', rest = ''] = subgraph;
        if (/[()]/.test(title)) {
          // Before a bracketed title the text is the subgraph id
          const cleaned = rest.startsWith('[') ? dropParentheses(title).replace(/ /g, '_') : dropParentheses(title);
          result = `${keyword}${cleaned}${rest}`;
        }
      }
      return result;
    })
    .join('\n');
}

const CLASS_DEF_STATEMENT = /^\s*classDef\s+\w+(?:\s*,\s*\w+)*\s+\S/;
const CLASS_ASSIGNMENT = /^\s*class\s+\w+(?:\s*,\s*\w+)*\s+\w+\s*;?\s*$/;

function isClassStatement(line: string): boolean {
  return CLASS_DEF_STATEMENT.test(line) || CLASS_ASSIGNMENT.test(line);
}

/**
 * Moves `classDef` and `class` statements to the end of the flowchart, in
 * their original order, with duplicates dropped.
 */
export function hoistClassStatements(source: string): string {
  if (!isFlowchartLike(source)) {
    return source;
  }
  const lines = source.split('\n');
  const statements = [...new Set(lines.filter(isClassStatement).map((line) => line.trim()))];
  if (statements.length === 0) {
    return source;
  }
  return [...lines.filter((line) => !isClassStatement(line)), ...statements].join('\n');
}
