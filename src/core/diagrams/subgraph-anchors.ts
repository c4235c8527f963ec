/**
 * Subgraph edge redirect. Mermaid rejects or misplaces edges whose endpoint
 * is a subgraph id, so such endpoints are pointed at an invisible anchor node
 * placed inside the subgraph instead.
 */

import { escapeRegExp, isEdgeLine, isFlowchartLike } from './syntax';

const SUBGRAPH_LINE = /^(\s*)subgraph\s+([A-Za-z_]\w*)/;

export function anchorId(subgraphId: string): string {
  return `${subgraphId}_anchor`;
}

/**
 * Rewrites every endpoint on an edge line that names one of `ids`. Labels
 * and arrow styles are left alone because only bare identifiers in endpoint
 * position are matched.
 */
function redirectEdgeLine(line: string, ids: ReadonlySet<string>, used: Set<string>): string {
  let result = line;
  for (const id of ids) {
    const name = escapeRegExp(id);
    // Start of line, or after `&`, followed by an arrow, `&` or end of line
    const source = new RegExp(`(^\\s*|&\\s*)${name}(?=\\s*(?:&|<|--|==|-\\.|~~~|$))`, 'g');
    // After an arrow (optionally with a |label|) or `&`, not followed by a shape
    const target = new RegExp(
      `((?:-->|---|==>|===|-\\.->|-\\.-|--[ox]|~~~)\\s*(?:\\|[^|\\n]*\\|)?\\s*|&\\s*)${name}(?![\\w\\[\\(\\{])`,
      'g'
    );
    const rewritten = result
      .replace(source, (_match, prefix: string) => `${prefix}${anchorId(id)}`)
      .replace(target, (_match, prefix: string) => `${prefix}${anchorId(id)}`);
    if (rewritten !== result) {
      used.add(id);
      result = rewritten;
    }
  }
  return result;
}

export function redirectSubgraphEdges(source: string): string {
  if (!isFlowchartLike(source)) {
    return source;
  }

  const lines = source.split('\n');
  const subgraphs = new Map<string, number>();
  lines.forEach((line, index) => {
    const match = SUBGRAPH_LINE.exec(line);
    if (match?.[2] && !subgraphs.has(match[2])) {
      subgraphs.set(match[2], index);
    }
  });
  if (subgraphs.size === 0) {
    return source;
  }

  const ids = new Set(subgraphs.keys());
  const used = new Set<string>();
  const redirected = lines.map((line) => (isEdgeLine(line) ? redirectEdgeLine(line, ids, used) : line));

  // Anchors go in last-to-first so earlier insert positions stay valid
  const inserts = [...subgraphs.entries()]
    .filter(([id]) => used.has(id) && !redirected.some((line) => line.trim().startsWith(`${anchorId(id)}[`)))
    .sort((a, b) => b[1] - a[1]);

  for (const [id, index] of inserts) {
    const indent = `${SUBGRAPH_LINE.exec(redirected[index] ?? '')?.[1] ?? ''}  `;
    redirected.splice(
      index + 1,
      0,
      `${indent}${anchorId(id)}[ ]`,
      `${indent}style ${anchorId(id)} fill:none,stroke:none,color:transparent`
    );
  }

  return redirected.join('\n');
}
