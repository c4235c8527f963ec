/**
 * Mermaid line-level syntax helpers shared by the repair steps.
 *
 * None of this is a parser. The steps only need to answer a few questions
 * about a line: is it an edge, which identifiers does it mention, is it a
 * standalone node definition.
 */

/** Leading keywords that mark a diagram body inside model output. */
export const DIAGRAM_KEYWORDS = [
  'flowchart',
  'graph',
  'sequenceDiagram',
  'classDiagram',
  'erDiagram',
  'stateDiagram',
  'gantt',
  'journey',
  'pie',
  'mindmap',
  'timeline',
] as const;

const OTHER_KEYWORDS = DIAGRAM_KEYWORDS.filter((keyword) => keyword !== 'graph').join('|');

/** `graph` also starts prose ("graph databases ..."), so it needs a direction or a line of its own. */
export const DIAGRAM_START_PATTERN = new RegExp(
  `^(?:graph(?:\\s+(?:TB|TD|BT|RL|LR)\\b|\\s*$)|(?:${OTHER_KEYWORDS})\\b)`
);

const HEADER_PATTERN = /^(flowchart|graph|sequenceDiagram|classDiagram|erDiagram|stateDiagram(?:-v2)?|gantt|journey|pie|mindmap|timeline|gitGraph|quadrantChart|requirementDiagram|C4\w+)\b/;

/** Statement lines that are never edges or node definitions. */
const NON_GRAPH_STATEMENT = /^\s*(%%|classDef\b|class\b|style\b|linkStyle\b|click\b|direction\b)/;

const ARROW_PATTERN = /<?(?:-{2,}|={2,}|-\.+-|~{3})[>ox]?/;

export const IDENTIFIER = '[A-Za-z_][\\w]*';

/**
 * Matches a line that is only a node definition: `id[label]`, `id(label)` or
 * `id{label}`, optionally terminated by `;`.
 */
export const NODE_DEFINITION_PATTERN = new RegExp(
  `^(\\s*)(${IDENTIFIER})\\s*(?:\\[([^\\[\\]\\n]*)\\]|\\(([^()\\n]*)\\)|\\{([^{}\\n]*)\\})\\s*;?\\s*$`
);

export interface NodeDefinition {
  indent: string;
  id: string;
  label: string;
}

export function parseNodeDefinition(line: string): NodeDefinition | null {
  const match = NODE_DEFINITION_PATTERN.exec(line);
  if (!match) return null;
  return {
    indent: match[1] ?? '',
    id: match[2] ?? '',
    label: match[3] ?? match[4] ?? match[5] ?? '',
  };
}

export function isStatementLine(line: string): boolean {
  return NON_GRAPH_STATEMENT.test(line);
}

/**
 * Removes label text (quoted strings, `|pipe|` and inline edge labels,
 * bracketed node labels) so arrows and identifiers can be matched without
 * false hits inside labels.
 */
export function stripLabels(line: string): string {
  let stripped = line
    .replace(/"[^"\n]*"/g, '""')
    .replace(/\|[^|\n]*\|/g, ' ')
    // Inline text labels: `A -- text --> B`, `A == text ==> B`, `A -. text .-> B`
    .replace(/(--|==)\s+[^\n]*?\s*(-->|==>|---|===|--[ox])/g, ' $2')
    .replace(/-\.\s+[^\n]*?\s*\.->/g, ' -.-> ');
  let previous = '';
  while (previous !== stripped) {
    previous = stripped;
    stripped = stripped
      .replace(/\[[^\[\]\n]*\]/g, '')
      .replace(/\([^()\n]*\)/g, '')
      .replace(/\{[^{}\n]*\}/g, '');
  }
  return stripped;
}

export function isEdgeLine(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed || isStatementLine(trimmed) || /^(subgraph|end)\b/.test(trimmed)) {
    return false;
  }
  return ARROW_PATTERN.test(stripLabels(trimmed));
}

/**
 * Every identifier mentioned on any edge line, endpoints and `&` chains
 * alike. Label text is not included.
 */
export function collectEdgeIdentifiers(lines: readonly string[]): Set<string> {
  const ids = new Set<string>();
  for (const line of lines) {
    if (!isEdgeLine(line)) continue;
    for (const match of stripLabels(line).matchAll(new RegExp(IDENTIFIER, 'g'))) {
      ids.add(match[0]);
    }
  }
  return ids;
}

/**
 * The first meaningful line's diagram keyword, or null for a headerless
 * snippet.
 */
export function diagramHeader(text: string): string | null {
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('%%')) continue;
    const match = HEADER_PATTERN.exec(trimmed);
    return match ? (match[1] ?? null) : null;
  }
  return null;
}

/**
 * Flowcharts and headerless snippets get the structural rewrites; other
 * diagram types have their own grammars and are left alone.
 */
export function isFlowchartLike(text: string): boolean {
  const header = diagramHeader(text);
  return header === null || header === 'flowchart' || header === 'graph';
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
