/**
 * Layer grouping: turns standalone "layer" nodes into subgraph blocks.
 *
 * Models often draw tiers as plain nodes (`API[API Layer]`) followed by the
 * nodes that belong to them. Each such header becomes `subgraph API[API Layer]`
 * and collects every following line until the next header or the end of the
 * document.
 */

import { collectEdgeIdentifiers, isFlowchartLike, parseNodeDefinition } from './syntax';

export const TIER_PHRASES: ReadonlySet<string> = new Set([
  'presentation tier',
  'application tier',
  'business tier',
  'data tier',
  'web tier',
  'storage tier',
  'client side',
  'server side',
]);

// Whole words only: "Player Service" and "Airplane" are not layers
const LAYER_WORD = /\b(layers?|planes?)\b/;

export function isLayerLabel(label: string): boolean {
  const normalized = label.replace(/^["']|["']$/g, '').trim().toLowerCase();
  return LAYER_WORD.test(normalized) || TIER_PHRASES.has(normalized);
}

interface LayerHeader {
  index: number;
  indent: string;
  id: string;
  label: string;
}

export function groupLayers(source: string): string {
  if (/^\s*subgraph\b/m.test(source) || !isFlowchartLike(source)) {
    return source;
  }

  const lines = source.split('\n');
  const referenced = collectEdgeIdentifiers(lines);

  const headers: LayerHeader[] = [];
  lines.forEach((line, index) => {
    const node = parseNodeDefinition(line);
    if (node && isLayerLabel(node.label) && !referenced.has(node.id)) {
      headers.push({ index, ...node });
    }
  });

  const first = headers[0];
  if (!first) {
    return source;
  }

  const out = lines.slice(0, first.index);
  headers.forEach((header, position) => {
    const next = headers[position + 1];
    const body = lines.slice(header.index + 1, next ? next.index : lines.length);
    out.push(`${header.indent}subgraph ${header.id}[${header.label}]`);
    out.push(...body);
    out.push(`${header.indent}end`);
  });

  return out.join('\n');
}
