/**
 * Diagram Repair Pipeline
 *
 * Runs Mermaid source through an ordered list of text transforms. Each
 * transform keeps its input when it throws, so a bug in one step never
 * costs the user the whole diagram. Running the pipeline on its own output
 * changes nothing.
 *
 * The size guard is not a step: callers apply `assertDiagramSize` first so
 * oversized input is rejected rather than silently passed through.
 *
 * @example
 * ```typescript
 * repairDiagram('```mermaid\nflowchart LR\nA -- 1. Send Request --> B\n```');
 * // 'flowchart LR\nA -- 1 --> B'
 * ```
 */

import { applyTransforms, type TextTransform } from '../text/transform-pipeline';
import { repairParentheticalLabels, prettifyNumberedLabels } from './edge-labels';
import { wrapLongLabels } from './label-wrap';
import { groupLayers } from './layer-grouping';
import { normalizeDiagramText, stripDiagramFences, stripStrayBackticks } from './sanitize';
import { ensureDiagramHeader, hoistClassStatements, stripLabelParentheses } from './statements';
import { applyDiagramStyle, type DiagramStyleOptions } from './styling';
import { redirectSubgraphEdges } from './subgraph-anchors';

export type RepairOptions = DiagramStyleOptions;

export function buildRepairSteps(options: RepairOptions = {}): TextTransform[] {
  return [
    // Invisible characters go first: a BOM before the fence hides it
    { name: 'normalize-text', apply: normalizeDiagramText },
    { name: 'strip-fences', apply: stripDiagramFences },
    { name: 'strip-backticks', apply: stripStrayBackticks },
    { name: 'default-header', apply: ensureDiagramHeader },
    { name: 'label-parentheses', apply: stripLabelParentheses },
    { name: 'group-layers', apply: groupLayers },
    { name: 'parenthetical-labels', apply: repairParentheticalLabels },
    { name: 'prettify-numbered-labels', apply: prettifyNumberedLabels },
    { name: 'wrap-long-labels', apply: wrapLongLabels },
    { name: 'redirect-subgraph-edges', apply: redirectSubgraphEdges },
    { name: 'hoist-class-statements', apply: hoistClassStatements },
    { name: 'apply-style', apply: (text) => applyDiagramStyle(text, options) },
  ];
}

export function repairDiagram(source: string, options: RepairOptions = {}): string {
  return applyTransforms(source, buildRepairSteps(options), '[Diagrams]');
}
