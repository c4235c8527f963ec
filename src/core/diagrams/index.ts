/**
 * Mermaid diagram repair: sanitization, structural rewrites and styling.
 */

export { repairDiagram, buildRepairSteps, type RepairOptions } from './repair-pipeline';
export { normalizeEmbeddedDiagrams, containsDiagram } from './embedded';
export {
  assertDiagramSize,
  stripDiagramFences,
  stripStrayBackticks,
  normalizeDiagramText,
  MAX_DIAGRAM_CHARS,
} from './sanitize';
export {
  ensureDiagramHeader,
  stripLabelParentheses,
  hoistClassStatements,
  DEFAULT_DIAGRAM_HEADER,
} from './statements';
export {
  applyDiagramStyle,
  buildThemeDirective,
  DIAGRAM_STYLE_PRESETS,
  type DiagramStylePreset,
  type DiagramStyleOptions,
} from './styling';
export { groupLayers, isLayerLabel, TIER_PHRASES } from './layer-grouping';
export { repairParentheticalLabels, prettifyNumberedLabels } from './edge-labels';
export { wrapLongLabels, wrapLabel, wrapWords, WRAP_THRESHOLD, WRAP_LINE_WIDTH } from './label-wrap';
export { redirectSubgraphEdges, anchorId } from './subgraph-anchors';
export { DIAGRAM_KEYWORDS, isEdgeLine, collectEdgeIdentifiers, isFlowchartLike } from './syntax';
