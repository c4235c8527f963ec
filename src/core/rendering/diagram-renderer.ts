/**
 * Render entry point: sanitize, size-guard, repair, render.
 */

import {
  assertDiagramSize,
  normalizeDiagramText,
  repairDiagram,
  stripDiagramFences,
  type RepairOptions,
} from '../diagrams';
import type { SvgRenderService } from './types';

export interface RenderedDiagram {
  svg: string;
  /** The repaired source that was actually sent */
  source: string;
}

/**
 * Sanitizes and repairs diagram source without rendering it.
 *
 * @throws {DiagramTooLargeError} When the sanitized source is too large
 */
export function prepareDiagram(code: string, options: RepairOptions = {}): string {
  const sanitized = stripDiagramFences(normalizeDiagramText(code));
  assertDiagramSize(sanitized);
  return repairDiagram(sanitized, options);
}

/**
 * @throws {DiagramTooLargeError} Before any network call when the source is too large
 * @throws {RenderServiceError} When rendering fails
 */
export async function renderDiagram(
  renderer: SvgRenderService,
  code: string,
  options: RepairOptions = {}
): Promise<RenderedDiagram> {
  const source = prepareDiagram(code, options);
  return { svg: await renderer.renderSvg(source), source };
}
