import { FallbackDiagramRenderer } from './fallback-renderer';
import { KrokiRenderService, MermaidInkRenderService } from './http-render-service';
import type { SvgRenderService } from './types';

export type { SvgRenderService, FetchFn, HttpRenderServiceOptions } from './types';
export { DEFAULT_RENDER_TIMEOUT_MS } from './types';
export { KrokiRenderService, MermaidInkRenderService, isSvgDocument } from './http-render-service';
export { FallbackDiagramRenderer } from './fallback-renderer';
export { renderDiagram, prepareDiagram, type RenderedDiagram } from './diagram-renderer';

export interface RenderingSettings {
  primaryUrl: string;
  fallbackUrl: string;
  timeoutMs: number;
}

/** Kroki first, mermaid.ink as fallback. */
export function createDiagramRenderer(settings: RenderingSettings): SvgRenderService {
  return new FallbackDiagramRenderer(
    new KrokiRenderService({ baseUrl: settings.primaryUrl, timeoutMs: settings.timeoutMs }),
    new MermaidInkRenderService({ baseUrl: settings.fallbackUrl, timeoutMs: settings.timeoutMs })
  );
}
