/**
 * Anything that can turn Mermaid source into an SVG document.
 */
export interface SvgRenderService {
  readonly name: string;
  renderSvg(source: string): Promise<string>;
}

export type FetchFn = typeof fetch;

export interface HttpRenderServiceOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Injectable for tests; defaults to the global fetch */
  fetchFn?: FetchFn;
}

export const DEFAULT_RENDER_TIMEOUT_MS = 15_000;
