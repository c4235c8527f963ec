/**
 * HTTP Diagram Renderers
 *
 * Two public Mermaid renderers are supported:
 * - Kroki: `POST <base>/mermaid/svg` with the source as text/plain
 * - mermaid.ink: `GET <base>/svg/<base64url(source)>`
 *
 * Both abort after the configured timeout (15 s by default). A non-2xx
 * status, or a body that is not an SVG document, is an error.
 */

import {
  DEFAULT_RENDER_TIMEOUT_MS,
  type FetchFn,
  type HttpRenderServiceOptions,
  type SvgRenderService,
} from './types';

const SVG_DOCUMENT = /^(?:<\?xml[^>]*\?>\s*)?(?:<!--[\s\S]*?-->\s*)*(?:<!DOCTYPE[^>]*>\s*)?<svg[\s>]/i;

export function isSvgDocument(body: string): boolean {
  return SVG_DOCUMENT.test(body.trimStart());
}

abstract class HttpRenderService implements SvgRenderService {
  abstract readonly name: string;
  protected readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpRenderServiceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  protected abstract buildRequest(source: string): { url: string; init: RequestInit };

  async renderSvg(source: string): Promise<string> {
    const { url, init } = this.buildRequest(source);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, { ...init, signal: controller.signal });
      const body = await response.text();

      if (!response.ok) {
        throw new Error(`${this.name} returned ${response.status}: ${body.slice(0, 200)}`);
      }
      if (!isSvgDocument(body)) {
        throw new Error(`${this.name} returned a response that is not SVG`);
      }
      return body;
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new Error(`${this.name} timed out after ${this.timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}

export class KrokiRenderService extends HttpRenderService {
  readonly name = 'kroki';

  protected buildRequest(source: string): { url: string; init: RequestInit } {
    return {
      url: `${this.baseUrl}/mermaid/svg`,
      init: {
        method: 'POST',
        headers: { 'Content-Type': 'text/plain; charset=utf-8', Accept: 'image/svg+xml' },
        body: source,
      },
    };
  }
}

export class MermaidInkRenderService extends HttpRenderService {
  readonly name = 'mermaid.ink';

  protected buildRequest(source: string): { url: string; init: RequestInit } {
    const encoded = Buffer.from(source, 'utf8').toString('base64url');
    return {
      url: `${this.baseUrl}/svg/${encoded}`,
      init: { method: 'GET', headers: { Accept: 'image/svg+xml' } },
    };
  }
}
