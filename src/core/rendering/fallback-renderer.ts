/**
 * Tries the primary renderer, then the fallback. When both fail exactly one
 * RenderServiceError is raised, carrying the fallback's message and both
 * underlying errors.
 */

import { RenderServiceError } from '../errors';
import type { SvgRenderService } from './types';

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class FallbackDiagramRenderer implements SvgRenderService {
  readonly name: string;

  constructor(
    private readonly primary: SvgRenderService,
    private readonly fallback: SvgRenderService
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  async renderSvg(source: string): Promise<string> {
    let primaryError: Error;
    try {
      return await this.primary.renderSvg(source);
    } catch (err) {
      primaryError = toError(err);
      console.warn(`[Diagrams] ${this.primary.name} failed, trying ${this.fallback.name}:`, primaryError.message);
    }

    try {
      return await this.fallback.renderSvg(source);
    } catch (err) {
      throw new RenderServiceError(primaryError, toError(err));
    }
  }
}
