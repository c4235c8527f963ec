/**
 * Diagram Routes
 *
 * Endpoints:
 * - POST /render_mermaid   - JSON `{ code, theme?, stylePreset? }` to SVG
 * - GET  /render_mermaid   - Same, from query parameters (for `<img src>`)
 * - POST /diagrams/repair  - Repaired Mermaid source without rendering
 *
 * Rendering goes through the fallback renderer: Kroki first, mermaid.ink
 * second. Oversized sources fail with 413 before any network call.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { stripDiagramFences } from '../../core/diagrams';
import { prepareDiagram, renderDiagram, type SvgRenderService } from '../../core/rendering';
import { success, badRequest } from '../utils/response';
import { validate, validateQuery, getValidatedBody, getValidatedQuery } from '../middleware/validate';
import { diagramSchema, diagramQuerySchema, type DiagramRequest } from '../types';

export interface DiagramRouteDeps {
  renderer: SvgRenderService;
}

const MISSING_CODE = "Missing 'code' in payload";

export function diagramRoutes({ renderer }: DiagramRouteDeps): Hono {
  const router = new Hono();

  const render = async (c: Context, request: DiagramRequest): Promise<Response> => {
    if (!stripDiagramFences(request.code)) {
      return badRequest(c, MISSING_CODE);
    }

    const { svg } = await renderDiagram(renderer, request.code, {
      theme: request.theme,
      stylePreset: request.stylePreset,
    });
    return c.body(svg, 200, { 'Content-Type': 'image/svg+xml' });
  };

  router.post('/render_mermaid', validate(diagramSchema), (c) =>
    render(c, getValidatedBody(c, diagramSchema))
  );

  router.get('/render_mermaid', validateQuery(diagramQuerySchema), (c) =>
    render(c, getValidatedQuery(c, diagramQuerySchema))
  );

  router.post('/diagrams/repair', validate(diagramSchema), (c) => {
    const request = getValidatedBody(c, diagramSchema);
    if (!stripDiagramFences(request.code)) {
      return badRequest(c, MISSING_CODE);
    }

    const code = prepareDiagram(request.code, {
      theme: request.theme,
      stylePreset: request.stylePreset,
    });
    return success(c, { code });
  });

  return router;
}
