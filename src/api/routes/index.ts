/**
 * API Routes - Barrel Export and Router Factory
 *
 * `createApiRouter(deps)` mounts every route module under one router that
 * the app serves at `/api`. Route modules receive their collaborators
 * explicitly; none of them reads configuration or opens connections.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/health', healthRoutes({ model, environment: 'development' }));
 * app.route('/api', createApiRouter(deps));
 * ```
 */

import { Hono } from 'hono';
import type { SessionStore } from '../../core/session';
import type { AnswerService } from '../../core/answering';
import type { CodeEvaluator } from '../../core/evaluation';
import type { SvgRenderService } from '../../core/rendering';
import type { ProfileTextExtractor } from '../../core/extraction';
import type { AuditSink } from '../../core/audit';
import type { VoiceTokenIssuer } from '../../core/voice';
import { success } from '../utils/response';
import { APP_VERSION } from './health';
import { sessionRoutes } from './sessions';
import { questionRoutes } from './questions';
import { profileRoutes } from './profile';
import { evaluationRoutes } from './evaluate';
import { diagramRoutes } from './diagrams';
import { voiceRoutes } from './voice';

export { healthRoutes, APP_VERSION, type HealthCheckData, type HealthRouteDeps } from './health';
export { sessionRoutes } from './sessions';
export { questionRoutes } from './questions';
export { profileRoutes } from './profile';
export { evaluationRoutes } from './evaluate';
export { diagramRoutes } from './diagrams';
export { voiceRoutes } from './voice';

// ============================================================================
// Type Definitions
// ============================================================================

export interface ApiRouterDeps {
  store: SessionStore;
  answers: AnswerService;
  evaluator: CodeEvaluator;
  renderer: SvgRenderService;
  extractor: ProfileTextExtractor;
  audit: AuditSink;
  voice: VoiceTokenIssuer | null;
}

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    method: string;
    path: string;
    description: string;
  }[];
}

const ENDPOINTS: ApiInfo['endpoints'] = [
  { method: 'POST', path: '/api/session', description: 'Create a session' },
  { method: 'GET', path: '/api/sessions', description: 'List sessions' },
  { method: 'GET', path: '/api/history/:id', description: 'Session history' },
  { method: 'DELETE', path: '/api/session/:id', description: 'Delete a session' },
  { method: 'DELETE', path: '/api/history/:id', description: 'Clear session history' },
  { method: 'DELETE', path: '/api/history/:id/:index', description: 'Remove one question and answer' },
  { method: 'POST', path: '/api/session/:id/transcript', description: 'Append a transcript chunk' },
  { method: 'POST', path: '/api/question', description: 'Answer a question (JSON or SSE)' },
  { method: 'POST', path: '/api/upload_profile', description: 'Upload a candidate profile' },
  { method: 'POST', path: '/api/evaluate', description: 'Evaluate candidate code' },
  { method: 'POST', path: '/api/render_mermaid', description: 'Render a Mermaid diagram to SVG' },
  { method: 'GET', path: '/api/render_mermaid', description: 'Render from query parameters' },
  { method: 'POST', path: '/api/diagrams/repair', description: 'Repair Mermaid source' },
  { method: 'POST', path: '/api/voice/token', description: 'Short-lived Deepgram token' },
  { method: 'GET', path: '/health', description: 'Health check' },
];

// ============================================================================
// API Router Factory
// ============================================================================

export function createApiRouter(deps: ApiRouterDeps): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Interview Copilot API',
      version: APP_VERSION,
      endpoints: ENDPOINTS,
    };
    return success(c, apiInfo);
  });

  router.route('/', sessionRoutes(deps));
  router.route('/', questionRoutes(deps));
  router.route('/', profileRoutes(deps));
  router.route('/', evaluationRoutes(deps));
  router.route('/', diagramRoutes(deps));
  router.route('/', voiceRoutes(deps));

  return router;
}
