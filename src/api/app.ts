/**
 * Hono Application Factory
 *
 * `createApp(deps)` wires middleware and routes around already-built
 * collaborators. The server entry point builds the real ones; tests pass
 * in-memory stand-ins and drive the app with `app.request()`.
 *
 * Middleware is applied in this order:
 * 1. Error Handler - outermost, plus `onError` for handler throws
 * 2. Logger - one line per request with timing
 * 3. CORS - configured origins
 * 4. API key - only when a key is configured
 * 5. Rate Limiters - general on /api, tighter on model routes
 */

import { Hono } from 'hono';
import type { Config } from '../config';
import type { ModelClient } from '../llm/types';
import {
  corsMiddleware,
  errorHandler,
  handleError,
  loggerMiddleware,
  apiKeyAuth,
  generalRateLimiter,
  llmRateLimiter,
  ErrorCodes,
  type LoggerConfig,
} from './middleware';
import { createApiRouter, healthRoutes, type ApiRouterDeps } from './routes';
import { error } from './utils/response';

export interface AppDependencies extends ApiRouterDeps {
  config: Config;
  model: ModelClient;
  /** Overrides for the request logger, e.g. a silent `write` in tests */
  logger?: Partial<LoggerConfig>;
}

/** Routes that call the model and share the stricter limit */
const MODEL_ROUTES = ['/api/question', '/api/evaluate'] as const;

export function createApp(deps: AppDependencies): Hono {
  const { config } = deps;
  const app = new Hono();

  // ---------------------------------------------------------------------------
  // Global Middleware
  // ---------------------------------------------------------------------------

  app.use('*', errorHandler());
  app.onError(handleError);

  app.use('*', loggerMiddleware(deps.logger));
  app.use('*', corsMiddleware({ allowedOrigins: config.cors.allowedOrigins }));
  app.use('*', apiKeyAuth({ apiKey: config.security.apiKey, exemptPaths: ['/health'] }));

  // ---------------------------------------------------------------------------
  // Health Check (not under /api)
  // ---------------------------------------------------------------------------

  app.route('/health', healthRoutes({ model: deps.model, environment: config.server.nodeEnv }));

  // ---------------------------------------------------------------------------
  // API Routes with Rate Limiting
  // ---------------------------------------------------------------------------

  app.use(
    '/api/*',
    generalRateLimiter({
      windowMs: config.rateLimit.windowMs,
      maxRequests: config.rateLimit.maxRequests,
    })
  );

  // One limiter instance shared by every model route
  const modelLimiter = llmRateLimiter({
    windowMs: config.rateLimit.windowMs,
    maxRequests: config.rateLimit.llmMaxRequests,
  });
  for (const path of MODEL_ROUTES) {
    app.use(path, modelLimiter);
  }

  app.route('/api', createApiRouter(deps));

  // ---------------------------------------------------------------------------
  // 404 Handler
  // ---------------------------------------------------------------------------

  app.notFound((c) =>
    error(c, ErrorCodes.NOT_FOUND, `Route ${c.req.method} ${c.req.path} not found`, 404)
  );

  return app;
}
