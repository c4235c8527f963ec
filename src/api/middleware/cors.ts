/**
 * CORS Middleware
 *
 * Wraps Hono's cors() with the configured origins. A wildcard origin list
 * answers `*` and disables credentials, as browsers require.
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export interface CorsConfig {
  allowedOrigins: string[];
  allowedMethods: string[];
  allowedHeaders: string[];
  /** How long preflight responses can be cached (seconds) */
  maxAge: number;
}

const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: ['*'],
  allowedMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  maxAge: 3600,
};

export function corsMiddleware(config: Partial<CorsConfig> = {}): MiddlewareHandler {
  const finalConfig: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...config,
  };
  const wildcard = finalConfig.allowedOrigins.includes('*');

  return cors({
    origin: wildcard ? '*' : finalConfig.allowedOrigins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    credentials: !wildcard,
    maxAge: finalConfig.maxAge,
  });
}

export { DEFAULT_CORS_CONFIG };
