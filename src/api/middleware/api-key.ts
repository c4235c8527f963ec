/**
 * Bearer API Key Middleware
 *
 * When an API key is configured every request must send
 * `Authorization: Bearer <key>`. Preflight requests and `/health` are
 * exempt. Without a configured key the middleware is a pass-through.
 */

import { timingSafeEqual } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import { ErrorCodes } from './error-handler';
import type { ApiErrorResponse } from '../types';

export interface ApiKeyConfig {
  apiKey?: string;
  exemptPaths: string[];
}

function keysMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function apiKeyAuth(config: Partial<ApiKeyConfig> = {}): MiddlewareHandler {
  const apiKey = config.apiKey;
  const exemptPaths = config.exemptPaths ?? ['/health'];

  return async (c, next) => {
    if (!apiKey || c.req.method === 'OPTIONS' || exemptPaths.some((p) => c.req.path.startsWith(p))) {
      return next();
    }

    const header = c.req.header('authorization') ?? '';
    if (!header.startsWith('Bearer ')) {
      return c.json(unauthorized('Missing API key'), 401);
    }
    if (!keysMatch(header.slice('Bearer '.length), apiKey)) {
      return c.json(unauthorized('Invalid API key'), 401);
    }

    return next();
  };
}

function unauthorized(message: string): ApiErrorResponse {
  return { success: false, error: { code: ErrorCodes.UNAUTHORIZED, message } };
}
