/**
 * Rate Limiting Middleware
 *
 * Fixed-window request counting per client, kept in memory. Two tiers are
 * mounted by the app: a general limit on every /api route and a tighter one
 * on the routes that call the model (/api/question, /api/evaluate).
 *
 * Headers on every limited route:
 * - X-RateLimit-Limit: maximum requests in the window
 * - X-RateLimit-Remaining: requests left in the current window
 * - X-RateLimit-Reset: Unix timestamp (seconds) when the window resets
 *
 * Over the limit the response is 429:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "RATE_LIMITED",
 *     "message": "Too many requests. Please try again later.",
 *     "details": { "retryAfter": 45 }
 *   }
 * }
 * ```
 */

import type { MiddlewareHandler, Context } from 'hono';
import { ErrorCodes } from './error-handler';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

interface RateLimitEntry {
  count: number;
  windowStart: number;
}

export const RATE_LIMITS = {
  GENERAL: {
    windowMs: 60_000,
    maxRequests: 300,
  },
  /** Routes that call the model */
  LLM: {
    windowMs: 60_000,
    maxRequests: 30,
  },
} as const;

const RATE_LIMITED_MESSAGE = 'Too many requests. Please try again later.';

/** The forwarded client IP, else X-Real-IP */
function clientKeyFor(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for');
  if (forwardedFor) {
    // The first address is the original client
    return forwardedFor.split(',')[0]?.trim() || 'unknown-client';
  }

  return c.req.header('x-real-ip') ?? 'unknown-client';
}

/**
 * Each limiter owns its own counter map, so the general and LLM tiers (and
 * separate app instances) never share counts.
 */
export function rateLimiter(config: RateLimitConfig): MiddlewareHandler {
  const { windowMs, maxRequests, now = Date.now } = config;

  const store = new Map<string, RateLimitEntry>();

  // Drop expired windows every five minutes
  const cleanupInterval = setInterval(() => {
    const current = now();
    for (const [key, entry] of store) {
      if (current - entry.windowStart >= windowMs) {
        store.delete(key);
      }
    }
  }, 5 * 60 * 1000);

  // Prevent the cleanup interval from keeping the process alive
  cleanupInterval.unref?.();

  return async (c, next) => {
    const current = now();
    const clientKey = clientKeyFor(c);

    let entry = store.get(clientKey);
    if (!entry || current - entry.windowStart >= windowMs) {
      entry = { count: 0, windowStart: current };
      store.set(clientKey, entry);
    }

    const remaining = Math.max(0, maxRequests - entry.count - 1);
    const resetTime = Math.ceil((entry.windowStart + windowMs) / 1000);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(remaining));
    c.header('X-RateLimit-Reset', String(resetTime));

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.windowStart + windowMs - current) / 1000);
      c.header('Retry-After', String(retryAfter));

      return c.json(
        {
          success: false,
          error: {
            code: ErrorCodes.RATE_LIMITED,
            message: RATE_LIMITED_MESSAGE,
            details: { retryAfter },
          },
        },
        429
      );
    }

    entry.count++;
    return next();
  };
}

export function generalRateLimiter(overrides?: Partial<RateLimitConfig>): MiddlewareHandler {
  return rateLimiter({
    ...RATE_LIMITS.GENERAL,
    ...overrides,
  });
}

export function llmRateLimiter(overrides?: Partial<RateLimitConfig>): MiddlewareHandler {
  return rateLimiter({
    ...RATE_LIMITS.LLM,
    ...overrides,
  });
}
