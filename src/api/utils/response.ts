/**
 * API Response Utilities
 *
 * Helpers that wrap route results in the standard envelopes from
 * `../types`. Routes use these instead of raw `c.json()` calls.
 *
 * @example
 * ```typescript
 * import { success, badRequest } from '../utils/response';
 *
 * router.post('/evaluate', async (c) => {
 *   const body = await c.req.json();
 *   if (!body.code) {
 *     return badRequest(c, 'code is required');
 *   }
 *   return success(c, await evaluator.evaluate(body));
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

// ============================================================================
// Success Response Helper
// ============================================================================

/**
 * @example
 * ```typescript
 * return success(c, { sessionId }, 201);
 * ```
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

// ============================================================================
// Error Response Helpers
// ============================================================================

export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}

export function badRequest(c: Context, message: string, details?: unknown): Response {
  return error(c, 'BAD_REQUEST', message, 400, details);
}

export function serviceUnavailable(c: Context, message: string): Response {
  return error(c, 'SERVICE_UNAVAILABLE', message, 503);
}
