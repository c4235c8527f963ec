/**
 * Global Error Handler
 *
 * Every failure leaves the API in the standard envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... }
 *   }
 * }
 * ```
 *
 * Domain errors from the core carry their own stable code and are mapped to
 * a status here; `AppError` carries both. Model failures become
 * 502 MODEL_CALL_FAILED. Anything else is a 500 whose message is hidden in
 * production.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.use('*', errorHandler());
 * app.onError(handleError);
 *
 * app.get('/protected', () => {
 *   throw new AppError('UNAUTHORIZED', 'Authentication required', 401);
 * });
 * ```
 */

import type { MiddlewareHandler, Context, ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';
import { DomainError, type DomainErrorCode } from '../../core/errors';
import { LLMError } from '../../llm/types';
import { VoiceTokenError } from '../../core/voice';
import type { ApiErrorResponse } from '../types';

/**
 * Error codes produced by the API layer itself. Domain codes live in
 * `core/errors.ts`.
 */
export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  RATE_LIMITED: 'RATE_LIMITED',
  EMPTY_UPLOAD: 'EMPTY_UPLOAD',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  MODEL_CALL_FAILED: 'MODEL_CALL_FAILED',
  VOICE_TOKEN_FAILED: 'VOICE_TOKEN_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const DOMAIN_STATUS: Record<DomainErrorCode, ContentfulStatusCode> = {
  SESSION_NOT_FOUND: 404,
  INDEX_OUT_OF_RANGE: 400,
  DIAGRAM_TOO_LARGE: 413,
  UNSUPPORTED_UPLOAD_FORMAT: 415,
  UPLOAD_DECODE_FAILED: 400,
  RENDER_FAILED: 502,
};

/**
 * Throw from a route for a controlled error with a specific status.
 *
 * @example
 * ```typescript
 * throw new AppError('BAD_REQUEST', 'Empty code', 400);
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, AppError);
  }
}

function envelope(code: string, message: string, details?: unknown): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
}

/**
 * Maps any thrown value to the envelope and its status.
 */
export function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: envelope(error.code, error.message, error.details),
      statusCode: error.statusCode,
    };
  }

  if (error instanceof DomainError) {
    return {
      response: envelope(error.code, error.message, error.details),
      statusCode: DOMAIN_STATUS[error.code],
    };
  }

  if (error instanceof LLMError) {
    return {
      response: envelope(ErrorCodes.MODEL_CALL_FAILED, `Model call failed: ${error.message}`, {
        type: error.type,
      }),
      statusCode: 502,
    };
  }

  if (error instanceof VoiceTokenError) {
    return {
      response: envelope(ErrorCodes.VOICE_TOKEN_FAILED, error.message),
      statusCode: 502,
    };
  }

  if (error instanceof z.ZodError) {
    return {
      response: envelope(
        ErrorCodes.VALIDATION_ERROR,
        'Invalid request',
        error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      ),
      statusCode: 400,
    };
  }

  const isDev = process.env.NODE_ENV !== 'production';

  if (error instanceof Error) {
    return {
      response: envelope(
        ErrorCodes.INTERNAL_ERROR,
        isDev ? error.message : 'An unexpected error occurred. Please try again.',
        isDev ? { stack: error.stack } : undefined
      ),
      statusCode: 500,
    };
  }

  // Non-Error throws
  return {
    response: envelope(
      ErrorCodes.INTERNAL_ERROR,
      'An unexpected error occurred',
      isDev ? { rawError: String(error) } : undefined
    ),
    statusCode: 500,
  };
}

function respond(error: unknown, c: Context): Response {
  const { response, statusCode } = formatErrorResponse(error);
  if (statusCode >= 500) {
    console.error('[Error Handler]', error);
  }
  return c.json(response, statusCode);
}

/**
 * For `app.onError`: Hono routes errors thrown by handlers here.
 */
export const handleError: ErrorHandler = (error, c) => respond(error, c);

/**
 * Outermost middleware. Catches what escapes `onError`, such as non-Error
 * throws from other middleware.
 */
export function errorHandler(): MiddlewareHandler {
  return async (c, next) => {
    try {
      await next();
    } catch (error) {
      return respond(error, c);
    }
  };
}
