/**
 * Zod Validation Middleware
 *
 * `validate(schema)` parses the JSON body, validates it and stores the
 * result under `validatedBody`; handlers read it back, typed, with
 * `getValidatedBody(c, schema)`. Invalid bodies get a 400 with one detail
 * per failing field:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "sessionId", "message": "Required" }]
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * router.post('/evaluate', validate(evaluateSchema), async (c) => {
 *   const body = getValidatedBody(c, evaluateSchema);
 *   return success(c, await evaluator.evaluate(body));
 * });
 * ```
 */

import type { Context, Next, MiddlewareHandler } from 'hono';
import { z } from 'zod';
import { ErrorCodes } from './error-handler';
import type { ValidationErrorDetail, ApiErrorResponse } from '../types';

declare module 'hono' {
  interface ContextVariableMap {
    /** Set by `validate`; read with `getValidatedBody` */
    validatedBody: unknown;
    /** Set by `validateQuery`; read with `getValidatedQuery` */
    validatedQuery: unknown;
  }
}

function validationFailure(err: z.ZodError, message: string): ApiErrorResponse {
  const details: ValidationErrorDetail[] = err.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
  return {
    success: false,
    error: { code: ErrorCodes.VALIDATION_ERROR, message, details },
  };
}

export function validate<T extends z.ZodType>(schema: T): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      const response: ApiErrorResponse = {
        success: false,
        error: {
          code: ErrorCodes.INVALID_JSON,
          message: 'Request body must be valid JSON',
        },
      };
      return c.json(response, 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(validationFailure(result.error, 'Invalid request body'), 400);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

export function validateQuery<T extends z.ZodType>(schema: T): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(validationFailure(result.error, 'Invalid query parameters'), 400);
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}

/**
 * The body stored by `validate(schema)`, re-parsed with the same schema.
 * Throws a ZodError (400) if the route was mounted without `validate`.
 */
export function getValidatedBody<T extends z.ZodType>(c: Context, schema: T): z.output<T> {
  return schema.parse(c.get('validatedBody'));
}

export function getValidatedQuery<T extends z.ZodType>(c: Context, schema: T): z.output<T> {
  return schema.parse(c.get('validatedQuery'));
}
