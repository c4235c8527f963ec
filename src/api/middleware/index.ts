/**
 * API Middleware - Barrel Export
 *
 * Applied in this order by `createApp`:
 *
 * 1. Error Handler - formats every failure into the envelope
 * 2. Logger - one line per request
 * 3. CORS
 * 4. API key - bearer check when a key is configured
 * 5. Rate limiters - general on /api, tighter on model routes
 * 6. Validation - per route, zod schemas
 */

export { corsMiddleware, DEFAULT_CORS_CONFIG, type CorsConfig } from './cors';

export {
  errorHandler,
  handleError,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, formatResponseTime, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';

export {
  rateLimiter,
  generalRateLimiter,
  llmRateLimiter,
  RATE_LIMITS,
  type RateLimitConfig,
} from './rate-limit';

export { apiKeyAuth, type ApiKeyConfig } from './api-key';

export { validate, validateQuery, getValidatedBody, getValidatedQuery } from './validate';
