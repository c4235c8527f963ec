/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from './api';
 *
 * const app = createApp({ config, model, store, answers, evaluator, renderer, extractor, audit, voice: null });
 * const res = await app.request('/health');
 * ```
 */

export { createApp, type AppDependencies } from './app';
export { createApiRouter, healthRoutes, APP_VERSION, type ApiRouterDeps } from './routes';
export * from './middleware';
export { success, error, badRequest, serviceUnavailable } from './utils/response';
export type { ApiResponse, ApiErrorResponse, ApiResult, ApiError, ValidationErrorDetail } from './types';
