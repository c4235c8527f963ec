/**
 * Health Check Route
 *
 * Mounted at `/health`, outside `/api`, so it bypasses the API key and the
 * rate limiters. Reports whether a real model is configured; without an
 * Anthropic key the server runs on the echo client and `llm.enabled` is
 * false.
 *
 * @example
 * ```bash
 * curl http://localhost:8000/health
 * # {
 * #   "success": true,
 * #   "data": {
 * #     "status": "ok",
 * #     "timestamp": "2026-01-15T10:30:00.000Z",
 * #     "environment": "development",
 * #     "version": "0.1.0",
 * #     "llm": { "provider": "anthropic", "enabled": true }
 * #   }
 * # }
 * ```
 */

import { Hono } from 'hono';
import type { ModelClient } from '../../llm/types';
import { success } from '../utils/response';

// ============================================================================
// Type Definitions
// ============================================================================

export interface HealthCheckData {
  status: 'ok';
  timestamp: string;
  environment: string;
  version: string;
  llm: {
    provider: string;
    enabled: boolean;
  };
}

export interface HealthRouteDeps {
  model: ModelClient;
  environment: string;
}

/**
 * Application version - should match package.json version.
 */
export const APP_VERSION = '0.1.0';

// ============================================================================
// Route Definition
// ============================================================================

export function healthRoutes({ model, environment }: HealthRouteDeps): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment,
      version: APP_VERSION,
      llm: {
        provider: model.provider,
        enabled: model.enabled,
      },
    };

    return success(c, healthData);
  });

  return router;
}
