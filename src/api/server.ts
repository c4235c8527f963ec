/**
 * Interview Copilot API Server
 *
 * Entry point: validates configuration, builds the runtime and serves the
 * Hono app on Node through @hono/node-server.
 *
 * Usage:
 *   npm start
 *
 * Environment Variables (see src/config.ts for the full list):
 *   PORT - Listening port (default: 8000)
 *   HOST - Bind address (default: 0.0.0.0)
 *   ANTHROPIC_API_KEY - Enables the real model; echo client otherwise
 *   API_KEY - Requires `Authorization: Bearer <key>` on /api routes
 */

import { serve } from '@hono/node-server';
import { config, validateConfig } from '../config';
import { buildRuntime } from '../bootstrap';
import { createApp } from './app';
import { APP_VERSION } from './routes';

async function startServer(): Promise<void> {
  validateConfig(config);

  const { db, deps, report } = await buildRuntime(config);
  if (report.skipped > 0) {
    console.warn(`[Server] Skipped ${report.skipped} unreadable session record(s)`);
  }

  const app = createApp(deps);
  const { port, host } = config.server;

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    console.log('');
    console.log(`[Server] Interview Copilot API v${APP_VERSION}`);
    console.log(`[Server] Listening on http://${host}:${info.port}`);
    console.log(`[Server] Environment: ${config.server.nodeEnv}`);
    console.log(`[Server] Sessions loaded: ${report.loaded}`);
    console.log(
      `[Server] Model: ${deps.model.enabled ? config.anthropic.model : 'disabled (echo client)'}`
    );
    console.log(
      `[Server] Rate limits: ${config.rateLimit.maxRequests} general, ` +
        `${config.rateLimit.llmMaxRequests} model requests per ${config.rateLimit.windowMs / 1000}s`
    );
    console.log('');
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.log(`\n[Server] Received ${signal}, shutting down...`);

    server.close();
    try {
      await deps.answers.settled();
      db.$client.close();
    } catch (err) {
      console.error('[Server] Error during shutdown:', err);
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
