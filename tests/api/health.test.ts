/**
 * API Tests: Health, API Index and Voice Token
 */

import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { DEEPGRAM_CONFIG } from '../../src/core/voice';
import {
  createTestContext,
  createTestApp,
  cleanupTestDatabase,
  FakeVoiceTokenIssuer,
  type TestContext,
} from '../setup';
import { readData, readError } from '../helpers';

const healthSchema = z.object({
  status: z.literal('ok'),
  timestamp: z.string(),
  environment: z.string(),
  version: z.string(),
  llm: z.object({ provider: z.string(), enabled: z.boolean() }),
});

describe('Operational routes', () => {
  let ctx: TestContext;

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  describe('GET /health', () => {
    it('should report the environment and the model client', async () => {
      ctx = createTestContext();
      const app = createTestApp(ctx);

      const res = await app.request('/health');

      expect(res.status).toBe(200);
      const health = await readData(res, healthSchema);
      expect(health.environment).toBe('test');
      expect(health.version).toBe('0.1.0');
      expect(health.llm).toEqual({ provider: 'fake', enabled: true });
    });

    it('should show when answers come from the offline client', async () => {
      ctx = createTestContext();
      ctx.model.enabled = false;
      const app = createTestApp(ctx);

      const health = await readData(await app.request('/health'), healthSchema);

      expect(health.llm.enabled).toBe(false);
    });
  });

  describe('GET /api', () => {
    it('should describe the API', async () => {
      ctx = createTestContext();
      const app = createTestApp(ctx);

      const info = await readData(
        await app.request('/api'),
        z.object({ name: z.string(), endpoints: z.array(z.object({ path: z.string() })) })
      );

      expect(info.name).toBe('Interview Copilot API');
      expect(info.endpoints.map((endpoint) => endpoint.path)).toContain('/api/voice/token');
    });
  });

  describe('POST /api/voice/token', () => {
    it('should return 503 when voice is not configured', async () => {
      ctx = createTestContext();
      const app = createTestApp(ctx);

      const res = await app.request('/api/voice/token', { method: 'POST' });

      expect(res.status).toBe(503);
      expect(await readError(res)).toEqual({
        code: 'SERVICE_UNAVAILABLE',
        message: 'Voice input is not configured. Set DEEPGRAM_API_KEY to enable.',
      });
    });

    it('should issue a short-lived token with the streaming settings', async () => {
      ctx = createTestContext({ voice: new FakeVoiceTokenIssuer() });
      const app = createTestApp(ctx);

      const res = await app.request('/api/voice/token', { method: 'POST' });

      expect(res.status).toBe(200);
      expect(
        await readData(
          res,
          z.object({ token: z.string(), expiresAt: z.string(), config: z.record(z.unknown()) })
        )
      ).toEqual({
        token: 'test-voice-token',
        expiresAt: '2026-01-01T00:01:00.000Z',
        config: { ...DEEPGRAM_CONFIG },
      });
    });
  });
});
