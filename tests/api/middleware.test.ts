/**
 * API Tests: Middleware
 *
 * Bearer key, rate limits, CORS and the 404 envelope, each configured
 * through the environment the app is built from.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createTestContext, createTestApp, cleanupTestDatabase, type TestContext } from '../setup';
import { createSessionWithTurns, jsonRequest, readError } from '../helpers';

describe('Middleware', () => {
  let ctx: TestContext;

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  describe('API key', () => {
    it('should require the bearer key on API routes when configured', async () => {
      // Arrange
      ctx = createTestContext({ env: { API_KEY: 'test-secret' } });
      const app = createTestApp(ctx);

      // Act
      const missing = await app.request('/api/sessions');
      const wrong = await app.request('/api/sessions', { headers: { Authorization: 'Bearer nope' } });
      const right = await app.request('/api/sessions', { headers: { Authorization: 'Bearer test-secret' } });

      // Assert
      expect(missing.status).toBe(401);
      expect(await readError(missing)).toEqual({ code: 'UNAUTHORIZED', message: 'Missing API key' });
      expect(wrong.status).toBe(401);
      expect(await readError(wrong)).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid API key' });
      expect(right.status).toBe(200);
    });

    it('should leave the health check open', async () => {
      ctx = createTestContext({ env: { API_KEY: 'test-secret' } });
      const app = createTestApp(ctx);

      const res = await app.request('/health');

      expect(res.status).toBe(200);
    });

    it('should not check anything when no key is configured', async () => {
      ctx = createTestContext();
      const app = createTestApp(ctx);

      const res = await app.request('/api/sessions');

      expect(res.status).toBe(200);
    });
  });

  describe('rate limiting', () => {
    it('should answer 429 once the general limit is spent', async () => {
      // Arrange
      ctx = createTestContext({ env: { RATE_LIMIT_MAX_REQUESTS: '2' } });
      const app = createTestApp(ctx);

      // Act
      const first = await app.request('/api/sessions');
      const second = await app.request('/api/sessions');
      const third = await app.request('/api/sessions');

      // Assert
      expect(first.headers.get('X-RateLimit-Limit')).toBe('2');
      expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
      expect(second.headers.get('X-RateLimit-Remaining')).toBe('0');
      expect(third.status).toBe(429);
      const error = await readError(third);
      expect(error.code).toBe('RATE_LIMITED');
      expect(error.message).toBe('Too many requests. Please try again later.');
    });

    it('should count clients separately', async () => {
      ctx = createTestContext({ env: { RATE_LIMIT_MAX_REQUESTS: '1' } });
      const app = createTestApp(ctx);

      await app.request('/api/sessions', { headers: { 'X-Forwarded-For': '10.0.0.1' } });
      const other = await app.request('/api/sessions', { headers: { 'X-Forwarded-For': '10.0.0.2, 10.0.0.9' } });
      const repeat = await app.request('/api/sessions', { headers: { 'X-Forwarded-For': '10.0.0.1' } });

      expect(other.status).toBe(200);
      expect(repeat.status).toBe(429);
    });

    it('should key clients by X-Real-IP when no forwarded address is sent', async () => {
      ctx = createTestContext({ env: { RATE_LIMIT_MAX_REQUESTS: '1' } });
      const app = createTestApp(ctx);

      await app.request('/api/sessions', { headers: { 'X-Real-IP': '10.0.0.3' } });
      const other = await app.request('/api/sessions', { headers: { 'X-Real-IP': '10.0.0.4' } });
      const repeat = await app.request('/api/sessions', { headers: { 'X-Real-IP': '10.0.0.3' } });

      expect(other.status).toBe(200);
      expect(repeat.status).toBe(429);
    });

    it('should apply the tighter limit to model routes only', async () => {
      // Arrange
      ctx = createTestContext({ env: { RATE_LIMIT_LLM_MAX_REQUESTS: '1' } });
      const app = createTestApp(ctx);
      const { id: sessionId } = await createSessionWithTurns(ctx.store);

      // Act
      const first = await app.request('/api/question', jsonRequest('POST', { sessionId, question: 'What is DNS?' }));
      const second = await app.request('/api/question', jsonRequest('POST', { sessionId, question: 'What is TCP?' }));
      const evaluate = await app.request('/api/evaluate', jsonRequest('POST', { sessionId, code: 'x = 1' }));
      const listing = await app.request('/api/sessions');

      // Assert
      expect(first.status).toBe(200);
      expect(second.status).toBe(429);
      expect(evaluate.status).toBe(429);
      expect(listing.status).toBe(200);
    });
  });

  describe('CORS', () => {
    it('should answer any origin with a wildcard list', async () => {
      ctx = createTestContext();
      const app = createTestApp(ctx);

      const res = await app.request('/api/sessions', { headers: { Origin: 'https://anywhere.test' } });

      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should echo a configured origin', async () => {
      ctx = createTestContext({ env: { ALLOWED_ORIGINS: 'https://app.test,https://admin.test' } });
      const app = createTestApp(ctx);

      const res = await app.request('/api/sessions', { headers: { Origin: 'https://admin.test' } });

      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('https://admin.test');
      expect(res.headers.get('Access-Control-Allow-Credentials')).toBe('true');
    });
  });

  describe('unknown routes', () => {
    it('should answer 404 in the error envelope', async () => {
      ctx = createTestContext();
      const app = createTestApp(ctx);

      const res = await app.request('/api/nope');

      expect(res.status).toBe(404);
      expect(await readError(res)).toEqual({ code: 'NOT_FOUND', message: 'Route GET /api/nope not found' });
    });
  });
});
