/**
 * Unit Tests: Configuration
 *
 * Parses configs from explicit environments; process.env is never touched.
 */

import { describe, it, expect } from 'vitest';
import { ConfigValidationError, parseConfig, validateConfig } from '../../src/config';
import { createTestConfig } from '../setup';

describe('parseConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = createTestConfig();

    expect(config.server).toEqual({ port: 8000, host: '0.0.0.0', nodeEnv: 'test' });
    expect(config.anthropic.apiKey).toBeUndefined();
    expect(config.anthropic.maxTokens).toBeUndefined();
    expect(config.anthropic.temperature).toBe(0.4);
    expect(config.tokenBudget).toEqual({ simple: 300, code: 800, complex: 1200 });
    expect(config.rateLimit).toEqual({ windowMs: 60_000, maxRequests: 300, llmMaxRequests: 30 });
    expect(config.cors.allowedOrigins).toEqual(['*']);
    expect(config.evaluationCache).toEqual({ maxEntries: 500, ttlMs: 0, policy: 'lru' });
    expect(config.prompts.exclusiveOverrides).toEqual(['greeting', 'offTopic']);
    expect(config.rendering).toEqual({
      primaryUrl: 'https://kroki.io',
      fallbackUrl: 'https://mermaid.ink',
      timeoutMs: 15_000,
    });
  });

  it('should read and convert environment values', () => {
    const config = createTestConfig({
      PORT: '9100',
      ANTHROPIC_API_KEY: 'test-secret',
      ANTHROPIC_MAX_TOKENS: '2048',
      ANSWER_TEMPERATURE: '1.7',
      ALLOWED_ORIGINS: 'http://localhost:3000, https://app.test ,',
      EVALUATION_CACHE_POLICY: 'fifo',
      EVALUATION_CACHE_TTL_MS: '60000',
      PROMPT_EXCLUSIVE_OVERRIDES: '',
    });

    expect(config.server.port).toBe(9100);
    expect(config.anthropic.apiKey).toBe('test-secret');
    expect(config.anthropic.maxTokens).toBe(2048);
    expect(config.anthropic.temperature).toBe(1);
    expect(config.cors.allowedOrigins).toEqual(['http://localhost:3000', 'https://app.test']);
    expect(config.evaluationCache.policy).toBe('fifo');
    expect(config.evaluationCache.ttlMs).toBe(60_000);
    expect(config.prompts.exclusiveOverrides).toEqual([]);
  });

  it('should treat blank strings as unset', () => {
    const config = createTestConfig({ ANTHROPIC_API_KEY: '   ', HOST: '' });

    expect(config.anthropic.apiKey).toBeUndefined();
    expect(config.server.host).toBe('0.0.0.0');
  });

  it('should reject unknown enum values', () => {
    expect(parseConfig({ EVALUATION_CACHE_POLICY: 'random' }).success).toBe(false);
    expect(parseConfig({ PROMPT_EXCLUSIVE_OVERRIDES: 'greeting,smalltalk' }).success).toBe(false);
    expect(parseConfig({ RENDER_PRIMARY_URL: 'not a url' }).success).toBe(false);
  });
});

describe('validateConfig', () => {
  it('should skip checks outside production', () => {
    expect(() => validateConfig(createTestConfig())).not.toThrow();
  });

  it('should require the model key and a bearer key for open CORS in production', () => {
    // Arrange
    const config = createTestConfig({ NODE_ENV: 'production' });

    // Act
    let caught: unknown;
    try {
      validateConfig(config);
    } catch (err) {
      caught = err;
    }

    // Assert
    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;
    expect(caught.missingVars).toEqual(['ANTHROPIC_API_KEY']);
    expect(caught.invalidVars).toEqual([
      { name: 'ALLOWED_ORIGINS', reason: 'wildcard origins require API_KEY to be set in production' },
    ]);
  });

  it('should pass a complete production config', () => {
    const config = createTestConfig({
      NODE_ENV: 'production',
      ANTHROPIC_API_KEY: 'test-secret',
      ALLOWED_ORIGINS: 'https://app.test',
    });

    expect(() => validateConfig(config)).not.toThrow();
  });
});
