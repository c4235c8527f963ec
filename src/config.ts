/**
 * Centralized Configuration Module
 *
 * Loads every runtime setting of the interview copilot from environment
 * variables and validates the result with a zod schema. Values that are
 * missing fall back to defaults suited to local development, so the server
 * starts (in mock-echo mode) with no environment at all.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.evaluationCache.policy);
 *
 *   // Stricter production checks (throws ConfigValidationError)
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';
import { OVERRIDE_KINDS, DEFAULT_EXCLUSIVE_OVERRIDES } from './core/prompting/override-policy';

// =============================================================================
// Configuration Schema
// =============================================================================

const unitInterval = z.number().transform((value) => Math.min(1, Math.max(0, value)));

/**
 * Zod schema for the runtime configuration.
 * Provides runtime validation and the inferred `Config` type.
 */
const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(8000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  database: z.object({
    path: z.string().min(1).default('interview-copilot.db'),
  }),

  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    // When set, overrides the per-question token estimate
    maxTokens: z.number().int().positive().optional(),
    temperature: unitInterval.default(0.4),
    topP: unitInterval.optional(),
    timeoutMs: z.number().int().positive().default(60_000),
  }),

  // Per-question token estimates used when anthropic.maxTokens is unset
  tokenBudget: z.object({
    simple: z.number().int().positive().default(300),
    code: z.number().int().positive().default(800),
    complex: z.number().int().positive().default(1200),
  }),

  deepgram: z.object({
    apiKey: z.string().optional(),
  }),

  security: z.object({
    // Bearer token required on /api routes when set
    apiKey: z.string().optional(),
  }),

  rateLimit: z.object({
    windowMs: z.number().int().positive().default(60_000),
    maxRequests: z.number().int().positive().default(300),
    llmMaxRequests: z.number().int().positive().default(30),
  }),

  cors: z.object({
    allowedOrigins: z.array(z.string()).default(['*']),
  }),

  audit: z.object({
    // JSONL file; auditing is disabled when unset
    path: z.string().optional(),
  }),

  evaluationCache: z.object({
    maxEntries: z.number().int().positive().default(500),
    // 0 disables expiry
    ttlMs: z.number().int().nonnegative().default(0),
    policy: z.enum(['lru', 'fifo']).default('lru'),
  }),

  prompts: z.object({
    exclusiveOverrides: z.array(z.enum(OVERRIDE_KINDS)).default([...DEFAULT_EXCLUSIVE_OVERRIDES]),
  }),

  rendering: z.object({
    primaryUrl: z.string().url().default('https://kroki.io'),
    fallbackUrl: z.string().url().default('https://mermaid.ink'),
    timeoutMs: z.number().int().positive().default(15_000),
  }),
});

export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns undefined if the input is unset so the schema default applies.
 */
function parseCommaSeparated(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/** Empty strings count as unset. */
function optionalString(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Reads process.env into the raw (pre-validation) config shape.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv) {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: optionalString(env.HOST),
      nodeEnv: optionalString(env.NODE_ENV),
    },
    database: {
      path: optionalString(env.DATABASE_PATH),
    },
    anthropic: {
      apiKey: optionalString(env.ANTHROPIC_API_KEY),
      model: optionalString(env.ANTHROPIC_MODEL),
      maxTokens: parseIntOrUndefined(env.ANTHROPIC_MAX_TOKENS),
      temperature: parseFloatOrUndefined(env.ANSWER_TEMPERATURE),
      topP: parseFloatOrUndefined(env.ANSWER_TOP_P),
      timeoutMs: parseIntOrUndefined(env.ANTHROPIC_TIMEOUT_MS),
    },
    tokenBudget: {
      simple: parseIntOrUndefined(env.MAX_TOKENS_SIMPLE),
      code: parseIntOrUndefined(env.MAX_TOKENS_CODE),
      complex: parseIntOrUndefined(env.MAX_TOKENS_COMPLEX),
    },
    deepgram: {
      apiKey: optionalString(env.DEEPGRAM_API_KEY),
    },
    security: {
      apiKey: optionalString(env.API_KEY),
    },
    rateLimit: {
      windowMs: parseIntOrUndefined(env.RATE_LIMIT_WINDOW_MS),
      maxRequests: parseIntOrUndefined(env.RATE_LIMIT_MAX_REQUESTS),
      llmMaxRequests: parseIntOrUndefined(env.RATE_LIMIT_LLM_MAX_REQUESTS),
    },
    cors: {
      allowedOrigins: parseCommaSeparated(env.ALLOWED_ORIGINS),
    },
    audit: {
      path: optionalString(env.AUDIT_LOG_PATH),
    },
    evaluationCache: {
      maxEntries: parseIntOrUndefined(env.EVALUATION_CACHE_MAX_ENTRIES),
      ttlMs: parseIntOrUndefined(env.EVALUATION_CACHE_TTL_MS),
      policy: optionalString(env.EVALUATION_CACHE_POLICY),
    },
    prompts: {
      exclusiveOverrides: parseCommaSeparated(env.PROMPT_EXCLUSIVE_OVERRIDES),
    },
    rendering: {
      primaryUrl: optionalString(env.RENDER_PRIMARY_URL),
      fallbackUrl: optionalString(env.RENDER_FALLBACK_URL),
      timeoutMs: parseIntOrUndefined(env.RENDER_TIMEOUT_MS),
    },
  };
}

/**
 * Parses a config from an arbitrary environment. Exposed so tests and the
 * CLI can build a config without touching process.env.
 */
export function parseConfig(env: NodeJS.ProcessEnv): z.SafeParseReturnType<z.input<typeof configSchema>, Config> {
  return configSchema.safeParse(loadFromEnvironment(env));
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Production checks that the schema alone cannot express.
 *
 * In production the model key is required (otherwise every answer would be
 * the mock echo) and the API must not be left open to every origin without
 * a bearer key.
 *
 * @throws {ConfigValidationError} If a production requirement is not met
 */
export function validateConfig(target: Config = config): void {
  if (target.server.nodeEnv !== 'production') {
    return;
  }

  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (!target.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  if (target.cors.allowedOrigins.includes('*') && !target.security.apiKey) {
    invalidVars.push({
      name: 'ALLOWED_ORIGINS',
      reason: 'wildcard origins require API_KEY to be set in production',
    });
  }

  if (missingVars.length === 0 && invalidVars.length === 0) {
    return;
  }

  const errorParts: string[] = [];
  if (missingVars.length > 0) {
    errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
  }
  if (invalidVars.length > 0) {
    errorParts.push(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`
    );
  }

  throw new ConfigValidationError(
    ['CONFIGURATION ERROR', ...errorParts.map((part) => `  ${part}`)].join('\n'),
    missingVars,
    invalidVars
  );
}

// =============================================================================
// Configuration Export
// =============================================================================

const parseResult = parseConfig(process.env);

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object, loaded once at import time.
 */
export const config: Config = parseResult.data;

export default config;
