/**
 * Request Logger Middleware
 *
 * Logs one line per request:
 * ```
 * [API] GET /api/sessions 200 - 15ms
 * [API] POST /api/question 201 - 1.84s
 * ```
 *
 * Colorized outside production; `/health` is skipped.
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  includeTimestamp: boolean;
  /** Path prefixes to skip */
  skipPaths: string[];
  colorize: boolean;
  /** Output sink, console.log by default */
  write: (line: string) => void;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  write: (line) => console.log(line),
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  if (status >= 200) return colors.green;
  return colors.dim;
}

function getMethodColor(method: string): string {
  switch (method.toUpperCase()) {
    case 'GET':
      return colors.cyan;
    case 'POST':
      return colors.green;
    case 'DELETE':
      return colors.red;
    default:
      return colors.magenta;
  }
}

export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const elapsed = formatResponseTime(Math.round(performance.now() - startTime));

    const method = c.req.method;
    const status = c.res.status;

    let line = finalConfig.colorize
      ? [
          finalConfig.prefix,
          `${getMethodColor(method)}${method.padEnd(7)}${colors.reset}`,
          path,
          `${getStatusColor(status)}${status}${colors.reset}`,
          '-',
          `${colors.dim}${elapsed}${colors.reset}`,
        ].join(' ')
      : `${finalConfig.prefix} ${method} ${path} ${status} - ${elapsed}`;

    if (finalConfig.includeTimestamp) {
      line = `[${new Date().toISOString()}] ${line}`;
    }

    finalConfig.write(line);
  };
}

export { DEFAULT_LOGGER_CONFIG };
