/**
 * Request Logger Middleware
 *
 * Logs one line per request:
 * ```
 * [API] POST    /updates 200 - 4ms
 * ```
 * Colorized outside production. Health checks are skipped.
 */

import type { MiddlewareHandler } from 'hono';
import type { Logger } from '@/core/logger';

export interface LoggerConfig {
  prefix: string;
  /** Path prefixes that are not logged */
  skipPaths: string[];
  colorize: boolean;
  logger: Logger;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: true,
  logger: console,
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function statusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  return colors.green;
}

/** `15ms` below a second, `1.25s` above. */
export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      await next();
      return;
    }

    const startTime = performance.now();
    await next();
    const elapsed = formatResponseTime(Math.round(performance.now() - startTime));

    const method = c.req.method;
    const status = c.res.status;

    if (finalConfig.colorize) {
      finalConfig.logger.log(
        [
          finalConfig.prefix,
          method.padEnd(7),
          path,
          `${statusColor(status)}${status}${colors.reset}`,
          '-',
          `${colors.dim}${elapsed}${colors.reset}`,
        ].join(' ')
      );
    } else {
      finalConfig.logger.log(`${finalConfig.prefix} ${method} ${path} ${status} - ${elapsed}`);
    }
  };
}
