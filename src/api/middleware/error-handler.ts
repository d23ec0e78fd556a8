/**
 * Global Error Handler
 *
 * Installed with `app.onError`. Turns anything a route throws into the
 * standard error envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": { "code": "VALIDATION_ERROR", "message": "...", "details": [] }
 * }
 * ```
 *
 * AppErrors keep their own code and status. Other errors become a 500 with
 * the message and stack only outside production.
 */

import type { Context, ErrorHandler } from 'hono';
import { AppError, ErrorCodes } from '@/core/errors';
import type { Logger } from '@/core/logger';
import { error as errorResponse } from '../utils/response';

export interface ErrorHandlerOptions {
  logger?: Logger;
  /** Hide internal messages and stacks */
  production?: boolean;
}

export function errorHandler(options: ErrorHandlerOptions = {}): ErrorHandler {
  const logger = options.logger ?? console;
  const production = options.production ?? false;

  return (err: Error, c: Context) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        logger.error('[API] Request failed:', err);
      }
      return errorResponse(c, err.code, err.message, err.statusCode, err.details);
    }

    logger.error('[API] Unexpected error:', err);
    return errorResponse(
      c,
      ErrorCodes.INTERNAL_ERROR,
      production ? 'An unexpected error occurred. Please try again.' : err.message,
      500,
      production ? undefined : { stack: err.stack }
    );
  };
}
