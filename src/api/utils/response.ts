/**
 * API Response Utilities
 *
 * Helpers that wrap payloads in the standard envelopes from types.ts, so
 * route handlers never build `{ success, data }` by hand.
 *
 * @example
 * ```typescript
 * router.get('/', (c) => success(c, { status: 'ok' }));
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

/**
 * Maps an application status code onto the codes Hono's typing accepts.
 * Anything unknown becomes 500.
 */
export function toStatusCode(statusCode: number): ContentfulStatusCode {
  switch (statusCode) {
    case 200:
      return 200;
    case 201:
      return 201;
    case 400:
      return 400;
    case 403:
      return 403;
    case 404:
      return 404;
    case 409:
      return 409;
    case 502:
      return 502;
    case 503:
      return 503;
    default:
      return 500;
  }
}

/**
 * Creates a success response.
 *
 * @param statusCode - HTTP status (default 200)
 */
export function success<T>(c: Context, data: T, statusCode: number = 200): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };
  return c.json(response, toStatusCode(statusCode));
}

/**
 * Creates an error response. `details` is left out of the body when undefined.
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: number = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
  return c.json(response, toStatusCode(statusCode));
}
