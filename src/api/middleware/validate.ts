/**
 * Zod Body Validation
 *
 * Reads the JSON body and validates it against a schema. Failures throw a
 * ValidationError, which the error handler renders as a 400 with one
 * detail per offending field:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "owner", "message": "Required" }]
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * router.post('/', async (c) => {
 *   const update = await validateBody(c, incomingUpdateSchema);
 *   // update is typed from the schema
 * });
 * ```
 */

import type { Context } from 'hono';
import type { z } from 'zod';
import { ValidationError } from '@/core/errors';
import type { ValidationErrorDetail } from '../types';

export function toValidationDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * @throws {ValidationError} When the body is not JSON or does not match
 */
export async function validateBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new ValidationError('Request body must be valid JSON', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError('Invalid request body', toValidationDetails(result.error));
  }
  return result.data;
}
