/**
 * API Types
 *
 * Response envelopes shared by every endpoint, and the zod schema for the
 * chat updates the transport posts to `/updates`.
 */

import { z } from 'zod';

// ============================================================================
// Response Envelopes
// ============================================================================

/**
 * Successful response.
 *
 * @example
 * ```json
 * { "success": true, "data": { "handled": true } }
 * ```
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

/** Error body carried by a failed response. */
export interface ApiError {
  /** Machine-readable code, e.g. `VALIDATION_ERROR` */
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/** One field-level problem found while validating a request body. */
export interface ValidationErrorDetail {
  /** Dot-joined path to the field (`owner`, `content`) */
  path: string;
  message: string;
}

// ============================================================================
// Incoming Updates
// ============================================================================

const idSchema = z.string().trim().min(1).max(64);

export const messageUpdateSchema = z.object({
  type: z.literal('message'),
  owner: idSchema,
  chatId: idSchema,
  text: z.string().max(4096),
});

export const callbackUpdateSchema = z.object({
  type: z.literal('callback'),
  owner: idSchema,
  chatId: idSchema,
  data: z.string().min(1).max(64),
});

export const documentUpdateSchema = z.object({
  type: z.literal('document'),
  owner: idSchema,
  chatId: idSchema,
  fileName: z.string().min(1).max(255),
  // 1 MiB of text
  content: z.string().max(1024 * 1024),
});

export const incomingUpdateSchema = z.discriminatedUnion('type', [
  messageUpdateSchema,
  callbackUpdateSchema,
  documentUpdateSchema,
]);

export type IncomingUpdateInput = z.infer<typeof incomingUpdateSchema>;

/** Data returned by `POST /updates`. */
export interface UpdateHandledData {
  /** false when the message was not a known command (help was sent) */
  handled: boolean;
}
