/**
 * Application Error Taxonomy
 *
 * Every failure the core reports is an AppError subclass carrying a
 * machine-readable code and the HTTP status the API surface maps it to.
 * The command router turns the same classes into chat replies.
 *
 * | class            | code              | status | raised when                                  |
 * |------------------|-------------------|--------|----------------------------------------------|
 * | ValidationError  | VALIDATION_ERROR  | 400    | malformed CSV row, out-of-range setting      |
 * | ForbiddenError   | FORBIDDEN         | 403    | quiz reveal by someone other than the owner  |
 * | NotFoundError    | NOT_FOUND         | 404    | no session, unknown/expired/used quiz token  |
 * | NoCardsError     | NO_CARDS          | 404    | owner has nothing to review                  |
 * | ConflictError    | CONFLICT          | 409    | session already active, lost a race          |
 * | InvariantError   | INVARIANT_ERROR   | 500    | engine reached an impossible state           |
 * | DeliveryError    | DELIVERY_ERROR    | 502    | the messaging gateway failed                 |
 * | StoreError       | DATABASE_ERROR    | 503    | persistence unavailable                      |
 *
 * @example
 * ```typescript
 * if (existing) {
 *   throw new ConflictError('A review session is already running');
 * }
 * ```
 */

/**
 * Standard error codes used throughout the application.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  NO_CARDS: 'NO_CARDS',
  CONFLICT: 'CONFLICT',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  INVARIANT_ERROR: 'INVARIANT_ERROR',
  DELIVERY_ERROR: 'DELIVERY_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for controlled errors.
 *
 * @example
 * ```typescript
 * throw new AppError('NOT_FOUND', 'Card not found', 404);
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** HTTP status code to return */
  public readonly statusCode: number;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * Bad input from a user: a malformed CSV row or an out-of-range setting.
 * Reported to the user; processing continues with the remaining input.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * The requester is not allowed to act on the addressed resource.
 * The message stays generic so it leaks nothing about token validity.
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'This is not yours to open') {
    super(ErrorCodes.FORBIDDEN, message, 403);
    this.name = 'ForbiddenError';
  }
}

/**
 * The addressed session or token does not exist, is used up or has expired.
 */
export class NotFoundError extends AppError {
  constructor(message: string, code: ErrorCode = ErrorCodes.NOT_FOUND) {
    super(code, message, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * The owner has no cards to review or quiz on.
 */
export class NoCardsError extends NotFoundError {
  constructor(message: string = 'No cards available') {
    super(message, ErrorCodes.NO_CARDS);
    this.name = 'NoCardsError';
  }
}

/**
 * A session already exists, or a concurrent request won the race.
 * No state was changed.
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(ErrorCodes.CONFLICT, message, 409);
    this.name = 'ConflictError';
  }
}

/**
 * A programming invariant was violated (e.g. a grade outside 0..5).
 * Reaching one is a defect, not a recoverable condition.
 */
export class InvariantError extends AppError {
  constructor(message: string) {
    super(ErrorCodes.INVARIANT_ERROR, message, 500);
    this.name = 'InvariantError';
  }
}

/**
 * The messaging gateway failed to deliver a message.
 * Logged by loops and never retried within the same tick.
 */
export class DeliveryError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(
      ErrorCodes.DELIVERY_ERROR,
      message,
      502,
      cause === undefined ? undefined : { cause: describeCause(cause) }
    );
    this.name = 'DeliveryError';
  }
}

/**
 * The persistent store is unavailable or rejected the operation.
 */
export class StoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(
      ErrorCodes.DATABASE_ERROR,
      message,
      503,
      cause === undefined ? undefined : { cause: describeCause(cause) }
    );
    this.name = 'StoreError';
  }
}

/**
 * Wraps a store operation so driver failures surface as StoreError while
 * AppErrors raised inside (conflicts, not-found) pass through unchanged.
 *
 * @param operation - Short description used in the error message
 * @param fn - The store call to run
 */
export async function withStore<T>(operation: string, fn: () => Promise<T> | T): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new StoreError(`Failed to ${operation}`, error);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
