/**
 * Application Error Types
 *
 * Every controlled failure in the service is an `AppError`: it carries a
 * machine-readable code, the HTTP status the boundary should answer with and
 * any response headers that go with it. The API error handler turns these
 * into `{ "detail": ..., "code": ... }` bodies.
 *
 * @example
 * ```typescript
 * const user = await users.findById(id);
 * if (!user) {
 *   throw notFoundError('User', id); // 404 "User 42 not found"
 * }
 * ```
 */

/**
 * Standard error codes used throughout the service.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  CONFLICT: 'CONFLICT',

  // Server errors (5xx)
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for errors that map to a specific HTTP response.
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** HTTP status code to return */
  public readonly statusCode: number;
  /** Additional error context (optional) */
  public readonly details?: unknown;
  /** Extra response headers (e.g. WWW-Authenticate) */
  public readonly headers: Readonly<Record<string, string>>;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = 500,
    options: { details?: unknown; headers?: Record<string, string> } = {}
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = options.details;
    this.headers = options.headers ?? {};

    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * The server is missing configuration an operator has to supply.
 * Always a 5xx: the client did nothing wrong.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(ErrorCodes.CONFIGURATION_ERROR, message, 500);
    this.name = 'ConfigurationError';
  }
}

/**
 * Creates a 404 error for a missing resource, e.g. "User 99999 not found".
 */
export function notFoundError(resource: string, id: string | number): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, `${resource} ${id} not found`, 404, {
    details: { resource, id },
  });
}

/**
 * Creates a 400 error for a uniqueness conflict.
 */
export function conflictError(message: string): AppError {
  return new AppError(ErrorCodes.CONFLICT, message, 400);
}

/**
 * Creates a 422 error for input that failed schema validation.
 *
 * @param details - Field-level failures, passed through to the response
 */
export function validationError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, 422, { details });
}
