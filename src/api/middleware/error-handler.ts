/**
 * Global Error Handler
 *
 * Registered with `app.onError()`. Every error thrown by a route or
 * middleware ends up here and is turned into the standard error body:
 *
 * ```json
 * {
 *   "detail": "Human-readable error message",
 *   "code": "ERROR_CODE",
 *   "errors": [ ... ] // validation failures only
 * }
 * ```
 *
 * `AppError`s keep their status, code and headers. Anything else is an
 * INTERNAL_ERROR (500) whose message is only revealed outside production.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(createErrorHandler(logger));
 * app.notFound(notFoundHandler);
 *
 * app.get('/boom', () => {
 *   throw new AppError(ErrorCodes.CONFLICT, 'Already exists', 400);
 * });
 * ```
 */

import type { ErrorHandler, NotFoundHandler } from 'hono';
import { AppError, ErrorCodes } from '../../core/errors';
import type { Logger } from '../../logger';
import type { ApiErrorResponse } from '../types';

export interface ErrorHandlerOptions {
  /** Include messages and stacks of unexpected errors (default: outside production) */
  exposeDetails?: boolean;
}

interface FormattedError {
  body: ApiErrorResponse;
  statusCode: number;
  headers: Readonly<Record<string, string>>;
}

/**
 * Formats an error into the standard API error response structure.
 */
export function formatError(error: unknown, exposeDetails: boolean): FormattedError {
  if (error instanceof AppError) {
    return {
      body: {
        detail: error.message,
        code: error.code,
        ...(error.code === ErrorCodes.VALIDATION_ERROR &&
          error.details !== undefined && { errors: error.details }),
      },
      statusCode: error.statusCode,
      headers: error.headers,
    };
  }

  if (error instanceof Error) {
    return {
      body: {
        detail: exposeDetails ? error.message : 'Internal Server Error',
        code: ErrorCodes.INTERNAL_ERROR,
        ...(exposeDetails && { debug: { stack: error.stack } }),
      },
      statusCode: 500,
      headers: {},
    };
  }

  // Non-Error throws
  return {
    body: {
      detail: 'Internal Server Error',
      code: ErrorCodes.INTERNAL_ERROR,
      ...(exposeDetails && { debug: { rawError: String(error) } }),
    },
    statusCode: 500,
    headers: {},
  };
}

function jsonResponse(
  body: ApiErrorResponse,
  status: number,
  headers: Readonly<Record<string, string>> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json; charset=UTF-8', ...headers },
  });
}

/**
 * Creates the `app.onError()` handler.
 *
 * Server errors (5xx) are logged at error level with the error attached;
 * client errors only at debug level.
 */
export function createErrorHandler(
  logger: Logger,
  options: ErrorHandlerOptions = {}
): ErrorHandler {
  const log = logger.child({ module: 'http' });
  const exposeDetails = options.exposeDetails ?? process.env.NODE_ENV !== 'production';

  return (err, c) => {
    const { body, statusCode, headers } = formatError(err, exposeDetails);
    const context = { method: c.req.method, path: c.req.path, status: statusCode };

    if (statusCode >= 500) {
      log.error({ ...context, err }, body.detail);
    } else {
      log.debug({ ...context, code: body.code }, body.detail);
    }

    return jsonResponse(body, statusCode, headers);
  };
}

/**
 * Handler for requests no route matched, including optional route groups
 * that were not composed into the app.
 */
export const notFoundHandler: NotFoundHandler = () =>
  jsonResponse({ detail: 'Not Found', code: ErrorCodes.NOT_FOUND }, 404);
