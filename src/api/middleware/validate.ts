/**
 * Zod Request Validation
 *
 * Helpers that read part of a request, validate it against a Zod schema and
 * return the typed result. A failure throws a VALIDATION_ERROR (422) listing
 * every offending field, which the error handler turns into:
 *
 * ```json
 * {
 *   "detail": "Invalid request body",
 *   "code": "VALIDATION_ERROR",
 *   "errors": [{ "path": "email", "message": "Required" }]
 * }
 * ```
 *
 * @example
 * ```typescript
 * router.post('/', async (c) => {
 *   const body = await parseJsonBody(c, createUserSchema);
 *   // body is typed as z.infer<typeof createUserSchema>
 * });
 * ```
 */

import type { Context } from 'hono';
import { z } from 'zod';
import { AppError, ErrorCodes, validationError } from '../../core/errors';
import type { ValidationErrorDetail } from '../types';

function toDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw validationError(message, toDetails(result.error));
  }
  return result.data;
}

/**
 * Parses the JSON request body and validates it.
 *
 * @throws {AppError} INVALID_JSON when the body is not valid JSON
 * @throws {AppError} VALIDATION_ERROR when the body does not match the schema
 */
export async function parseJsonBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new AppError(ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 422);
    }
    throw err;
  }

  return parseWith(schema, body, 'Invalid request body');
}

/**
 * Validates the URL query parameters.
 */
export function parseQuery<T extends z.ZodTypeAny>(c: Context, schema: T): z.infer<T> {
  return parseWith(schema, c.req.query(), 'Invalid query parameters');
}

/**
 * Validates the route's path parameters.
 */
export function parseParams<T extends z.ZodTypeAny>(c: Context, schema: T): z.infer<T> {
  return parseWith(schema, c.req.param(), 'Invalid path parameters');
}
