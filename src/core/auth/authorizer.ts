/**
 * Bearer Token Authorizer
 *
 * Decides whether a request credential is accepted. The decision has three
 * distinct failure outcomes, checked in this order:
 *
 * 1. No tokens configured   -> ConfigurationError      (500)
 * 2. No credential supplied -> MissingCredentialError  (401, WWW-Authenticate: Bearer)
 * 3. Unknown credential     -> InvalidCredentialError  (403)
 *
 * Anything else succeeds and yields the credential.
 */

import { AppError, ConfigurationError, ErrorCodes } from '../errors';
import type { TokenStore } from './token-store';

/** The request presented no bearer credential. */
export class MissingCredentialError extends AppError {
  constructor(message: string = 'Missing bearer token') {
    super(ErrorCodes.UNAUTHORIZED, message, 401, {
      headers: { 'WWW-Authenticate': 'Bearer' },
    });
    this.name = 'MissingCredentialError';
  }
}

/** The request presented a bearer credential the store does not accept. */
export class InvalidCredentialError extends AppError {
  constructor(message: string = 'Invalid bearer token') {
    super(ErrorCodes.FORBIDDEN, message, 403);
    this.name = 'InvalidCredentialError';
  }
}

export type AuthError = ConfigurationError | MissingCredentialError | InvalidCredentialError;

export type AuthResult =
  | { ok: true; token: string }
  | { ok: false; error: AuthError };

/**
 * Validates a credential against the store.
 *
 * @param credential - Token taken from the request, or undefined when none was sent
 */
export function authorize(store: TokenStore, credential: string | undefined): AuthResult {
  if (!store.isConfigured()) {
    return {
      ok: false,
      error: new ConfigurationError('Bearer token authentication is not configured'),
    };
  }

  if (credential === undefined) {
    return { ok: false, error: new MissingCredentialError() };
  }

  if (!store.contains(credential)) {
    return { ok: false, error: new InvalidCredentialError() };
  }

  return { ok: true, token: credential };
}

/**
 * Pulls the credential out of an Authorization header value.
 *
 * The header is split at its first space into scheme and credential. A
 * missing header, an empty part or a scheme other than `Bearer` (any case)
 * means no credential was supplied.
 *
 * @example
 * ```typescript
 * extractBearerToken('Bearer abc123'); // 'abc123'
 * extractBearerToken('Basic abc123');  // undefined
 * ```
 */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }

  const separator = header.indexOf(' ');
  const scheme = separator === -1 ? header : header.slice(0, separator);
  const credential = separator === -1 ? '' : header.slice(separator + 1);

  if (!scheme || !credential || scheme.toLowerCase() !== 'bearer') {
    return undefined;
  }

  return credential;
}

/**
 * Short, loggable form of a token: its first eight characters and an ellipsis.
 */
export function tokenPreview(token: string): string {
  return `${token.slice(0, 8)}...`;
}
