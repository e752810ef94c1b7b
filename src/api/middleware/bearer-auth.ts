/**
 * Bearer Token Middleware
 *
 * Guards a route group with the authorizer. On success the accepted token
 * is available to handlers through `getToken(c)`; on failure the
 * authorizer's error is thrown for the error handler to render:
 *
 * - 500 CONFIGURATION_ERROR when no tokens are configured
 * - 401 UNAUTHORIZED (with `WWW-Authenticate: Bearer`) when no token was sent
 * - 403 FORBIDDEN when the token is not accepted
 *
 * @example
 * ```typescript
 * const router = new Hono();
 * router.use('*', bearerAuth(tokenStore));
 * router.get('/', (c) => c.json({ preview: tokenPreview(getToken(c)) }));
 * ```
 */

import type { Context, MiddlewareHandler } from 'hono';
import { authorize, extractBearerToken, type TokenStore } from '../../core/auth';

declare module 'hono' {
  interface ContextVariableMap {
    /** Bearer token accepted by bearerAuth() */
    token: string;
  }
}

export function bearerAuth(store: TokenStore): MiddlewareHandler {
  return async (c, next) => {
    const credential = extractBearerToken(c.req.header('Authorization'));
    const result = authorize(store, credential);

    if (!result.ok) {
      throw result.error;
    }

    c.set('token', result.token);
    await next();
  };
}

/**
 * Token accepted for the current request.
 *
 * @throws Error if bearerAuth() did not run for this route
 */
export function getToken(c: Context): string {
  const token = c.get('token');

  if (!token) {
    throw new Error(
      'Bearer token not available. Ensure bearerAuth() middleware is applied to this route.'
    );
  }

  return token;
}
