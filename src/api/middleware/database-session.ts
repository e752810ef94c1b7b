/**
 * Database Session Middleware
 *
 * Opens one database session per request and closes it once the rest of
 * the pipeline has finished, whether the handler succeeded or threw.
 * Handlers reach the session through `getSession(c)`.
 *
 * @example
 * ```typescript
 * router.use('*', databaseSession(gateway));
 * router.get('/:id', async (c) => {
 *   const user = await getSession(c).users.findById(1);
 * });
 * ```
 */

import type { Context, MiddlewareHandler } from 'hono';
import { withSession, type DatabaseSession, type PersistenceGateway } from '../../storage';

declare module 'hono' {
  interface ContextVariableMap {
    /** Request-scoped database session set by databaseSession() */
    db: DatabaseSession;
  }
}

export function databaseSession(gateway: PersistenceGateway): MiddlewareHandler {
  return async (c, next) => {
    await withSession(gateway, async (session) => {
      c.set('db', session);
      await next();
    });
  };
}

/**
 * Database session for the current request.
 *
 * @throws Error if databaseSession() did not run for this route
 */
export function getSession(c: Context): DatabaseSession {
  const session = c.get('db');

  if (!session) {
    throw new Error(
      'Database session not available. Ensure databaseSession() middleware is applied to this route.'
    );
  }

  return session;
}
