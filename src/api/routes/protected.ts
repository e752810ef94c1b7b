/**
 * Protected Routes
 *
 * Example endpoints behind bearer token authentication. Only mounted when
 * at least one API key is configured.
 *
 * Requires header: Authorization: Bearer <token>
 */

import { Hono } from 'hono';
import { tokenPreview, type TokenStore } from '../../core/auth';
import { bearerAuth, getToken } from '../middleware';

export function protectedRoutes(store: TokenStore): Hono {
  const router = new Hono();

  router.use('*', bearerAuth(store));

  router.get('/', (c) => {
    return c.json({ message: 'Access granted', authenticated: 'true' });
  });

  router.get('/data', (c) => {
    return c.json({
      message: 'This is protected data',
      data: ['item1', 'item2', 'item3'],
      // Partial token, for debugging which key was used
      token_preview: tokenPreview(getToken(c)),
    });
  });

  return router;
}
