/**
 * Users API Routes
 *
 * CRUD endpoints for the example persisted resource. Only mounted when a
 * database is configured; every request gets its own database session.
 *
 * Endpoints:
 * - POST /     - Create a user (201), 400 if email or username is taken
 * - GET  /:id  - Get a user, 404 if missing
 * - GET  /     - List users with ?skip=&limit= pagination
 */

import { Hono } from 'hono';
import { notFoundError } from '../../core/errors';
import type { PersistenceGateway } from '../../storage';
import { databaseSession, getSession, parseJsonBody, parseParams, parseQuery } from '../middleware';
import {
  createUserSchema,
  listUsersQuerySchema,
  toUserResponse,
  userIdParamsSchema,
} from '../types';

/**
 * Creates the users router.
 *
 * @example
 * ```typescript
 * app.route('/v1/users', usersRoutes(gateway));
 * ```
 */
export function usersRoutes(gateway: PersistenceGateway): Hono {
  const router = new Hono();

  router.use('*', databaseSession(gateway));

  /**
   * POST /
   *
   * Request body: { email, username, full_name?, is_active? }
   * Response: 201 Created with the new user
   */
  router.post('/', async (c) => {
    const body = await parseJsonBody(c, createUserSchema);

    const user = await getSession(c).users.create({
      email: body.email,
      username: body.username,
      fullName: body.full_name ?? null,
      isActive: body.is_active,
    });

    return c.json(toUserResponse(user), 201);
  });

  /**
   * GET /:id
   *
   * Response: 200 OK with the user, or 404 "User <id> not found"
   */
  router.get('/:id', async (c) => {
    const { id } = parseParams(c, userIdParamsSchema);

    const user = await getSession(c).users.findById(id);
    if (!user) {
      throw notFoundError('User', id);
    }

    return c.json(toUserResponse(user));
  });

  /**
   * GET /
   *
   * Query: skip (default 0), limit (default 100)
   * Response: 200 OK with an array of users ordered by id
   */
  router.get('/', async (c) => {
    const page = parseQuery(c, listUsersQuerySchema);

    const users = await getSession(c).users.findAll(page);

    return c.json(users.map(toUserResponse));
  });

  return router;
}
