/**
 * Items Routes
 *
 * Example resource without persistence: echoes the path id and the optional
 * `q` query parameter.
 *
 * - GET /:itemId?q=  - { item_id, q }
 */

import { Hono } from 'hono';
import { parseParams, parseQuery } from '../middleware';
import { itemParamsSchema, itemQuerySchema, type ItemResponse } from '../types';

export function itemsRoutes(): Hono {
  const router = new Hono();

  router.get('/:itemId', (c) => {
    const { itemId } = parseParams(c, itemParamsSchema);
    const { q } = parseQuery(c, itemQuerySchema);

    const item: ItemResponse = { item_id: itemId, q: q ?? null };
    return c.json(item);
  });

  return router;
}
