/**
 * API Routes Aggregator
 *
 * Builds the route table: the fixed list of route groups this process
 * serves, decided once from the frozen feature flags. `createApp()` mounts
 * exactly these groups and nothing else.
 *
 * Route Structure:
 * - /              - Root greeting
 * - /healthcheck   - Health check endpoint
 * - /items         - Example echo resource (also under /v1/items)
 * - /v1/protected  - Bearer-token protected examples (authEnabled only)
 * - /v1/users      - Users CRUD (persistenceEnabled only)
 *
 * @example
 * ```typescript
 * const features = await composeFeatures({ tokenStore, gateway, logger });
 *
 * for (const group of buildRouteTable(features, { tokenStore, gateway })) {
 *   app.route(group.prefix, group.routes);
 * }
 * ```
 */

import { Hono } from 'hono';
import type { TokenStore } from '../../core/auth';
import type { FeatureFlags } from '../../core/features';
import type { PersistenceGateway } from '../../storage';
import { healthRoutes } from './health';
import { itemsRoutes } from './items';
import { protectedRoutes } from './protected';
import { usersRoutes } from './users';

// Re-export individual route modules for direct access
export { healthRoutes, type HealthCheckData } from './health';
export { itemsRoutes } from './items';
export { protectedRoutes } from './protected';
export { usersRoutes } from './users';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * One mountable group of routes.
 */
export interface RouteGroup {
  /** Stable name, used in logs */
  readonly name: string;
  /** Path prefix the group is mounted under */
  readonly prefix: string;
  readonly routes: Hono;
}

export interface RouteTableDependencies {
  tokenStore: TokenStore;
  gateway: PersistenceGateway;
}

// ============================================================================
// Root
// ============================================================================

export function rootRoutes(): Hono {
  const router = new Hono();

  router.get('/', (c) => c.json({ Hello: 'World' }));

  return router;
}

// ============================================================================
// Route Table
// ============================================================================

/**
 * Builds the frozen route table for the given feature flags.
 *
 * The always-on groups come first; the protected and users groups are only
 * present when their feature is enabled.
 */
export function buildRouteTable(
  features: FeatureFlags,
  deps: RouteTableDependencies
): readonly RouteGroup[] {
  const groups: RouteGroup[] = [
    { name: 'root', prefix: '/', routes: rootRoutes() },
    { name: 'healthcheck', prefix: '/healthcheck', routes: healthRoutes() },
    { name: 'items', prefix: '/items', routes: itemsRoutes() },
    { name: 'v1-items', prefix: '/v1/items', routes: itemsRoutes() },
  ];

  if (features.authEnabled) {
    groups.push({
      name: 'v1-protected',
      prefix: '/v1/protected',
      routes: protectedRoutes(deps.tokenStore),
    });
  }

  if (features.persistenceEnabled) {
    groups.push({
      name: 'v1-users',
      prefix: '/v1/users',
      routes: usersRoutes(deps.gateway),
    });
  }

  return Object.freeze(groups.map((group) => Object.freeze(group)));
}
