/**
 * Hono Application Factory
 *
 * Assembles the HTTP surface from already-resolved dependencies. Nothing in
 * here reads the environment: the caller hands in the token store, the
 * persistence gateway and the feature flags, so tests can build an app with
 * exactly the features they need.
 *
 * Middleware and handlers, in order:
 * 1. Error handler (`app.onError`) - turns every thrown error into JSON
 * 2. Not-found handler - `{"detail":"Not Found","code":"NOT_FOUND"}`
 * 3. Request logger
 * 4. The route groups from `buildRouteTable()`
 *
 * Trailing slashes are not significant: `/v1/users` and `/v1/users/` reach
 * the same handler.
 *
 * @example
 * ```typescript
 * const features = await composeFeatures({ tokenStore, gateway, logger });
 * const app = createApp({ features, tokenStore, gateway, logger });
 *
 * const res = await app.request('/healthcheck');
 * ```
 */

import { Hono } from 'hono';
import type { TokenStore } from '../core/auth';
import { composeFeatures, type FeatureFlags } from '../core/features';
import type { Logger } from '../logger';
import type { PersistenceGateway } from '../storage';
import { createErrorHandler, notFoundHandler, requestLogger } from './middleware';
import { buildRouteTable } from './routes';

export interface AppDependencies {
  features: FeatureFlags;
  tokenStore: TokenStore;
  gateway: PersistenceGateway;
  logger: Logger;
  /** Reveal messages and stacks of unexpected errors (default: outside production) */
  exposeErrorDetails?: boolean;
}

/**
 * Creates the Hono application and mounts the route table.
 */
export function createApp(deps: AppDependencies): Hono {
  const app = new Hono({ strict: false });

  app.onError(createErrorHandler(deps.logger, { exposeDetails: deps.exposeErrorDetails }));
  app.notFound(notFoundHandler);

  app.use('*', requestLogger(deps.logger));

  const routeTable = buildRouteTable(deps.features, {
    tokenStore: deps.tokenStore,
    gateway: deps.gateway,
  });

  for (const group of routeTable) {
    app.route(group.prefix, group.routes);
  }

  deps.logger.child({ module: 'app' }).debug(
    { groups: routeTable.map((group) => group.name) },
    'Route table mounted'
  );

  return app;
}

/**
 * Runs the startup composition and builds the app in one step.
 *
 * Schema initialization happens here when a database is configured.
 */
export async function composeApplication(
  deps: Omit<AppDependencies, 'features'>
): Promise<{ app: Hono; features: FeatureFlags }> {
  const features = await composeFeatures(deps);
  const app = createApp({ ...deps, features });
  return { app, features };
}
