/**
 * API Module - Barrel Export
 *
 * The HTTP surface: the app factory, the route table and the middleware.
 * Starting a server is `server.ts`'s job; importing this module never does.
 *
 * @example
 * ```typescript
 * import { createApp } from './api';
 *
 * const app = createApp({ features, tokenStore, gateway, logger });
 * const res = await app.request('/healthcheck');
 * ```
 */

export { createApp, composeApplication, type AppDependencies } from './app';

export {
  createErrorHandler,
  notFoundHandler,
  formatError,
  requestLogger,
  bearerAuth,
  getToken,
  databaseSession,
  getSession,
  parseJsonBody,
  parseQuery,
  parseParams,
} from './middleware';

export { buildRouteTable, rootRoutes, type RouteGroup } from './routes';

export type { ApiErrorResponse, ValidationErrorDetail, UserResponse, ItemResponse } from './types';
