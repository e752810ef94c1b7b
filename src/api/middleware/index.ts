/**
 * API Middleware - Barrel Export
 *
 * Middleware is applied in this order:
 *
 * 1. Error Handler - registered with app.onError(), formats all errors
 * 2. Request Logger - logs method, path, status and duration
 * 3. Route-group middleware - bearerAuth() and databaseSession()
 *
 * @example
 * ```typescript
 * import { createErrorHandler, notFoundHandler, requestLogger } from './middleware';
 *
 * const app = new Hono();
 * app.onError(createErrorHandler(logger));
 * app.notFound(notFoundHandler);
 * app.use('*', requestLogger(logger));
 * ```
 */

// Error handler for consistent error responses
export {
  createErrorHandler,
  notFoundHandler,
  formatError,
  type ErrorHandlerOptions,
} from './error-handler';

// Request logger for debugging and monitoring
export {
  requestLogger,
  DEFAULT_REQUEST_LOGGER_CONFIG,
  type RequestLoggerConfig,
} from './logger';

// Bearer token authentication
export { bearerAuth, getToken } from './bearer-auth';

// Request-scoped database sessions
export { databaseSession, getSession } from './database-session';

// Request validation with Zod schemas
export { parseJsonBody, parseQuery, parseParams } from './validate';
