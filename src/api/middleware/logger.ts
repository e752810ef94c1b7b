/**
 * Request Logger Middleware
 *
 * Logs one structured line per HTTP request once the response is ready:
 *
 * ```json
 * {"level":"info","module":"http","method":"GET","path":"/v1/users","status":200,"durationMs":3,"msg":"GET /v1/users 200"}
 * ```
 *
 * 5xx responses are logged at error level, 4xx at warn, the rest at info.
 *
 * @example
 * ```typescript
 * app.use('*', requestLogger(logger));
 *
 * // Or customize
 * app.use('*', requestLogger(logger, { skipPaths: ['/healthcheck', '/metrics'] }));
 * ```
 */

import type { MiddlewareHandler } from 'hono';
import type { Logger } from '../../logger';

export interface RequestLoggerConfig {
  /** Paths to skip logging (prefix match) */
  skipPaths: string[];
}

export const DEFAULT_REQUEST_LOGGER_CONFIG: RequestLoggerConfig = {
  skipPaths: ['/healthcheck'],
};

export function requestLogger(
  logger: Logger,
  config: Partial<RequestLoggerConfig> = {}
): MiddlewareHandler {
  const finalConfig: RequestLoggerConfig = {
    ...DEFAULT_REQUEST_LOGGER_CONFIG,
    ...config,
  };
  const log = logger.child({ module: 'http' });

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();

    await next();

    const durationMs = Math.round(performance.now() - startTime);
    const method = c.req.method;
    const status = c.res.status;
    const entry = { method, path, status, durationMs };
    const message = `${method} ${path} ${status}`;

    if (status >= 500) {
      log.error(entry, message);
    } else if (status >= 400) {
      log.warn(entry, message);
    } else {
      log.info(entry, message);
    }
  };
}
