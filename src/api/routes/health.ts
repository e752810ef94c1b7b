/**
 * Health Check Route
 *
 * Liveness endpoint for load balancers and container orchestration. It does
 * not touch the database or require authentication.
 *
 * @example
 * ```bash
 * curl http://localhost:8000/healthcheck
 * # {"status":"ok"}
 * ```
 */

import { Hono } from 'hono';

export interface HealthCheckData {
  /** Always 'ok' while the process is serving requests */
  status: 'ok';
}

/**
 * Creates the health check router. Mount it at `/healthcheck`.
 */
export function healthRoutes(): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = { status: 'ok' };
    return c.json(healthData);
  });

  return router;
}
