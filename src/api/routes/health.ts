/**
 * Health Check Route
 *
 * Lightweight liveness probe; touches neither the database nor the gateway.
 *
 * @example
 * ```bash
 * curl http://localhost:3000/health
 * # { "success": true, "data": { "status": "ok", "timestamp": "...",
 * #   "environment": "development", "version": "0.1.0" } }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 time of the check */
  timestamp: string;
  environment: string;
  version: string;
}

/** Kept in step with package.json. */
export const APP_VERSION = '0.1.0';

export function healthRoutes(environment: string): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const data: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment,
      version: APP_VERSION,
    };
    return success(c, data);
  });

  return router;
}
