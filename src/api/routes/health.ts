/**
 * GET /health handler.
 * Returns server status information. No authentication required.
 */

import { Hono } from 'hono';

export interface HealthInfo {
  version: string;
  upstream: string;
  cacheDriver: string;
}

/**
 * Create health routes.
 * @returns Hono app with GET / route for health checks.
 */
export function createHealthRoutes(info: HealthInfo) {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({
      status: 'ok',
      version: info.version,
      uptime: process.uptime(),
      upstream: info.upstream,
      cache: info.cacheDriver,
    });
  });

  return app;
}
