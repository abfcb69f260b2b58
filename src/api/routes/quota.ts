/**
 * Quota status routes.
 */

import { Hono } from 'hono';
import type { ProxyManager } from '../types.js';

/**
 * Create quota routes.
 * @returns Hono sub-app with the quota snapshot and a manual resync.
 */
export function createQuotaRoutes(manager: ProxyManager) {
  const app = new Hono();

  const status = () => ({
    quota: manager.quota.snapshot(),
    inFlight: manager.inFlight,
    remainingMs: manager.quota.remainingMs(),
  });

  // GET / - Current window state
  app.get('/', (c) => c.json(status()));

  // POST /resync - Pull the authoritative count now
  app.post('/resync', async (c) => {
    await manager.updateState();
    return c.json(status());
  });

  return app;
}
