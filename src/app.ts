/**
 * Hono application assembly.
 * Kept apart from the server bootstrap so tests can drive it with app.request.
 */

import { Hono } from 'hono';
import { createAuthMiddleware } from './api/middleware/auth.js';
import { errorHandler } from './api/middleware/error-handler.js';
import { createHealthRoutes } from './api/routes/health.js';
import { createProxyRoutes } from './api/routes/proxy.js';
import { createQuotaRoutes } from './api/routes/quota.js';
import type { ProxyManager } from './api/types.js';

export const VERSION = '0.1.0';

export interface AppDeps {
  manager: ProxyManager;
  apiKeys: readonly string[];
  upstreamId: string;
  cacheDriver: string;
  /** Request headers forwarded to the upstream. */
  forwardHeaders?: readonly string[];
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  // Global error handler
  app.onError(errorHandler);

  // Health route (no auth required)
  app.route(
    '/health',
    createHealthRoutes({ version: VERSION, upstream: deps.upstreamId, cacheDriver: deps.cacheDriver }),
  );

  // Auth-protected v1 routes
  const v1 = new Hono();
  v1.use('*', createAuthMiddleware(deps.apiKeys));
  v1.route('/quota', createQuotaRoutes(deps.manager));
  v1.route(
    '/proxy',
    createProxyRoutes(deps.manager, { basePath: '/v1/proxy', forwardHeaders: deps.forwardHeaders }),
  );

  app.route('/v1', v1);

  return app;
}
