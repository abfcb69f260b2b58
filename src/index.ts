/**
 * apiwarden server entry point.
 * Loads configuration, builds the client, cache and manager, creates the
 * Hono application and starts the HTTP server.
 */

import { serve } from '@hono/node-server';
import { logger } from './shared/logger.js';
import { ConfigError } from './shared/errors.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import type { Config } from './config/types.js';
import { createApp, VERSION } from './app.js';
import { createRuntime } from './runtime.js';

const MIN_PRUNE_INTERVAL_MS = 60_000;

// --- Bootstrap ---

logger.info(`apiwarden v${VERSION} starting...`);

const configPath = resolveConfigPath();
let config: Config;
try {
  config = loadConfig(configPath);
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`\n${err.message}\n`);
  console.error('To create a config file, run:');
  console.error('  apiwarden --init\n');
  console.error('Or specify a custom config path:');
  console.error('  apiwarden --config /path/to/config.yaml\n');
  process.exit(1);
}

// Update logger level from config
logger.level = config.settings.logLevel;

const portOverride = process.env['PORT'];
const port = portOverride ? Number.parseInt(portOverride, 10) : config.settings.port;
if (!Number.isInteger(port) || port < 1 || port > 65535) {
  console.error(`Invalid port: ${portOverride}`);
  process.exit(1);
}

const runtime = createRuntime(config);

const app = createApp({
  manager: runtime.manager,
  apiKeys: config.settings.apiKeys,
  upstreamId: config.upstream.id,
  cacheDriver: config.cache.driver,
  forwardHeaders: config.fingerprint.includeHeaders,
});

// --- Expired cache cleanup ---

const ttlMs = config.cache.ttlMs;
const pruneTimer =
  config.cache.driver === 'sqlite' && ttlMs !== undefined
    ? setInterval(() => {
        runtime.prune();
      }, Math.max(ttlMs, MIN_PRUNE_INTERVAL_MS))
    : undefined;
pruneTimer?.unref();

// --- Start server ---

const server = serve(
  {
    fetch: app.fetch,
    port,
  },
  (info) => {
    logger.info({ port: info.port }, `apiwarden listening on port ${info.port}`);
    logger.info(
      {
        upstream: config.upstream.baseUrl,
        threshold: config.quota.threshold,
        windowMs: config.quota.windowMs,
        cache: config.cache.driver,
      },
      'Ready',
    );
  },
);

// --- Graceful shutdown ---

const shutdown = () => {
  logger.info('Shutting down...');
  clearInterval(pruneTimer);
  runtime.close();
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// --- Unhandled rejection handler ---

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});
