/**
 * Global error handler.
 * Converts errors thrown by route handlers into `{ error: { message, type, code } }`
 * JSON responses.
 */

import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from '../../shared/logger.js';
import {
  CacheError,
  ConfigError,
  HttpStatusError,
  RateLimitExceededError,
  RemoteRateLimitError,
  TransportError,
} from '../../shared/errors.js';
import type { ErrorBody } from '../../shared/types.js';

function errorBody(message: string, type: string, code: string | null): ErrorBody {
  return { error: { message, type, code } };
}

function retryAfterSeconds(ms: number): string {
  return String(Math.max(1, Math.ceil(ms / 1000)));
}

/**
 * Error mapping:
 * - HTTPException -> its own status
 * - RateLimitExceededError -> 429 with Retry-After (local quota full)
 * - RemoteRateLimitError -> 429, with Retry-After when the upstream sent one
 * - HttpStatusError -> the upstream's 4xx/5xx status, 502 otherwise
 * - TransportError -> 502
 * - CacheError -> 503
 * - ConfigError, unknown -> 500 (no internal details exposed)
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return c.json(errorBody(err.message, 'invalid_request_error', null), err.status);
  }

  if (err instanceof RateLimitExceededError) {
    c.header('Retry-After', retryAfterSeconds(err.retryAfterMs));
    return c.json(err.toErrorBody(), 429);
  }

  if (err instanceof RemoteRateLimitError) {
    logger.warn({ upstream: err.clientId, endpoint: err.endpoint }, 'Upstream rate limited');
    if (err.retryAfterMs !== undefined) {
      c.header('Retry-After', retryAfterSeconds(err.retryAfterMs));
    }
    return c.json(
      errorBody(`Rate limited by upstream ${err.clientId}.`, 'rate_limit_error', 'upstream_rate_limited'),
      429,
    );
  }

  if (err instanceof HttpStatusError) {
    logger.warn({ upstream: err.clientId, endpoint: err.endpoint, status: err.statusCode }, 'Upstream error');
    const status = err.statusCode >= 400 && err.statusCode <= 599 ? err.statusCode : 502;
    return new Response(JSON.stringify(errorBody(err.message, 'upstream_error', 'upstream_error')), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  if (err instanceof TransportError) {
    logger.error({ err }, 'Upstream unreachable');
    return c.json(errorBody(err.message, 'upstream_error', 'upstream_unavailable'), 502);
  }

  if (err instanceof CacheError) {
    logger.error({ err }, 'Cache unavailable');
    return c.json(errorBody('Response cache unavailable', 'server_error', `cache_${err.operation}_failed`), 503);
  }

  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json(errorBody('Internal configuration error', 'server_error', 'config_error'), 500);
  }

  // Unknown error -- log full details but return generic message
  logger.error({ err }, 'Unhandled error');
  return c.json(errorBody('Internal server error', 'server_error', null), 500);
};
