/**
 * API key validation middleware for Hono.
 * Validates Bearer token in Authorization header against configured API keys.
 */

import { createMiddleware } from 'hono/factory';
import type { ErrorBody } from '../../shared/types.js';

function unauthorized(message: string): ErrorBody {
  return {
    error: {
      message,
      type: 'invalid_request_error',
      code: 'invalid_api_key',
    },
  };
}

/**
 * Create an auth middleware that validates API keys from the Authorization header.
 * @param apiKeys - Valid API keys from config.
 */
export function createAuthMiddleware(apiKeys: readonly string[]) {
  const keySet = new Set(apiKeys);

  return createMiddleware(async (c, next) => {
    const authorization = c.req.header('authorization');

    if (!authorization || !authorization.startsWith('Bearer ')) {
      return c.json(
        unauthorized('Missing or invalid API key. Provide a valid key in the Authorization header as Bearer <key>.'),
        401,
      );
    }

    const key = authorization.slice('Bearer '.length);

    if (!keySet.has(key)) {
      return c.json(unauthorized('Invalid API key provided.'), 401);
    }

    await next();
  });
}
