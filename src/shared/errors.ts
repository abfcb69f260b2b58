/**
 * Custom error classes for apiwarden.
 * Every class sets `name` so errors stay recognizable after serialization,
 * and the HTTP error handler maps each one to a JSON error body.
 */

import type { ErrorBody } from './types.js';

/** Error thrown when options, config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Local admission denied: the quota window is full.
 * No network call was made and no quota was consumed.
 */
export class RateLimitExceededError extends Error {
  /** Calls permitted per window. */
  public readonly limit: number;
  /** Calls left in the current window at the time of denial. */
  public readonly remaining: number;
  /** Epoch milliseconds at which the current window ends. */
  public readonly resetAt: number;
  /** Milliseconds until the window ends. */
  public readonly retryAfterMs: number;

  constructor(limit: number, remaining: number, resetAt: number, retryAfterMs: number) {
    super(`Rate limit of ${limit} calls reached; window resets in ${retryAfterMs}ms`);
    this.name = 'RateLimitExceededError';
    this.limit = limit;
    this.remaining = remaining;
    this.resetAt = resetAt;
    this.retryAfterMs = retryAfterMs;
  }

  toErrorBody(): ErrorBody {
    return {
      error: {
        message: this.message,
        type: 'rate_limit_error',
        code: 'rate_limit_exceeded',
      },
    };
  }
}

/** A live call failed before a usable response arrived (network error, timeout). */
export class TransportError extends Error {
  public readonly clientId: string;
  public readonly method: string;
  public readonly endpoint: string;

  constructor(clientId: string, method: string, endpoint: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransportError';
    this.clientId = clientId;
    this.method = method;
    this.endpoint = endpoint;
  }
}

/** The remote answered with a non-success status. */
export class HttpStatusError extends TransportError {
  public readonly statusCode: number;
  public readonly responseBody: string;
  public readonly headers: Headers;

  constructor(
    clientId: string,
    method: string,
    endpoint: string,
    statusCode: number,
    responseBody: string,
    headers: Headers,
  ) {
    super(clientId, method, endpoint, `${clientId} returned ${statusCode} for ${method} ${endpoint}`);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
    this.headers = headers;
  }
}

/** Specifically a 429 from the remote: its own limiter says the quota is spent. */
export class RemoteRateLimitError extends HttpStatusError {
  /** Explicit retry-after from the response, in milliseconds. */
  public readonly retryAfterMs?: number;

  constructor(
    clientId: string,
    method: string,
    endpoint: string,
    headers: Headers,
    responseBody: string = '',
    retryAfterMs?: number,
  ) {
    super(clientId, method, endpoint, 429, responseBody, headers);
    this.name = 'RemoteRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** The cache collaborator failed to read or write. */
export class CacheError extends Error {
  public readonly operation: 'read' | 'write';
  public readonly key: string;

  constructor(operation: 'read' | 'write', key: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cache ${operation} failed for key ${key}: ${detail}`, { cause });
    this.name = 'CacheError';
    this.operation = operation;
    this.key = key;
  }
}

/** Thrown by requestWithWait when the quota does not free up within maxWaitMs. */
export class QuotaWaitTimeoutError extends Error {
  public readonly waitedMs: number;

  constructor(waitedMs: number, message = 'Timed out waiting for quota window to reset') {
    super(message);
    this.name = 'QuotaWaitTimeoutError';
    this.waitedMs = waitedMs;
  }
}
