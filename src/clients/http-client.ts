/**
 * Generic JSON-over-HTTP client on the global fetch.
 * Handles URL construction, auth and default headers, timeouts, latency
 * measurement, error classification and rate limit header parsing, and
 * decides what a response looks like once cached.
 */

import { logger } from '../shared/logger.js';
import { HttpStatusError, RemoteRateLimitError, TransportError } from '../shared/errors.js';
import type { LogicalRequest } from '../shared/types.js';
import type {
  ApiClient,
  CachedHttpResponse,
  HttpApiClientOptions,
  HttpResponse,
  RateLimitInfo,
} from './types.js';
import { buildQueryString, parseResetToMs } from './utils.js';

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

export class HttpApiClient implements ApiClient<HttpResponse, CachedHttpResponse> {
  public readonly id: string;
  public readonly baseUrl: string;
  public readonly timeoutMs?: number;
  protected readonly apiKey?: string;
  private readonly defaultHeaders: Record<string, string>;
  private _lastRateLimit: RateLimitInfo | null = null;

  constructor(options: HttpApiClientOptions) {
    this.id = options.id;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.defaultHeaders = options.headers ?? {};
  }

  /** Rate limit info parsed from the most recent response, success or failure. */
  get lastRateLimit(): RateLimitInfo | null {
    return this._lastRateLimit;
  }

  /**
   * Send one request to the remote.
   * @throws RemoteRateLimitError on 429 responses.
   * @throws HttpStatusError on other non-OK responses.
   * @throws TransportError on network errors, timeouts and unparseable JSON.
   */
  async request(req: LogicalRequest): Promise<HttpResponse> {
    const method = req.method.toUpperCase();
    const url = `${this.baseUrl}${req.endpoint}${buildQueryString(req.params)}`;
    const hasBody = req.body !== undefined && !BODYLESS_METHODS.has(method);
    // String bodies go out verbatim; anything else is JSON-encoded
    let payload: string | undefined;
    if (hasBody) {
      payload = typeof req.body === 'string' ? req.body : JSON.stringify(req.body);
    }

    // Later sources replace earlier ones whatever the header name's case
    const headers = new Headers();
    if (hasBody) {
      headers.set('Content-Type', typeof req.body === 'string' ? 'text/plain; charset=UTF-8' : 'application/json');
    }
    if (this.apiKey) {
      headers.set('Authorization', `Bearer ${this.apiKey}`);
    }
    for (const source of [this.defaultHeaders, req.headers ?? {}]) {
      for (const [name, value] of Object.entries(source)) {
        headers.set(name, value);
      }
    }

    logger.debug({ client: this.id, method, url }, 'Sending request');

    const start = performance.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
    } catch (err) {
      const latencyMs = Math.round(performance.now() - start);
      const timedOut = err instanceof Error && err.name === 'TimeoutError';
      const message = timedOut
        ? `Request to ${this.id} timed out after ${this.timeoutMs}ms`
        : `Request to ${this.id} failed: ${err instanceof Error ? err.message : String(err)}`;
      logger.error({ client: this.id, method, endpoint: req.endpoint, latencyMs, timedOut }, 'Request failed');
      throw new TransportError(this.id, method, req.endpoint, message, err);
    }

    const latencyMs = Math.round(performance.now() - start);
    this._lastRateLimit = this.parseRateLimitHeaders(response.headers);

    if (response.status === 429) {
      const responseBody = await response.text();
      logger.warn(
        { client: this.id, method, endpoint: req.endpoint, latencyMs, rateLimit: this._lastRateLimit },
        'Remote returned 429 rate limit',
      );
      throw new RemoteRateLimitError(
        this.id,
        method,
        req.endpoint,
        response.headers,
        responseBody,
        this._lastRateLimit?.retryAfterMs,
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      logger.error(
        { client: this.id, method, endpoint: req.endpoint, status: response.status, latencyMs },
        'Remote returned error',
      );
      throw new HttpStatusError(this.id, method, req.endpoint, response.status, errorText, response.headers);
    }

    const body = await this.readBody(response, method, req.endpoint);

    logger.debug(
      { client: this.id, method, endpoint: req.endpoint, status: response.status, latencyMs },
      'Request succeeded',
    );

    return {
      status: response.status,
      headers: response.headers,
      body,
      latencyMs,
    };
  }

  /**
   * Cache the status, body and content type of successful responses.
   * Failures (null) and non-2xx responses are not cached.
   */
  processResponseForCache(response: HttpResponse | null): CachedHttpResponse | undefined {
    if (response === null || response.status < 200 || response.status >= 300) {
      return undefined;
    }
    return {
      status: response.status,
      body: response.body,
      contentType: response.headers.get('content-type'),
      storedAt: Date.now(),
    };
  }

  /**
   * Parse rate limit information from response headers.
   *
   * Recognized headers (the `-requests` suffixed form wins when both exist):
   *   x-ratelimit-limit[-requests]       -> max requests per remote window
   *   x-ratelimit-remaining[-requests]   -> remaining requests
   *   x-ratelimit-reset[-requests]       -> seconds, epoch seconds or duration string
   *   retry-after                        -> seconds (usually only on 429)
   */
  parseRateLimitHeaders(headers: Headers): RateLimitInfo | null {
    const limit = headers.get('x-ratelimit-limit-requests') ?? headers.get('x-ratelimit-limit');
    const remaining = headers.get('x-ratelimit-remaining-requests') ?? headers.get('x-ratelimit-remaining');
    const reset = headers.get('x-ratelimit-reset-requests') ?? headers.get('x-ratelimit-reset');
    const retryAfter = headers.get('retry-after');

    if (limit === null && remaining === null && reset === null && retryAfter === null) {
      return null;
    }

    const info: RateLimitInfo = {};

    if (limit !== null) {
      const parsed = parseInt(limit, 10);
      if (!isNaN(parsed)) info.limitRequests = parsed;
    }

    if (remaining !== null) {
      const parsed = parseInt(remaining, 10);
      if (!isNaN(parsed)) info.remainingRequests = parsed;
    }

    if (reset !== null) {
      const parsed = parseResetToMs(reset);
      if (parsed !== undefined) info.resetRequestsMs = parsed;
    }

    if (retryAfter !== null) {
      const seconds = parseFloat(retryAfter);
      if (!isNaN(seconds)) {
        info.retryAfterMs = Math.round(seconds * 1000);
      }
    }

    return info;
  }

  private async readBody(response: Response, method: string, endpoint: string): Promise<unknown> {
    const text = await response.text();
    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('json') || text === '') {
      return text;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new TransportError(this.id, method, endpoint, `Invalid JSON in response from ${this.id}`, err);
    }
  }
}
