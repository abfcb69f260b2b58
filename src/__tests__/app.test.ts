import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { createApp } from '../app.js';
import { MemoryCache } from '../cache/memory-cache.js';
import type { ResponseCache } from '../cache/types.js';
import { HttpApiClient } from '../clients/http-client.js';
import type { CachedHttpResponse } from '../clients/types.js';
import { ApiManager } from '../manager/api-manager.js';
import { remainingRequestsResync, type QuotaResync } from '../manager/resync.js';

// --- Test Helpers ---

const START = 1_700_000_000_000;
const AUTH = { Authorization: 'Bearer test-key' };

function upstreamJson(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

describe('app', () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function build(
    options: {
      threshold?: number;
      cache?: ResponseCache<CachedHttpResponse>;
      resync?: QuotaResync;
      forwardHeaders?: string[];
    } = {},
  ) {
    const client = new HttpApiClient({ id: 'example', baseUrl: 'https://api.example.com', apiKey: 'test-secret' });
    const manager = new ApiManager({
      windowMs: 60_000,
      threshold: options.threshold ?? 2,
      client,
      cache: options.cache ?? new MemoryCache<CachedHttpResponse>(),
      resync: options.resync,
      fingerprint: { includeHeaders: options.forwardHeaders },
      clock: () => START,
    });
    const app = createApp({
      manager,
      apiKeys: ['test-key'],
      upstreamId: 'example',
      cacheDriver: 'memory',
      forwardHeaders: options.forwardHeaders,
    });
    return { app, manager };
  }

  function lastFetch(): { url: string; init: RequestInit } {
    const call = fetchMock.mock.calls.at(-1);
    if (!call) throw new Error('fetch was not called');
    return { url: String(call[0]), init: call[1] ?? {} };
  }

  describe('GET /health', () => {
    it('responds without auth', async () => {
      const { app } = build();
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'ok', version: '0.1.0', upstream: 'example', cache: 'memory' });
    });
  });

  describe('auth', () => {
    it('rejects requests without a bearer token', async () => {
      const { app } = build();
      const res = await app.request('/v1/quota');

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ error: { type: 'invalid_request_error', code: 'invalid_api_key' } });
    });

    it('rejects unknown keys', async () => {
      const { app } = build();
      const res = await app.request('/v1/quota', { headers: { Authorization: 'Bearer wrong-key' } });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: { message: 'Invalid API key provided.', type: 'invalid_request_error', code: 'invalid_api_key' },
      });
    });
  });

  describe('proxy', () => {
    it('forwards a miss upstream and answers the repeat from cache', async () => {
      fetchMock.mockImplementation(async () => upstreamJson({ id: 1, name: 'widget' }));
      const { app } = build();

      const first = await app.request('/v1/proxy/items/1?page=2', { headers: AUTH });
      expect(first.status).toBe(200);
      expect(first.headers.get('x-cache')).toBe('MISS');
      expect(first.headers.get('x-quota-remaining')).toBe('1');
      expect(await first.json()).toEqual({ id: 1, name: 'widget' });
      expect(lastFetch().url).toBe('https://api.example.com/items/1?page=2');
      expect(new Headers(lastFetch().init.headers).get('authorization')).toBe('Bearer test-secret');

      const second = await app.request('/v1/proxy/items/1?page=2', { headers: AUTH });
      expect(second.status).toBe(200);
      expect(second.headers.get('x-cache')).toBe('HIT');
      expect(second.headers.get('x-quota-remaining')).toBe('1');
      expect(await second.json()).toEqual({ id: 1, name: 'widget' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('passes text bodies through with their content type', async () => {
      fetchMock.mockImplementation(
        async () => new Response('hello', { status: 200, headers: { 'content-type': 'text/plain' } }),
      );
      const { app } = build();

      const res = await app.request('/v1/proxy/greeting', { headers: AUTH });

      expect(res.headers.get('content-type')).toBe('text/plain');
      expect(await res.text()).toBe('hello');
    });

    it('forwards JSON bodies for POST', async () => {
      fetchMock.mockImplementation(async () => upstreamJson({ created: true }, 201));
      const { app } = build();

      const res = await app.request('/v1/proxy/items', {
        method: 'POST',
        headers: { ...AUTH, 'Content-Type': 'application/json' },
        body: JSON.stringify({ name: 'widget' }),
      });

      expect(res.status).toBe(201);
      expect(lastFetch().init.method).toBe('POST');
      expect(lastFetch().init.body).toBe('{"name":"widget"}');
    });

    it('forwards form bodies verbatim with their content type', async () => {
      fetchMock.mockImplementation(async () => upstreamJson({ ok: true }));
      const { app } = build();

      const res = await app.request('/v1/proxy/form', {
        method: 'POST',
        headers: { ...AUTH, 'Content-Type': 'application/x-www-form-urlencoded' },
        body: 'a=1&b=2',
      });

      expect(res.status).toBe(200);
      expect(lastFetch().init.body).toBe('a=1&b=2');
      expect(new Headers(lastFetch().init.headers).get('content-type')).toBe('application/x-www-form-urlencoded');
    });

    it('counts in-flight requests against the reported remaining quota', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      fetchMock.mockImplementation(async (input) => {
        if (String(input).endsWith('/slow')) await gate;
        return upstreamJson({});
      });
      const { app } = build({ threshold: 3 });

      const slow = app.request('/v1/proxy/slow', { headers: AUTH });
      await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));

      const fast = await app.request('/v1/proxy/fast', { headers: AUTH });
      expect(fast.status).toBe(200);
      expect(fast.headers.get('x-quota-remaining')).toBe('1');

      release();
      const done = await slow;
      expect(done.status).toBe(200);
      expect(done.headers.get('x-quota-remaining')).toBe('1');
    });

    it('rejects malformed JSON bodies with 400', async () => {
      const { app } = build();

      const res = await app.request('/v1/proxy/items', {
        method: 'POST',
        headers: { ...AUTH, 'Content-Type': 'application/json' },
        body: '{oops',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { message: 'Request body is not valid JSON', type: 'invalid_request_error', code: null },
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('forwards only the configured headers', async () => {
      fetchMock.mockImplementation(async () => upstreamJson({}));
      const { app } = build({ forwardHeaders: ['Accept-Language'] });

      await app.request('/v1/proxy/items', { headers: { ...AUTH, 'Accept-Language': 'de', 'X-Other': 'no' } });

      const headers = new Headers(lastFetch().init.headers);
      expect(headers.get('accept-language')).toBe('de');
      expect(headers.get('x-other')).toBeNull();
      expect(headers.get('authorization')).toBe('Bearer test-secret');
    });

    it('returns 429 with Retry-After once the window is full', async () => {
      fetchMock.mockImplementation(async () => upstreamJson({}));
      const { app } = build({ threshold: 1 });

      await app.request('/v1/proxy/a', { headers: AUTH });
      const res = await app.request('/v1/proxy/b', { headers: AUTH });

      expect(res.status).toBe(429);
      expect(res.headers.get('retry-after')).toBe('60');
      expect(await res.json()).toEqual({
        error: {
          message: 'Rate limit of 1 calls reached; window resets in 60000ms',
          type: 'rate_limit_error',
          code: 'rate_limit_exceeded',
        },
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('maps an upstream 429 to 429 with its Retry-After', async () => {
      fetchMock.mockImplementation(async () => new Response('slow down', { status: 429, headers: { 'retry-after': '30' } }));
      const { app } = build();

      const res = await app.request('/v1/proxy/a', { headers: AUTH });

      expect(res.status).toBe(429);
      expect(res.headers.get('retry-after')).toBe('30');
      expect(await res.json()).toMatchObject({ error: { code: 'upstream_rate_limited' } });
    });

    it('passes upstream error statuses through', async () => {
      fetchMock.mockImplementation(async () => new Response('not here', { status: 404 }));
      const { app } = build();

      const res = await app.request('/v1/proxy/missing', { headers: AUTH });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { message: 'example returned 404 for GET /missing', type: 'upstream_error', code: 'upstream_error' },
      });
    });

    it('returns 502 when the upstream is unreachable', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const { app } = build();

      const res = await app.request('/v1/proxy/a', { headers: AUTH });

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({ error: { code: 'upstream_unavailable' } });
    });

    it('returns 503 without calling upstream when the cache cannot be read', async () => {
      const cache: ResponseCache<CachedHttpResponse> = {
        get: () => {
          throw new Error('database is locked');
        },
        put: () => {},
      };
      const { app, manager } = build({ cache });

      const res = await app.request('/v1/proxy/a', { headers: AUTH });

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        error: { message: 'Response cache unavailable', type: 'server_error', code: 'cache_read_failed' },
      });
      expect(fetchMock).not.toHaveBeenCalled();
      expect(manager.quota.count).toBe(0);
    });
  });

  describe('quota routes', () => {
    it('reports the window state', async () => {
      fetchMock.mockImplementation(async () => upstreamJson({}));
      const { app } = build();
      await app.request('/v1/proxy/a', { headers: AUTH });

      const res = await app.request('/v1/quota', { headers: AUTH });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        quota: {
          count: 1,
          threshold: 2,
          windowMs: 60_000,
          windowStart: START,
          resetAt: START + 60_000,
          remaining: 1,
        },
        inFlight: 0,
        remainingMs: 60_000,
      });
    });

    it('resyncs on demand', async () => {
      const { app } = build({ resync: remainingRequestsResync(() => 0) });

      const res = await app.request('/v1/quota/resync', { method: 'POST', headers: AUTH });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ quota: { count: 2, remaining: 0 } });
    });
  });
});
