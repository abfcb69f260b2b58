/**
 * Caching proxy route.
 * Every method and path under the mount point is turned into a logical
 * request for the upstream and sent through the ApiManager, so repeated
 * requests are answered from the cache and live calls respect the quota.
 */

import { Hono, type Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { LogicalRequest, RequestParams } from '../../shared/types.js';
import type { ProxyManager } from '../types.js';

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

export interface ProxyRouteOptions {
  /** Path the routes are mounted at; stripped to get the upstream endpoint. */
  basePath: string;
  /** Request headers passed to the upstream (and into the fingerprint). */
  forwardHeaders?: readonly string[];
}

/**
 * Create proxy routes.
 * Responses carry `X-Cache: HIT|MISS` and `X-Quota-Remaining`.
 */
export function createProxyRoutes(manager: ProxyManager, options: ProxyRouteOptions) {
  const app = new Hono();
  const forwardHeaders = (options.forwardHeaders ?? []).map((name) => name.toLowerCase());

  app.all('/*', async (c) => {
    const url = new URL(c.req.url);
    const method = c.req.method.toUpperCase();

    const body = BODYLESS_METHODS.has(method) ? undefined : await readBody(c);
    const req: LogicalRequest = {
      method,
      endpoint: toEndpoint(url.pathname, options.basePath),
      params: readParams(url),
      // A body keeps the content type it arrived with
      headers: readForwardedHeaders(c, body === undefined ? forwardHeaders : [...forwardHeaders, 'content-type']),
      body,
    };

    const outcome = await manager.requestDetailed(req);

    let status: number;
    let responseBody: unknown;
    let contentType: string | null;
    if (outcome.source === 'cache') {
      ({ status, body: responseBody, contentType } = outcome.value);
    } else {
      status = outcome.value.status;
      responseBody = outcome.value.body;
      contentType = outcome.value.headers.get('content-type');
    }

    const headers = new Headers({
      'X-Cache': outcome.source === 'cache' ? 'HIT' : 'MISS',
      'X-Quota-Remaining': String(Math.max(0, manager.quota.remainingRequests() - manager.inFlight)),
    });

    if (NULL_BODY_STATUSES.has(status) || method === 'HEAD') {
      return new Response(null, { status, headers });
    }

    if (typeof responseBody === 'string') {
      headers.set('Content-Type', contentType ?? 'text/plain; charset=UTF-8');
      return new Response(responseBody, { status, headers });
    }

    headers.set('Content-Type', 'application/json');
    return new Response(JSON.stringify(responseBody), { status, headers });
  });

  return app;
}

function toEndpoint(pathname: string, basePath: string): string {
  const rest = pathname.startsWith(basePath) ? pathname.slice(basePath.length) : pathname;
  return rest.startsWith('/') ? rest : `/${rest}`;
}

function readParams(url: URL): RequestParams | undefined {
  const params: Record<string, string | string[]> = {};
  for (const key of new Set(url.searchParams.keys())) {
    const values = url.searchParams.getAll(key);
    params[key] = values.length === 1 ? (values[0] ?? '') : values;
  }
  return Object.keys(params).length > 0 ? params : undefined;
}

function readForwardedHeaders(c: Context, names: readonly string[]): Record<string, string> | undefined {
  const headers: Record<string, string> = {};
  for (const name of names) {
    const value = c.req.header(name);
    if (value !== undefined) headers[name] = value;
  }
  return Object.keys(headers).length > 0 ? headers : undefined;
}

async function readBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text === '') return undefined;

  const contentType = c.req.header('content-type') ?? '';
  if (!contentType.includes('json')) return text;

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new HTTPException(400, { message: 'Request body is not valid JSON' });
  }
}
