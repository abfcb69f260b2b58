import type { CachedHttpResponse, HttpResponse } from '../clients/types.js';
import type { ApiManager } from '../manager/api-manager.js';

/** The manager the HTTP surface proxies through. */
export type ProxyManager = ApiManager<HttpResponse, CachedHttpResponse>;
