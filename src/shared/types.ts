/**
 * Request and response shapes shared by the manager, the clients and the
 * HTTP surface.
 */

/** HTTP methods a logical request may use. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/** A value that may or may not be wrapped in a promise. */
export type MaybePromise<T> = T | Promise<T>;

/** Query parameters. Arrays repeat the key; undefined values are skipped. */
export type RequestParams = Record<
  string,
  string | number | boolean | null | undefined | ReadonlyArray<string | number | boolean>
>;

/**
 * A caller-issued operation, independent of whether it ends in a live call.
 */
export interface LogicalRequest {
  method: HttpMethod | (string & {});
  /** Path relative to the client's base URL, e.g. "/v1/users". */
  endpoint: string;
  headers?: Record<string, string>;
  params?: RequestParams;
  body?: unknown;
}

/** JSON error body returned by the HTTP surface. */
export interface ErrorBody {
  error: {
    message: string;
    type: string;
    code: string | null;
  };
}
