/** HTTP methods a call descriptor may use. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

/** Header options accepted wherever headers are merged; a nullish value removes the header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** Request body forms the transport can send. */
export type RequestBody = string | Uint8Array;

/**
 * A response as the transport received it.
 *
 * Plain data on purpose: it is what the cache stores hold, in memory, on disk or remotely.
 * Header names are lower-cased.
 */
export interface RawResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

/** Subset of HTTP status codes used by the retry policy. */
export type StatusCode =
  | 200
  | 201
  | 202
  | 204
  | 205
  | 206
  | 301
  | 302
  | 304
  | 400
  | 401
  | 403
  | 404
  | 405
  | 408
  | 409
  | 410
  | 412
  | 413
  | 422
  | 425
  | 429
  | 500
  | 501
  | 502
  | 503
  | 504;

/** Retry policy applied around single calls and whole batch round trips. */
export interface RetryOptions {
  /**
   * The number of times to retry a failed call.
   * @default 2
   */
  limit?: number;
  /**
   * Time to wait before retrying, in milliseconds.
   * @default 1000
   */
  timeout?: number;
  /**
   * Response status codes that are retried as well as retryable transport errors.
   * @default []
   */
  statusCodes?: StatusCode[];
}

/** Per-call options shared by every entry point. */
export interface CallOptions {
  /** Abort signal to cancel the call. Cancellation surfaces as a non-retryable TransportError. */
  signal?: AbortSignal;
  /**
   * Call timeout in milliseconds; `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /** Retry behavior (object for fine-grained control or number for attempt count). */
  retry?: RetryOptions | number;
  /** Whether the cache layer is consulted for this call; defaults to the client setting. */
  cache?: boolean;
}

const decoder = new TextDecoder();

/** Decodes a response body as UTF-8 text. */
export function responseText(response: RawResponse): string {
  return decoder.decode(response.body);
}

/** Reads a response header case-insensitively. */
export function responseHeader(response: RawResponse, name: string): string | undefined {
  return response.headers[name.toLowerCase()];
}

/** Builds a {@link RawResponse} from loosely typed parts, lower-casing header names. */
export function createRawResponse(
  status: number,
  body: string | Uint8Array = '',
  headers: Record<string, string> = {},
): RawResponse {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    normalized[key.toLowerCase()] = value;
  }

  return {
    status,
    headers: normalized,
    body: typeof body === 'string' ? new TextEncoder().encode(body) : body,
  };
}
