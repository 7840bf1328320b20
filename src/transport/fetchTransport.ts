import type { TransportError } from '../error/transportError.js';
import type { RawResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { transportFailure } from './failure.js';
import { headersToRecord } from './headers.js';
import type { Transport, TransportRequest } from './types.js';

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /** `fetch` implementation; defaults to the global one. */
  fetch?: typeof fetch;
  /** Fetch credentials mode. */
  credentials?: RequestCredentials;
  /** Fetch mode. */
  mode?: RequestMode;
}

/**
 * Default transport, a thin wrapper around `fetch` that:
 * - reads every response body into bytes, whatever its status,
 * - maps thrown errors and aborts to {@link TransportError}.
 */
export class FetchTransport implements Transport {
  #fetch: typeof fetch;
  #opts: FetchTransportOptions;

  /** Creates a new fetch transport */
  constructor(opts: FetchTransportOptions = {}) {
    this.#fetch = opts.fetch ?? ((input, init) => fetch(input, init));
    this.#opts = opts;
  }

  /**
   * Sends one request.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  async send(request: TransportRequest): SafeWrapAsync<TransportError, RawResponse> {
    const { method, url, headers, body, signal } = request;

    const [errFetch, res] = await safeWrapAsync(() =>
      this.#fetch(url, {
        method,
        headers,
        body: body === null ? undefined : typeof body === 'string' ? body : body.slice(),
        credentials: this.#opts.credentials,
        mode: this.#opts.mode,
        ...(signal && { signal }),
      }),
    );
    if (errFetch) {
      return [transportFailure(`error sending ${method} ${url}`, errFetch, signal), null];
    }

    const [errBody, buffer] = await safeWrapAsync(() => res.arrayBuffer());
    if (errBody) {
      return [transportFailure(`error reading ${method} ${url} response body`, errBody, signal), null];
    }

    return [
      null,
      {
        status: res.status,
        headers: headersToRecord(res.headers),
        body: new Uint8Array(buffer),
      },
    ];
  }
}
