import { AbortError } from '../error/abortError.js';
import { TransportError } from '../error/transportError.js';
import type { BoundCall } from '../call/types.js';
import { FetchTransport } from '../transport/fetchTransport.js';
import { transportFailure } from '../transport/failure.js';
import { mergeHeaderOptions } from '../transport/headers.js';
import type { Transport } from '../transport/types.js';
import { type Logger, silentLogger } from '../types/logger.js';
import type { CallOptions, HeaderOptions, HttpMethod, RawResponse } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/**
 * Auth collaborator: supplies a bearer credential for a call, or `null` for none.
 * Token acquisition and refresh live behind it.
 */
export type AuthProvider = (request: { method: HttpMethod; url: string }) => SafeWrapAsync<Error, string | null>;

/** Options for {@link Executor}. */
export interface ExecutorOptions {
  /** Base URL that relative call URLs resolve against (e.g. `https://api.example.com/v1/`). */
  baseUrl: string;
  /** Defaults to {@link FetchTransport}. */
  transport?: Transport;
  /** Headers applied to every call, beneath the call's own. */
  headers?: HeaderOptions;
  auth?: AuthProvider;
  /**
   * Call timeout in milliseconds; `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  logger?: Logger;
}

/** Per-call options of {@link Executor.execute}. */
export type ExecuteOptions = Pick<CallOptions, 'signal' | 'timeout'>;

/** Anything that turns a bound call into one response: the executor itself, or a layer over it. */
export interface CallExecutor {
  execute(bound: BoundCall, opts?: ExecuteOptions): SafeWrapAsync<TransportError, RawResponse>;
}

/**
 * Issues one HTTP round trip for a bound call.
 *
 * Never retries and never interprets status codes: a 404 or 500 is returned as a
 * {@link RawResponse} for decoders and cache predicates to judge.
 */
export class Executor implements CallExecutor {
  #transport: Transport;
  #baseUrl: string;
  #headers: Headers;
  #auth: AuthProvider | undefined;
  #timeout: number | false;
  #logger: Logger;
  /** Aborted on dispose, cancelling in-flight calls */
  #abortController = new AbortController();

  constructor({ baseUrl, transport, headers, auth, timeout = 60_000, logger = silentLogger }: ExecutorOptions) {
    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.#transport = transport ?? new FetchTransport();
    this.#headers = mergeHeaderOptions({ accept: 'application/json' }, headers);
    this.#auth = auth;
    this.#timeout = timeout;
    this.#logger = logger;
  }

  /**
   * Updates defaults at runtime. Headers merge into the current ones; a `null` value removes one.
   */
  config(opts: Partial<Omit<ExecutorOptions, 'transport' | 'baseUrl'>>) {
    if (opts.headers) {
      this.#headers = mergeHeaderOptions(this.#headers, opts.headers);
    }

    if (opts.auth !== undefined) {
      this.#auth = opts.auth;
    }

    if (opts.timeout !== undefined) {
      this.#timeout = opts.timeout;
    }

    if (opts.logger) {
      this.#logger = opts.logger;
    }
  }

  /** Aborts every in-flight call and releases the transport. */
  dispose() {
    this.#abortController.abort(new AbortError('error executor was disposed'));
    this.#transport.dispose?.();
  }

  /** Absolute URL a bound call will be sent to. */
  resolveUrl(bound: Pick<BoundCall, 'url'>): string {
    if (/^https?:\/\//i.test(bound.url)) {
      return bound.url;
    }

    return `${this.#baseUrl}${bound.url.replace(/^\//, '')}`;
  }

  /**
   * Performs exactly one transport round trip for `bound`.
   *
   * @returns `[TransportError, null]` when no response was obtained, otherwise `[null, response]`.
   */
  async execute(bound: BoundCall, opts: ExecuteOptions = {}): SafeWrapAsync<TransportError, RawResponse> {
    const url = this.resolveUrl(bound);
    const timeout = createTimeoutSignal(opts.timeout ?? this.#timeout);
    const merged = mergeSignals([opts.signal, timeout?.signal, this.#abortController.signal]);
    const signal = merged?.signal;

    try {
      if (signal?.aborted) {
        return [transportFailure(`error ${bound.method} ${url} not sent`, signal.reason, signal), null];
      }

      let authorization: string | null = null;
      if (this.#auth) {
        const [errAuth, credential] = await this.#credential(this.#auth, bound.method, url);
        if (errAuth) {
          return [errAuth, null];
        }

        authorization = credential ? `Bearer ${credential}` : null;
      }

      const headers = mergeHeaderOptions(this.#headers, bound.headers, authorization ? { authorization } : undefined);
      const started = Date.now();
      const [errSend, sent] = await safeWrapAsync(() =>
        this.#transport.send({ method: bound.method, url, headers, body: bound.body, ...(signal && { signal }) }),
      );
      if (errSend) {
        return [transportFailure(`error sending ${bound.method} ${url}`, errSend, signal), null];
      }

      const [err, response] = sent;
      if (err) {
        this.#logger.debug('call failed', { id: bound.descriptor.id, url, kind: err.kind, retryable: err.retryable });
        return [err, null];
      }

      this.#logger.debug('call completed', {
        id: bound.descriptor.id,
        url,
        status: response.status,
        ms: Date.now() - started,
      });

      return [null, response];
    } finally {
      timeout?.release();
      merged?.release();
    }
  }

  /** Asks the auth collaborator for a credential; its failure is a non-retryable transport error. */
  async #credential(auth: AuthProvider, method: HttpMethod, url: string): SafeWrapAsync<TransportError, string | null> {
    const failed = (cause: Error): [TransportError, null] => [
      new TransportError(`error obtaining credentials for ${method} ${url}`, 'auth', { cause, retryable: false }),
      null,
    ];

    const [errWrapped, wrapped] = await safeWrapAsync(() => auth({ method, url }));
    if (errWrapped) {
      return failed(errWrapped);
    }

    const [errAuth, credential] = wrapped;
    if (errAuth) {
      return failed(errAuth);
    }

    return [null, credential];
  }
}
