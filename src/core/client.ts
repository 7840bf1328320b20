import { type BatchCacheMode, Batcher, type BatchOptions, type BatchResult } from '../batch/batcher.js';
import { bind } from '../call/bind.js';
import type { BoundCall, CallArgs, CallDescriptor } from '../call/types.js';
import { CacheLayer, type InvalidationPredicate } from '../cache/cacheLayer.js';
import type { CacheStore } from '../cache/store.js';
import type { ConfigurationError } from '../error/configurationError.js';
import type { TransportError } from '../error/transportError.js';
import { type AuthProvider, type CallExecutor, Executor } from '../executor/executor.js';
import { DEFAULT_RETRY, RetryingExecutor, type RetryPolicy, resolveRetry } from '../executor/retrying.js';
import { type PageOptions, paginate } from '../paginate/paginator.js';
import type { Transport } from '../transport/types.js';
import { type Logger, silentLogger } from '../types/logger.js';
import type { CallOptions, HeaderOptions, RawResponse, RetryOptions } from '../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { walk, type WalkOptions, type WalkPostOptions, type WalkResult } from '../walk/walker.js';

/** Cache settings of an {@link ApiClient}. */
export interface CacheConfig {
  /**
   * Whether calls go through the cache by default. Per-call `cache` overrides it.
   * @default true once a cache config is given
   */
  enabled?: boolean;
  /** Defaults to an unbounded in-memory store. */
  store?: CacheStore;
  /** @default isCacheable */
  predicate?: InvalidationPredicate;
  /** How batches use the cache. @default 'per-call' */
  mode?: BatchCacheMode;
  /** Predicate for whole-batch entries. @default isCacheableBatch */
  batchPredicate?: InvalidationPredicate;
}

/** Settings that can be changed at runtime through {@link ApiClient.config}. */
export interface ClientConfig {
  /** Headers for every call; a `null` value removes a header set earlier. */
  headers?: HeaderOptions;
  auth?: AuthProvider;
  /**
   * Call timeout in milliseconds; `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /** Retry behavior for calls and batch round trips; a number sets the retry limit. */
  retry?: RetryOptions | number;
  cache?: CacheConfig;
  /** Batch endpoint URL per API family. */
  batchEndpoints?: Record<string, string>;
  /** @default 1000 */
  maxBatchSize?: number;
  logger?: Logger;
}

/** Configuration for constructing an {@link ApiClient}. */
export interface ApiClientProps extends ClientConfig {
  /** Base URL relative call URLs resolve against (e.g. `https://api.example.com/v1/`). */
  baseUrl: string;
  /** Defaults to a fetch-based transport. */
  transport?: Transport;
}

/** Per-call options of {@link ApiClient.call}. */
export type ClientCallOptions = CallOptions & {
  /** Hand back the raw response instead of decoding it. */
  raw?: boolean;
};

/** Per-session options of {@link ApiClient.page}. */
export type ClientPageOptions<T> = PageOptions<T> & Pick<CallOptions, 'retry' | 'cache'>;

/**
 * Client facade wiring together the executor, retry policy, cache layer,
 * batcher, paginator and walker.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 *
 * @example
 * const client = new ApiClient({ baseUrl: 'https://api.example.com/v1/', cache: {} });
 * const [err, item] = await client.call(getItem, { path: { itemId: 7 } });
 */
export class ApiClient {
  /** Single round-trip executor. */
  #executor: Executor;
  /** Shared cache, used when enabled. */
  #cache: CacheLayer;
  /** Default for the per-call `cache` option. */
  #cacheEnabled: boolean;
  /** Batcher sending through the retrying executor. */
  #batcher: Batcher;
  /** Default retry policy. */
  #retry: RetryPolicy;
  #logger: Logger;

  constructor({
    baseUrl,
    transport,
    headers,
    auth,
    timeout = 60_000,
    retry,
    cache,
    batchEndpoints,
    maxBatchSize,
    logger = silentLogger,
  }: ApiClientProps) {
    this.#logger = logger;
    this.#retry = resolveRetry(retry, DEFAULT_RETRY);
    this.#executor = new Executor({ baseUrl, transport, headers, auth, timeout, logger });
    this.#cache = new CacheLayer({ store: cache?.store, predicate: cache?.predicate, logger });
    this.#cacheEnabled = cache ? (cache.enabled ?? true) : false;
    this.#batcher = new Batcher({
      executor: new RetryingExecutor(this.#executor, () => this.#retry, logger),
      endpoints: batchEndpoints,
      cache: this.#cacheEnabled ? this.#cache : null,
      cacheMode: cache?.mode,
      batchPredicate: cache?.batchPredicate,
      maxBatchSize,
      logger,
    });
  }

  /**
   * Updates client defaults at runtime. Headers merge into the current ones,
   * batch endpoints merge by family, and a new cache store replaces (and disposes) the old one.
   */
  config({ headers, auth, timeout, retry, cache, batchEndpoints, maxBatchSize, logger }: ClientConfig) {
    if (logger) {
      this.#logger = logger;
    }

    this.#executor.config({ headers, auth, timeout, logger });

    if (retry !== undefined) {
      this.#retry = resolveRetry(retry, this.#retry);
    }

    if (cache) {
      this.#cache.config({ store: cache.store, predicate: cache.predicate, logger });
      this.#cacheEnabled = cache.enabled ?? this.#cacheEnabled;
    } else if (logger) {
      this.#cache.config({ logger });
    }

    this.#batcher.config({
      endpoints: batchEndpoints,
      maxBatchSize,
      logger,
      cacheMode: cache?.mode,
      batchPredicate: cache?.batchPredicate,
      ...(cache && { cache: this.#cacheEnabled ? this.#cache : null }),
    });
  }

  /** Aborts in-flight calls and disposes the transport and cache store. */
  dispose() {
    this.#executor.dispose();
    this.#cache.dispose();
    this.#logger.info('client disposed');
  }

  /** Drops every cached response. */
  clearCache(): SafeWrapAsync<Error, void> {
    return this.#cache.clear();
  }

  /** Executor honoring per-call retry and cache settings. */
  #through({ retry, cache }: Pick<CallOptions, 'retry' | 'cache'> = {}): CallExecutor {
    const retrying = new RetryingExecutor(this.#executor, resolveRetry(retry, this.#retry), this.#logger);
    if (!(cache ?? this.#cacheEnabled)) {
      return retrying;
    }

    return { execute: (bound, opts) => this.#cache.execute(bound, retrying, opts) };
  }

  /**
   * Raw single-call path: one bound call in, one {@link RawResponse} out.
   * Non-2xx statuses are responses, not errors.
   */
  execute(bound: BoundCall, { retry, cache, ...opts }: CallOptions = {}): SafeWrapAsync<TransportError, RawResponse> {
    return this.#through({ retry, cache }).execute(bound, opts);
  }

  /**
   * Binds, executes and decodes one call. With `raw` (or a raw descriptor) the
   * response comes back untouched.
   */
  async call<T>(descriptor: CallDescriptor<T>, args?: CallArgs, opts?: CallOptions & { raw?: false }): SafeWrapAsync<Error, T>;
  async call<T>(descriptor: CallDescriptor<T>, args: CallArgs | undefined, opts: CallOptions & { raw: true }): SafeWrapAsync<Error, RawResponse>;
  async call<T>(
    descriptor: CallDescriptor<T>,
    args: CallArgs = {},
    { raw = false, ...opts }: ClientCallOptions = {},
  ): SafeWrapAsync<Error, T | RawResponse> {
    const [errBind, bound] = bind(descriptor, args);
    if (errBind) {
      return [errBind, null];
    }

    const [errExec, response] = await this.execute(bound, opts);
    if (errExec) {
      return [errExec, null];
    }

    if (raw) {
      return [null, response];
    }

    return descriptor.decode(response);
  }

  /**
   * Lazily pages through an endpoint, one cached execute per pulled page.
   */
  page<T>(
    descriptor: CallDescriptor<T>,
    args: CallArgs,
    options: ClientPageOptions<T>,
  ): AsyncGenerator<SafeWrap<Error, T>, void, undefined> {
    return paginate(descriptor, args, options, { executor: this.#through(options), logger: this.#logger });
  }

  /**
   * Sends calls of one API family as a single batch and decodes each item with
   * its own descriptor. Results keep the input order.
   */
  async batch<T>(calls: readonly BoundCall<T>[], opts?: BatchOptions): SafeWrapAsync<ConfigurationError, SafeWrap<Error, T>[]> {
    const [errBatch, results] = await this.#batcher.batch(calls, opts);
    if (errBatch) {
      return [errBatch, null];
    }

    return [
      null,
      await Promise.all(
        calls.map(async (call, index): Promise<SafeWrap<Error, T>> => {
          const result = results[index];
          if (!result) {
            return [new Error(`error no batch result at ${index}`), null];
          }

          const [errItem, response] = result;
          if (errItem) {
            return [errItem, null];
          }

          return call.descriptor.decode(response);
        }),
      ),
    ];
  }

  /** Sends calls as a single batch and returns each raw response. */
  batchRaw(calls: readonly BoundCall[], opts?: BatchOptions): SafeWrapAsync<ConfigurationError, BatchResult[]> {
    return this.#batcher.batch(calls, opts);
  }

  /** Walks `options.values` through batched calls of `descriptor`. */
  walk<T, R>(descriptor: CallDescriptor<T>, options: WalkPostOptions<T, R>): SafeWrapAsync<ConfigurationError, WalkResult<R>[]>;
  walk<T>(descriptor: CallDescriptor<T>, options: WalkOptions): SafeWrapAsync<ConfigurationError, WalkResult<T>[]>;
  walk<T, R>(
    descriptor: CallDescriptor<T>,
    options: WalkOptions | WalkPostOptions<T, R>,
  ): SafeWrapAsync<ConfigurationError, WalkResult<T | R>[]> {
    const logger = options.logger ?? this.#logger;
    if ('post' in options) {
      return walk(descriptor, { ...options, logger }, this.#batcher);
    }

    return walk(descriptor, { ...options, logger }, this.#batcher);
  }
}
