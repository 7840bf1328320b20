import { callIdentity } from '../call/identity.js';
import type { BoundCall } from '../call/types.js';
import type { TransportError } from '../error/transportError.js';
import type { CallExecutor, ExecuteOptions } from '../executor/executor.js';
import { type Logger, silentLogger } from '../types/logger.js';
import type { RawResponse } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { MemoryStore } from './memoryStore.js';
import type { CacheStore } from './store.js';

/**
 * Decides whether a response may be stored. It sees the raw response, for a
 * whole batch that means the still-multiplexed multipart body.
 */
export type InvalidationPredicate = (response: RawResponse) => boolean;

/** Default predicate: only plain 200 responses are cached. */
export const isCacheable: InvalidationPredicate = (response) => response.status === 200;

/** Store, predicate and logger used by {@link cachedExecute}. */
export interface CachePolicy {
  store: CacheStore;
  /** @default isCacheable */
  predicate?: InvalidationPredicate;
  logger?: Logger;
}

/** Reads `key`, logging a failing store and reporting it as a miss. */
export async function readCache(store: CacheStore, key: string, logger: Logger = silentLogger) {
  const [errGet, cached] = await store.get(key);
  if (errGet) {
    logger.warn('cache read failed, treating as miss', { key, error: errGet.message });
    return null;
  }

  return cached;
}

/**
 * Stores `response` under `key` if the predicate allows it. A failing store is
 * logged; the caller still has the response.
 *
 * @returns Whether the response was stored.
 */
export async function writeCache(
  store: CacheStore,
  key: string,
  response: RawResponse,
  predicate: InvalidationPredicate = isCacheable,
  logger: Logger = silentLogger,
): Promise<boolean> {
  if (!predicate(response)) {
    logger.debug('cache skipped by predicate', { key, status: response.status });
    return false;
  }

  const [errPut] = await store.put(key, response);
  if (errPut) {
    logger.warn('cache write failed', { key, error: errPut.message });
    return false;
  }

  return true;
}

/**
 * Executes `bound` through a cache.
 *
 * A hit returns the stored response without touching the executor. On a miss
 * the call is executed and stored when the predicate allows; the response is
 * returned either way. Transport failures are never stored.
 */
export async function cachedExecute(
  bound: BoundCall,
  executor: CallExecutor,
  { store, predicate = isCacheable, logger = silentLogger }: CachePolicy,
  opts?: ExecuteOptions,
): SafeWrapAsync<TransportError, RawResponse> {
  const key = callIdentity(bound);
  const cached = await readCache(store, key, logger);
  if (cached) {
    logger.debug('cache hit', { id: bound.descriptor.id, key });
    return [null, cached];
  }

  logger.debug('cache miss', { id: bound.descriptor.id, key });
  const [err, response] = await executor.execute(bound, opts);
  if (err) {
    return [err, null];
  }

  await writeCache(store, key, response, predicate, logger);
  return [null, response];
}

/** Options for {@link CacheLayer} */
export interface CacheLayerOptions {
  /** Defaults to an unbounded {@link MemoryStore}. */
  store?: CacheStore;
  /** @default isCacheable */
  predicate?: InvalidationPredicate;
  logger?: Logger;
}

/**
 * Long-lived cache in front of an executor. Adds in-flight de-duplication on
 * top of {@link cachedExecute}: concurrent calls with one identity share a
 * single round trip.
 */
export class CacheLayer {
  #store: CacheStore;
  #predicate: InvalidationPredicate;
  #logger: Logger;
  #pending = new Map<string, SafeWrapAsync<TransportError, RawResponse>>();

  constructor({ store, predicate = isCacheable, logger = silentLogger }: CacheLayerOptions = {}) {
    this.#store = store ?? new MemoryStore();
    this.#predicate = predicate;
    this.#logger = logger;
  }

  get store(): CacheStore {
    return this.#store;
  }

  get predicate(): InvalidationPredicate {
    return this.#predicate;
  }

  /**
   * Swaps store, predicate or logger. Swapping the store disposes the old one.
   */
  config(opts: CacheLayerOptions) {
    if (opts.store && opts.store !== this.#store) {
      this.#store.dispose?.();
      this.#store = opts.store;
      this.#pending = new Map();
    }

    if (opts.predicate) {
      this.#predicate = opts.predicate;
    }

    if (opts.logger) {
      this.#logger = opts.logger;
    }
  }

  /** Stored response for `key`, or `null`. */
  lookup(key: string): Promise<RawResponse | null> {
    return readCache(this.#store, key, this.#logger);
  }

  /** Stores `response` under `key` when the predicate (default: the layer's) allows. */
  save(key: string, response: RawResponse, predicate = this.#predicate): Promise<boolean> {
    return writeCache(this.#store, key, response, predicate, this.#logger);
  }

  /** {@link cachedExecute} with in-flight de-duplication. */
  execute(bound: BoundCall, executor: CallExecutor, opts?: ExecuteOptions): SafeWrapAsync<TransportError, RawResponse> {
    const key = callIdentity(bound);
    const pending = this.#pending.get(key);
    if (pending) {
      return pending;
    }

    const request = cachedExecute(
      bound,
      executor,
      { store: this.#store, predicate: this.#predicate, logger: this.#logger },
      opts,
    ).finally(() => this.#pending.delete(key));

    this.#pending.set(key, request);
    return request;
  }

  /** Drops every stored entry, if the store supports it. */
  async clear(): SafeWrapAsync<Error, void> {
    if (!this.#store.clear) {
      return [new Error('error cache store does not support clear'), null];
    }

    return this.#store.clear();
  }

  dispose() {
    this.#pending = new Map();
    this.#store.dispose?.();
  }
}
