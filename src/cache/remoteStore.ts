import type { RawResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { type CacheStore, deserializeEntry, serializeEntry } from './store.js';

/**
 * The slice of a key-value client (Redis, Memcached, a KV service) the remote store needs.
 * An ioredis client matches once `set` is adapted to take the ttl in seconds.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null | undefined>;
  set(key: string, value: string, ttlSeconds?: number): Promise<unknown>;
  del?(key: string): Promise<unknown>;
}

/** Options for {@link RemoteStore} */
export interface RemoteStoreOptions {
  client: KeyValueClient;
  /** @default 'relaycall:' */
  prefix?: string;
  /** Time to live in milliseconds, handed to the client rounded up to whole seconds. */
  ttl?: number;
}

/**
 * Cache store over a remote key-value service. Expiry is left to the service.
 */
export class RemoteStore implements CacheStore {
  #client: KeyValueClient;
  #prefix: string;
  #ttlSeconds: number | undefined;

  constructor({ client, prefix = 'relaycall:', ttl }: RemoteStoreOptions) {
    this.#client = client;
    this.#prefix = prefix;
    this.#ttlSeconds = ttl === undefined ? undefined : Math.max(1, Math.ceil(ttl / 1000));
  }

  async get(key: string): SafeWrapAsync<Error, RawResponse | null> {
    const [errGet, text] = await safeWrapAsync(() => this.#client.get(this.#prefix + key));
    if (errGet) {
      return [new Error(`error reading remote cache key ${key}`, { cause: errGet }), null];
    }

    if (text === null || text === undefined) {
      return [null, null];
    }

    const [errEntry, entry] = deserializeEntry(text);
    if (errEntry) {
      return [new Error(`error decoding remote cache key ${key}`, { cause: errEntry }), null];
    }

    return [null, entry.value];
  }

  async put(key: string, value: RawResponse): SafeWrapAsync<Error, void> {
    const payload = serializeEntry({ key, value, storedAt: Date.now() });
    const [errSet] = await safeWrapAsync(() => this.#client.set(this.#prefix + key, payload, this.#ttlSeconds));
    if (errSet) {
      return [new Error(`error writing remote cache key ${key}`, { cause: errSet }), null];
    }

    return [null, undefined];
  }

  async delete(key: string): SafeWrapAsync<Error, void> {
    const del = this.#client.del?.bind(this.#client);
    if (!del) {
      return [new Error('error remote cache client cannot delete keys'), null];
    }

    const [errDel] = await safeWrapAsync(() => del(this.#prefix + key));
    if (errDel) {
      return [new Error(`error deleting remote cache key ${key}`, { cause: errDel }), null];
    }

    return [null, undefined];
  }
}
