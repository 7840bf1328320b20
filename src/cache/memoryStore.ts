import type { RawResponse } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type CacheEntry, type CacheStore, isExpired } from './store.js';

/** Options for {@link MemoryStore} */
export interface MemoryStoreOptions {
  /**
   * Entry time to live in milliseconds; entries never expire when omitted.
   */
  ttl?: number;
  /**
   * Sweep interval for expired entries, only used together with `ttl`.
   * @default 30_000
   */
  cleanupInterval?: number;
}

/**
 * In-process cache store backed by a `Map`.
 */
export class MemoryStore implements CacheStore {
  #ttl: number | undefined;
  #cleanupInterval: number;
  #intervalId: ReturnType<typeof setInterval> | undefined;
  #entries = new Map<string, CacheEntry>();

  constructor(opts: MemoryStoreOptions = {}) {
    this.#ttl = opts.ttl;
    this.#cleanupInterval = opts.cleanupInterval ?? 30_000;

    this.#cleanup();
  }

  /** Number of entries currently held, expired ones included until swept. */
  get size(): number {
    return this.#entries.size;
  }

  /**
   * Updates ttl and sweep interval; a changed ttl drops every entry.
   */
  config(opts: MemoryStoreOptions) {
    if (opts.ttl !== this.#ttl && 'ttl' in opts) {
      this.#ttl = opts.ttl;
      this.#entries = new Map();
    }

    if (opts.cleanupInterval !== undefined) {
      this.#cleanupInterval = opts.cleanupInterval;
    }

    this.#cleanup();
  }

  async get(key: string): SafeWrapAsync<Error, RawResponse | null> {
    const entry = this.#entries.get(key);
    if (!entry) {
      return [null, null];
    }

    if (isExpired(entry.storedAt, this.#ttl)) {
      this.#entries.delete(key);
      return [null, null];
    }

    return [null, copyResponse(entry.value)];
  }

  async put(key: string, value: RawResponse): SafeWrapAsync<Error, void> {
    this.#entries.set(key, { key, value: copyResponse(value), storedAt: Date.now() });
    return [null, undefined];
  }

  async delete(key: string): SafeWrapAsync<Error, void> {
    this.#entries.delete(key);
    return [null, undefined];
  }

  async clear(): SafeWrapAsync<Error, void> {
    this.#entries = new Map();
    return [null, undefined];
  }

  /**
   * Clears the sweep timer and every entry.
   */
  dispose() {
    clearInterval(this.#intervalId);
    this.#intervalId = undefined;
    this.#entries = new Map();
  }

  /** (Re)starts the sweep of expired entries; no timer runs without a ttl. */
  #cleanup() {
    clearInterval(this.#intervalId);
    this.#intervalId = undefined;
    if (this.#ttl === undefined) {
      return;
    }

    this.#intervalId = setInterval(() => {
      const now = Date.now();
      for (const [key, entry] of this.#entries) {
        if (isExpired(entry.storedAt, this.#ttl, now)) {
          this.#entries.delete(key);
        }
      }
    }, this.#cleanupInterval);
  }
}

/** Entries never share objects with callers. */
function copyResponse({ status, headers, body }: RawResponse): RawResponse {
  return { status, headers: { ...headers }, body: body.slice() };
}
