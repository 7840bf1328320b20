import type { RawResponse } from '../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { safeWrap } from '../utils/wrap.js';

/** A cached response with its bookkeeping. Entries are replaced, never mutated. */
export interface CacheEntry {
  key: string;
  value: RawResponse;
  /** Epoch milliseconds. */
  storedAt: number;
}

/**
 * Cache store capability. Implementations must tolerate concurrent `get`/`put`;
 * concurrent `put` on one key is last-writer-wins.
 *
 * `get` resolves `[null, null]` on a miss.
 */
export interface CacheStore {
  get(key: string): SafeWrapAsync<Error, RawResponse | null>;
  put(key: string, value: RawResponse): SafeWrapAsync<Error, void>;
  delete?(key: string): SafeWrapAsync<Error, void>;
  clear?(): SafeWrapAsync<Error, void>;
  dispose?(): void;
}

interface SerializedEntry {
  key: string;
  storedAt: number;
  status: number;
  headers: Record<string, string>;
  /** base64 */
  body: string;
}

function isSerializedEntry(value: unknown): value is SerializedEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'string' &&
    'storedAt' in value &&
    typeof value.storedAt === 'number' &&
    'status' in value &&
    typeof value.status === 'number' &&
    'body' in value &&
    typeof value.body === 'string' &&
    'headers' in value &&
    typeof value.headers === 'object' &&
    value.headers !== null &&
    Object.values(value.headers).every((header) => typeof header === 'string')
  );
}

/** Serializes an entry to JSON for stores that hold text (files, remote key-value stores). */
export function serializeEntry({ key, storedAt, value }: CacheEntry): string {
  const serialized: SerializedEntry = {
    key,
    storedAt,
    status: value.status,
    headers: value.headers,
    body: Buffer.from(value.body).toString('base64'),
  };

  return JSON.stringify(serialized);
}

/** Parses the output of {@link serializeEntry}. */
export function deserializeEntry(text: string): SafeWrap<Error, CacheEntry> {
  const [errJson, parsed] = safeWrap<unknown>(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing cache entry', { cause: errJson }), null];
  }

  if (!isSerializedEntry(parsed)) {
    return [new Error('error cache entry has an unexpected shape'), null];
  }

  return [
    null,
    {
      key: parsed.key,
      storedAt: parsed.storedAt,
      value: {
        status: parsed.status,
        headers: parsed.headers,
        body: new Uint8Array(Buffer.from(parsed.body, 'base64')),
      },
    },
  ];
}

/** Whether an entry stored at `storedAt` has outlived `ttl` (no ttl never expires). */
export function isExpired(storedAt: number, ttl: number | undefined, now = Date.now()): boolean {
  return ttl !== undefined && now - storedAt >= ttl;
}
