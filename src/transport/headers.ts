import type { HeaderOptions } from '../types/request.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [String(key), value]);
  }

  return Object.entries(headers);
}

/**
 * Merges header containers left to right into one `Headers`; a nullish value removes the header.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const layer of layers) {
    for (const [key, value] of toEntries(layer)) {
      if (value === null || value === undefined) {
        merged.delete(key);
        continue;
      }

      const clean = sanitize(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}

/** Converts `Headers` into a plain record with lower-cased names. */
export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });

  return record;
}
