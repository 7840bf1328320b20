import { jsonDecoder, rawDecoder } from '../decode/decoders.js';
import type { HttpMethod, RawResponse } from '../types/request.js';
import type { CallDescriptor, Decoder, ParamSlot, ParamValue, TemplatePlaceholder } from './types.js';

/** Input accepted by {@link defineCall}. */
export interface CallDefinition<T> {
  /** Identity used for cache keys. Defaults to `"<METHOD> <url>"`. */
  id?: string;
  /** @default 'GET' */
  method?: HttpMethod;
  /** URL template, e.g. `/users/{userId}/items` or `https://api.example.com/v1/{+name}`. */
  url: string;
  /** Path slots; a bare value declares a fixed slot. Template placeholders need no declaration. */
  path?: Record<string, ParamSlot | ParamValue>;
  /** Query slots; a bare value declares a fixed slot. */
  query?: Record<string, ParamSlot | ParamValue>;
  body?: unknown;
  headers?: Record<string, string>;
  /** @default 'default' */
  family?: string;
  /** Defaults to {@link jsonDecoder}. */
  decode?: Decoder<T>;
}

const PLACEHOLDER = /\{(\+?)([A-Za-z0-9_.-]+)\}/g;

/** Lists the `{name}` / `{+name}` placeholders of a URL template, first occurrence only. */
export function parseTemplate(template: string): TemplatePlaceholder[] {
  const found = new Map<string, TemplatePlaceholder>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    const [, plus, name] = match;
    if (name && !found.has(name)) {
      found.set(name, { name, reserved: plus === '+' });
    }
  }

  return [...found.values()];
}

function toSlots(input: Record<string, ParamSlot | ParamValue> = {}): Record<string, ParamSlot> {
  const slots: Record<string, ParamSlot> = {};
  for (const [name, slot] of Object.entries(input)) {
    slots[name] = Object.freeze(typeof slot === 'object' ? { ...slot } : { value: slot });
  }

  return Object.freeze(slots);
}

function lowerKeys(headers: Record<string, string> = {}): Record<string, string> {
  return Object.freeze(Object.fromEntries(Object.entries(headers).map(([k, v]) => [k.toLowerCase(), v])));
}

/**
 * Builds an immutable {@link CallDescriptor}.
 *
 * @example
 * const listItems = defineCall({
 *   id: 'items.list',
 *   url: '/items',
 *   query: { 'start-index': { default: 1 }, 'max-results': 10 },
 *   decode: schemaDecoder(ItemPage),
 * });
 */
export function defineCall<T = unknown>(definition: CallDefinition<T>): CallDescriptor<T> {
  const method = definition.method ?? 'GET';

  return Object.freeze({
    id: definition.id ?? `${method} ${definition.url}`,
    method,
    urlTemplate: definition.url,
    placeholders: Object.freeze(parseTemplate(definition.url)),
    pathParams: toSlots(definition.path),
    queryParams: toSlots(definition.query),
    body: definition.body,
    headers: lowerKeys(definition.headers),
    family: definition.family ?? 'default',
    raw: false,
    decode: definition.decode ?? jsonDecoder<T>(),
  });
}

/**
 * Derives the raw-passthrough variant of a descriptor: same identity and
 * parameters, but results are the untouched {@link RawResponse}.
 */
export function rawCall<T>(descriptor: CallDescriptor<T>): CallDescriptor<RawResponse> {
  return Object.freeze({ ...descriptor, raw: true, decode: rawDecoder });
}
