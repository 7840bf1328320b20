import { BindingError } from '../error/bindingError.js';
import { safeWrap, type SafeWrap } from '../utils/wrap.js';
import type { BoundCall, CallArgs, CallDescriptor, ParamSlot, ParamValue } from './types.js';

type Resolved = SafeWrap<BindingError, Record<string, string>>;

function missing(descriptor: CallDescriptor, kind: string, name: string): BindingError {
  return new BindingError(`error unresolved ${kind} parameter "${name}" in ${descriptor.id}`, descriptor.id, name);
}

/**
 * Resolves each declared slot from the supplied values, falling back to the slot
 * default. Unknown names, values for fixed slots and missing required values fail.
 */
function resolveSlots(
  descriptor: CallDescriptor,
  kind: 'path' | 'query',
  slots: Readonly<Record<string, ParamSlot>>,
  supplied: Readonly<Record<string, ParamValue | null | undefined>> = {},
  isRequired: (name: string, slot: ParamSlot) => boolean,
): Resolved {
  for (const name of Object.keys(supplied)) {
    if (!(name in slots)) {
      return [
        new BindingError(`error unknown ${kind} parameter "${name}" for ${descriptor.id}`, descriptor.id, name),
        null,
      ];
    }
  }

  const resolved: Record<string, string> = {};
  for (const [name, slot] of Object.entries(slots)) {
    const given = supplied[name];
    if (slot.value !== undefined) {
      if (given !== undefined && given !== null) {
        return [
          new BindingError(`error ${kind} parameter "${name}" is fixed for ${descriptor.id}`, descriptor.id, name),
          null,
        ];
      }

      resolved[name] = String(slot.value);
      continue;
    }

    const value = given ?? slot.default;
    if (value === undefined || value === null) {
      if (isRequired(name, slot)) {
        return [missing(descriptor, kind, name), null];
      }

      continue;
    }

    resolved[name] = String(value);
  }

  return [null, resolved];
}

function expand(descriptor: CallDescriptor, path: Record<string, string>): string {
  let url = descriptor.urlTemplate;
  for (const { name, reserved } of descriptor.placeholders) {
    const value = path[name] ?? '';
    const encoded = reserved ? encodeURIComponent(value).replace(/%2F/gi, '/') : encodeURIComponent(value);
    url = url.split(`{${reserved ? '+' : ''}${name}}`).join(encoded);
  }

  return url;
}

function appendQuery(url: string, query: Record<string, string>): string {
  const search = new URLSearchParams(query).toString();
  if (!search) {
    return url;
  }

  return `${url}${url.includes('?') ? '&' : '?'}${search}`;
}

/**
 * Binds concrete values to a descriptor, producing a new {@link BoundCall}.
 * Pure: the descriptor is never touched.
 *
 * Object bodies are serialized as JSON and get a JSON content type unless one was given.
 */
export function bind<T>(descriptor: CallDescriptor<T>, args: CallArgs = {}): SafeWrap<BindingError, BoundCall<T>> {
  const templateNames = new Set(descriptor.placeholders.map(({ name }) => name));
  const pathSlots: Record<string, ParamSlot> = { ...descriptor.pathParams };
  for (const name of templateNames) {
    pathSlots[name] ??= {};
  }

  const [errPath, path] = resolveSlots(descriptor, 'path', pathSlots, args.path, (name, slot) =>
    templateNames.has(name) ? true : slot.required === true,
  );
  if (errPath) {
    return [errPath, null];
  }

  const [errQuery, query] = resolveSlots(
    descriptor,
    'query',
    descriptor.queryParams,
    args.query,
    (_name, slot) => slot.required === true,
  );
  if (errQuery) {
    return [errQuery, null];
  }

  const headers: Record<string, string> = { ...descriptor.headers };
  for (const [key, value] of Object.entries(args.headers ?? {})) {
    headers[key.toLowerCase()] = value;
  }

  const payload = args.body !== undefined ? args.body : descriptor.body;
  let body: BoundCall['body'] = null;
  if (typeof payload === 'string' || payload instanceof Uint8Array) {
    body = payload;
  } else if (payload !== undefined && payload !== null) {
    const [errJson, json] = safeWrap(() => JSON.stringify(payload));
    if (errJson) {
      return [
        new BindingError(`error serializing body for ${descriptor.id}`, descriptor.id, 'body', { cause: errJson }),
        null,
      ];
    }

    body = json;
    headers['content-type'] ??= 'application/json';
  }

  return [
    null,
    Object.freeze({
      descriptor,
      args: Object.freeze({ ...args }),
      method: descriptor.method,
      url: appendQuery(expand(descriptor, path), query),
      urlOverride: null,
      path: Object.freeze(path),
      query: Object.freeze(query),
      headers: Object.freeze(headers),
      body,
    }),
  ];
}

/**
 * Re-binds one parameter of a bound call, keeping every other argument.
 * The parameter is looked up among the query slots first, then the path slots.
 */
export function rebindParam<T>(
  bound: BoundCall<T>,
  name: string,
  value: ParamValue,
): SafeWrap<BindingError, BoundCall<T>> {
  const { descriptor, args } = bound;
  if (name in descriptor.queryParams) {
    return bind(descriptor, { ...args, query: { ...args.query, [name]: value } });
  }

  return bind(descriptor, { ...args, path: { ...args.path, [name]: value } });
}

/**
 * Replaces the resolved URL of a bound call, e.g. with a server-supplied next-page link.
 */
export function withUrl<T>(bound: BoundCall<T>, url: string): BoundCall<T> {
  return Object.freeze({ ...bound, url, urlOverride: url });
}
