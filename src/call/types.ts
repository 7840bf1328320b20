import type { DecodeError } from '../error/decodeError.js';
import type { HttpMethod, RawResponse, RequestBody } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Scalar value a path or query parameter can take. */
export type ParamValue = string | number | boolean;

/**
 * Declaration of one path or query parameter.
 *
 * A slot with `value` is fixed and cannot be supplied at bind time; any other
 * slot is a placeholder filled from the bind arguments or from `default`.
 */
export interface ParamSlot {
  value?: ParamValue;
  default?: ParamValue;
  /** Query slots only; path placeholders that appear in the URL template are always required. */
  required?: boolean;
}

/** Converts a raw response into the descriptor's domain type. */
export type Decoder<T> = (response: RawResponse) => SafeWrapAsync<DecodeError, T>;

/** `{name}` (encoded) or `{+name}` (reserved expansion, slashes kept) segment of a URL template. */
export interface TemplatePlaceholder {
  name: string;
  reserved: boolean;
}

/**
 * Immutable description of one API operation. Build with `defineCall`.
 *
 * @typeParam T - Decoded result type.
 */
export interface CallDescriptor<T = unknown> {
  /** Identity used in cache keys; unique per operation. */
  readonly id: string;
  readonly method: HttpMethod;
  /** Relative (`/users/{userId}`) or absolute URL with `{name}` placeholders. */
  readonly urlTemplate: string;
  readonly placeholders: readonly TemplatePlaceholder[];
  readonly pathParams: Readonly<Record<string, ParamSlot>>;
  readonly queryParams: Readonly<Record<string, ParamSlot>>;
  /** Default payload, used when none is supplied at bind time. */
  readonly body: unknown;
  readonly headers: Readonly<Record<string, string>>;
  /** API family; calls are only batched with calls of the same family. */
  readonly family: string;
  /** Raw passthrough: the decoder hands back the response verbatim. */
  readonly raw: boolean;
  readonly decode: Decoder<T>;
}

/** Values supplied when binding a descriptor. */
export interface CallArgs {
  path?: Readonly<Record<string, ParamValue | null | undefined>>;
  query?: Readonly<Record<string, ParamValue | null | undefined>>;
  body?: unknown;
  headers?: Readonly<Record<string, string>>;
}

/**
 * A descriptor with every parameter resolved, ready for the executor.
 */
export interface BoundCall<T = unknown> {
  readonly descriptor: CallDescriptor<T>;
  /** Arguments the call was bound with, kept for re-binding. */
  readonly args: Readonly<CallArgs>;
  readonly method: HttpMethod;
  /** Resolved URL: relative path plus query string, or absolute. */
  readonly url: string;
  /** Set when the URL came from a server-supplied link rather than the template. */
  readonly urlOverride: string | null;
  readonly path: Readonly<Record<string, string>>;
  readonly query: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: RequestBody | null;
}
