import type { TransportError } from '../error/transportError.js';
import type { HttpMethod, RawResponse, RequestBody } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** A fully prepared request, as handed to a {@link Transport}. */
export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL. */
  url: string;
  headers: Headers;
  body: RequestBody | null;
  /** Combined caller, timeout and dispose signal. */
  signal?: AbortSignal;
}

/**
 * Transport collaborator: performs exactly one round trip.
 *
 * Any HTTP status comes back as a {@link RawResponse}; only failures below HTTP
 * are a {@link TransportError}.
 */
export interface Transport {
  send(request: TransportRequest): SafeWrapAsync<TransportError, RawResponse>;
  dispose?(): void;
}
