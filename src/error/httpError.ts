import type { RawResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response with a non-2xx status code.
 *
 * The executor never produces this; the stock decoders do, so status handling
 * stays a decoding concern.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static override name = 'HTTPError';
  override name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: RawResponse;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: RawResponse, message: string = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /** Response causing the HTTPError */
  get response(): RawResponse {
    return this.#response;
  }

  /** Status code of the response */
  get status(): number {
    return this.#response.status;
  }
}

/** Type guard for {@link HTTPError}. */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/** Extracts an {@link HTTPError} from an unknown error value, following nested causes. */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}
