import type { RawResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * A response arrived but the descriptor's decoder rejected it: unexpected status,
 * malformed body, or a payload failing schema validation.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  static override name = 'DecodeError';
  override name = 'DecodeError';
  /** The response that failed to decode */
  readonly response: RawResponse | null;

  /** Creates a new DecodeError wrapping the response it was produced for */
  constructor(message: string, response: RawResponse | null, opts?: ErrorOptions) {
    super(message, opts);
    this.response = response;
  }
}

/** Type guard for {@link DecodeError}. */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/** Extract a {@link DecodeError} from an unknown error value, following nested causes. */
export function getDecodeError(error: unknown): DecodeError | null {
  return unwrapErrorType(DecodeError, error);
}
