import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Abort reason set on the signal of a call that exceeded its timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static override name = 'TimeoutError';
  override name = 'TimeoutError';
  /** The limit that fired, in milliseconds */
  readonly timeoutMs: number;

  constructor(timeoutMs: number, opts?: ErrorOptions) {
    super(`error call timed out after ${timeoutMs}ms`, opts);
    this.timeoutMs = timeoutMs;
  }
}

/** Type guard for {@link TimeoutError}. */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/** Extract a {@link TimeoutError} from an unknown error value, following nested causes. */
export function getTimeoutError(error: unknown): TimeoutError | null {
  return unwrapErrorType(TimeoutError, error);
}
