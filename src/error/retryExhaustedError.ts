import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Every attempt the retry policy allowed has failed; the last failure is the `cause`.
 */
export class RetryExhaustedError extends Error {
  /** RetryExhaustedError error-name */
  static override name = 'RetryExhaustedError';
  override name = 'RetryExhaustedError';
  /** Attempts made, the first one included */
  readonly attempts: number;

  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.attempts = attempts;
  }
}

/** Type guard for {@link RetryExhaustedError}. */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return isErrorType(RetryExhaustedError, error);
}

/** Extract a {@link RetryExhaustedError} from an unknown error value, following nested causes. */
export function getRetryExhaustedError(error: unknown): RetryExhaustedError | null {
  return unwrapErrorType(RetryExhaustedError, error);
}
