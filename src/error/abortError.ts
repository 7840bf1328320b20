import { isErrorType } from './isErrorType.js';

/**
 * Abort reason used when a merged signal fires without a reason of its own,
 * and when a client is disposed while calls are in flight.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static override name = 'AbortError';
  override name = 'AbortError';
}

/** Type guard for {@link AbortError}. */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
