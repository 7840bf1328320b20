import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * The retry policy judged a failure not worth retrying and stopped early; the failure is the `cause`.
 */
export class RetrySuppressedError extends Error {
  /** RetrySuppressedError error-name */
  static override name = 'RetrySuppressedError';
  override name = 'RetrySuppressedError';
  /** Attempts made before retrying was suppressed */
  readonly attempts: number;

  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.attempts = attempts;
  }
}

/** Type guard for {@link RetrySuppressedError}. */
export function isRetrySuppressedError(error: unknown): error is RetrySuppressedError {
  return isErrorType(RetrySuppressedError, error);
}

/** Extract a {@link RetrySuppressedError} from an unknown error value, following nested causes. */
export function getRetrySuppressedError(error: unknown): RetrySuppressedError | null {
  return unwrapErrorType(RetrySuppressedError, error);
}
