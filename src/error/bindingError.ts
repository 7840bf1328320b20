import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * A call descriptor could not be bound: a placeholder was left unresolved, or a
 * parameter was supplied that the descriptor does not declare.
 *
 * Always a caller bug, never worth retrying.
 */
export class BindingError extends Error {
  /** BindingError error-name */
  static override name = 'BindingError';
  override name = 'BindingError';
  /** Identity of the descriptor that failed to bind */
  readonly descriptor: string;
  /** Name of the offending parameter */
  readonly parameter: string;

  /** Creates a new BindingError for `parameter` of `descriptor` */
  constructor(message: string, descriptor: string, parameter: string, opts?: ErrorOptions) {
    super(message, opts);
    this.descriptor = descriptor;
    this.parameter = parameter;
  }
}

/** Type guard for {@link BindingError}. */
export function isBindingError(error: unknown): error is BindingError {
  return isErrorType(BindingError, error);
}

/** Extract a {@link BindingError} from an unknown error value, following nested causes. */
export function getBindingError(error: unknown): BindingError | null {
  return unwrapErrorType(BindingError, error);
}
