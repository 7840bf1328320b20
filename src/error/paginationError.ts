import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * A paging session stopped on an error. The pages decoded before the failure
 * are kept so callers know exactly how far it got.
 */
export class PaginationError<T = unknown> extends Error {
  /** PaginationError error-name */
  static override name = 'PaginationError';
  override name = 'PaginationError';
  /** Pages decoded before the failure, in order */
  readonly pages: T[];

  constructor(message: string, pages: T[], opts?: ErrorOptions) {
    super(message, opts);
    this.pages = pages;
  }
}

/** Type guard for {@link PaginationError}. */
export function isPaginationError(error: unknown): error is PaginationError {
  return isErrorType(PaginationError, error);
}

/** Extract a {@link PaginationError} from an unknown error value, following nested causes. */
export function getPaginationError(error: unknown): PaginationError | null {
  return unwrapErrorType(PaginationError, error);
}
