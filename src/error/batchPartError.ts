import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * One part of a batch response was missing or could not be parsed.
 * Only the call at `index` is affected.
 */
export class BatchPartError extends Error {
  /** BatchPartError error-name */
  static override name = 'BatchPartError';
  override name = 'BatchPartError';
  /** Position of the affected call in the submitted batch */
  readonly index: number;

  /** Creates a new BatchPartError for the call at `index` */
  constructor(message: string, index: number, opts?: ErrorOptions) {
    super(message, opts);
    this.index = index;
  }
}

/** Type guard for {@link BatchPartError}. */
export function isBatchPartError(error: unknown): error is BatchPartError {
  return isErrorType(BatchPartError, error);
}

/** Extract a {@link BatchPartError} from an unknown error value, following nested causes. */
export function getBatchPartError(error: unknown): BatchPartError | null {
  return unwrapErrorType(BatchPartError, error);
}
