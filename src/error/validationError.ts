import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a decoded body that failed its @standard-schema check.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static override name = 'ValidationError';
  override name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: StandardSchemaV1.Issue[];

  /** Creates a new ValidationError carrying the schema issues in its message */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length ? `${message}; issues: ${JSON.stringify(issues)}` : message, opts);
    this.issues = [...issues];
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): ValidationError | null {
  return unwrapErrorType(ValidationError, error);
}
