import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Invalid setup detected before any request is sent, such as a batch mixing API
 * families or a family without a batch endpoint.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  static override name = 'ConfigurationError';
  override name = 'ConfigurationError';
}

/** Type guard for {@link ConfigurationError}. */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}

/** Extract a {@link ConfigurationError} from an unknown error value, following nested causes. */
export function getConfigurationError(error: unknown): ConfigurationError | null {
  return unwrapErrorType(ConfigurationError, error);
}
