/**
 * Error entrypoint: the error taxonomy plus helpers for identifying and unwrapping
 * errors from `cause` chains.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { BatchPartError, getBatchPartError, isBatchPartError } from './batchPartError.js';
export { BindingError, getBindingError, isBindingError } from './bindingError.js';
export { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { isErrorType } from './isErrorType.js';
export { getPaginationError, isPaginationError, PaginationError } from './paginationError.js';
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
export {
  getTransportError,
  isTransportError,
  TransportError,
  type TransportErrorKind,
} from './transportError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
