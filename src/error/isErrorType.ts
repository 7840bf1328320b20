import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Type guard telling whether `err`, or anything in its `cause` chain, is an instance of `errorClass`.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
