/**
 * Error-first result tuple used across the library: `[error, data]`.
 * Exactly one side is non-null.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a promise factory and captures a rejection (or a synchronous throw) as the error side.
 * @example
 * const [error, text] = await safeWrapAsync(() => readFile(path, 'utf8'));
 */
export async function safeWrapAsync<DataType>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    return [null, await promise()];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Synchronous variant of {@link safeWrapAsync}.
 */
export function safeWrap<DataType>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    return [null, fn()];
  } catch (error) {
    return [toError(error), null];
  }
}

/** Normalizes a thrown value into an `Error`, keeping the original as `cause`. */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(typeof value === 'string' ? value : 'non-error value thrown', { cause: value });
}
