import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Options for {@link retry}. */
export interface RetryLoopOptions<R> {
  /** Function to execute; must return a tuple-style result. */
  fn: (attempt: number) => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts?: number;
  /** Milliseconds to wait between attempts. */
  timeout?: number;
  /**
   * Decides whether to stop retrying on an error.
   * Return true to stop and surface the error, false to try again.
   */
  errFn?: (err: Error) => boolean;
  /**
   * Decides whether a *successful* result should still be retried (e.g. a 503 response).
   * Return true to try again; when attempts run out the last result is returned as-is.
   */
  retryResult?: (data: R) => boolean;
  /** Stops waiting and returns the last outcome once aborted. */
  signal?: AbortSignal | null;
}

/**
 * Retries a tuple-returning function for a number of attempts with a wait between each.
 *
 * The callee catches its own errors and reports them as `[error, null]`; the
 * final error is wrapped in {@link RetrySuppressedError} or {@link RetryExhaustedError}.
 */
export async function retry<R = unknown>({
  fn,
  attempts = 2,
  timeout = 1000,
  errFn,
  retryResult,
  signal,
}: RetryLoopOptions<R>): SafeWrapAsync<Error, R> {
  for (let attempt = 1; ; attempt += 1) {
    const result = await fn(attempt);
    const [err, data] = result;
    const exhausted = attempt > attempts || signal?.aborted === true;

    if (!err) {
      if (exhausted || !retryResult?.(data)) {
        return result;
      }
    } else {
      if (errFn?.(err)) {
        return [new RetrySuppressedError('error further retries suppressed', attempt, { cause: err }), null];
      }

      if (exhausted) {
        return [new RetryExhaustedError('error retries exhausted', attempt, { cause: err }), null];
      }
    }

    await sleep(timeout, signal);
  }
}
