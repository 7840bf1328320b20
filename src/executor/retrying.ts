import type { BoundCall } from '../call/types.js';
import { getRetryExhaustedError } from '../error/retryExhaustedError.js';
import { getTransportError, isTransportError, TransportError } from '../error/transportError.js';
import { type Logger, silentLogger } from '../types/logger.js';
import type { RawResponse, RetryOptions } from '../types/request.js';
import { retry } from '../utils/retry.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { CallExecutor, ExecuteOptions, Executor } from './executor.js';

/** Retry options with every default filled in. */
export type RetryPolicy = Required<RetryOptions>;

/** Library default: two retries, one second apart, no retried status codes. */
export const DEFAULT_RETRY: RetryPolicy = { limit: 2, timeout: 1000, statusCodes: [] };

/**
 * Fills in a retry option; a bare number sets the retry limit.
 */
export function resolveRetry(opts: RetryOptions | number | undefined, base: RetryPolicy = DEFAULT_RETRY): RetryPolicy {
  if (typeof opts === 'number') {
    return { ...base, limit: opts };
  }

  return {
    limit: opts?.limit ?? base.limit,
    timeout: opts?.timeout ?? base.timeout,
    statusCodes: opts?.statusCodes ?? base.statusCodes,
  };
}

/**
 * Executor decorator that retries retryable transport errors and, optionally,
 * responses with listed status codes. The executor itself never retries.
 *
 * When a retried status persists, the last response is returned. When retries
 * run out on transport errors, the result is a TransportError whose cause chain
 * holds the RetryExhaustedError and the last failure.
 */
export class RetryingExecutor implements CallExecutor {
  #inner: Executor;
  #policy: () => RetryPolicy;
  #logger: Logger;

  constructor(inner: Executor, policy: RetryPolicy | (() => RetryPolicy), logger: Logger = silentLogger) {
    this.#inner = inner;
    this.#policy = typeof policy === 'function' ? policy : () => policy;
    this.#logger = logger;
  }

  resolveUrl(bound: Pick<BoundCall, 'url'>): string {
    return this.#inner.resolveUrl(bound);
  }

  async execute(bound: BoundCall, opts: ExecuteOptions = {}): SafeWrapAsync<TransportError, RawResponse> {
    const { limit, timeout, statusCodes } = this.#policy();
    if (limit <= 0) {
      return this.#inner.execute(bound, opts);
    }

    const [err, response] = await retry<RawResponse>({
      fn: async (attempt) => {
        if (attempt > 1) {
          this.#logger.info('retrying call', { id: bound.descriptor.id, attempt });
        }

        return this.#inner.execute(bound, opts);
      },
      attempts: limit,
      timeout,
      errFn: (error) => !(isTransportError(error) && error.retryable),
      retryResult: (result) => statusCodes.some((code) => code === result.status),
      signal: opts.signal ?? null,
    });

    if (!err) {
      return [null, response];
    }

    const last = getTransportError(err);
    const exhausted = getRetryExhaustedError(err);
    if (last && exhausted) {
      return [
        new TransportError(`error retries exhausted after ${exhausted.attempts} attempts`, last.kind, {
          cause: exhausted,
          retryable: last.retryable,
        }),
        null,
      ];
    }

    return [last ?? new TransportError('error executing call', 'network', { cause: err }), null];
  }
}
