import { isTimeoutError } from '../error/timeoutError.js';
import { TransportError } from '../error/transportError.js';

/**
 * Classifies a failed round trip. The signal's reason wins over the thrown error,
 * since fetch implementations differ in what they reject with on abort.
 */
export function transportFailure(message: string, cause: unknown, signal?: AbortSignal | null): TransportError {
  if (signal?.aborted) {
    if (isTimeoutError(signal.reason)) {
      return new TransportError(`${message}: timed out`, 'timeout', { cause: signal.reason });
    }

    return new TransportError(`${message}: aborted`, 'aborted', { cause: signal.reason ?? cause });
  }

  return new TransportError(message, 'network', { cause });
}
