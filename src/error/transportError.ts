import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * What went wrong below HTTP:
 * - `network`: connection refused/reset, DNS, or the body could not be read
 * - `timeout`: the per-call timeout fired
 * - `aborted`: the caller (or a disposed client) cancelled the call
 * - `auth`: the credential provider failed before anything was sent
 */
export type TransportErrorKind = 'network' | 'timeout' | 'aborted' | 'auth';

/**
 * A call never produced an HTTP response.
 *
 * Non-2xx responses are *not* transport errors; they come back as a `RawResponse`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static override name = 'TransportError';
  override name = 'TransportError';
  /** Failure category */
  readonly kind: TransportErrorKind;
  /** Whether an identical call may succeed if sent again */
  readonly retryable: boolean;

  /** Creates a new TransportError of `kind`; retryable defaults to true for network and timeout failures */
  constructor(
    message: string,
    kind: TransportErrorKind,
    opts?: ErrorOptions & { retryable?: boolean },
  ) {
    super(message, opts);
    this.kind = kind;
    this.retryable = opts?.retryable ?? (kind === 'network' || kind === 'timeout');
  }
}

/** Type guard for {@link TransportError}. */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/** Extract a {@link TransportError} from an unknown error value, following nested causes. */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}
