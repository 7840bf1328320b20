import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** A derived signal plus the function that detaches its timers and listeners. */
export interface ScopedSignal {
  signal: AbortSignal;
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * When `timeoutMs` is `false`, `0` or omitted, no signal is created. Call
 * `release` once the guarded work settles so the timer does not linger.
 */
export function createTimeoutSignal(timeoutMs?: number | false): ScopedSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(timeoutMs)),
    timeoutMs,
  );

  return { signal: controller.signal, release: () => clearTimeout(timeout) };
}

/**
 * Merges several signals into one that aborts as soon as any source aborts,
 * carrying that source's `reason` (or an {@link AbortError} when it has none).
 *
 * Nullish entries are skipped. Returns `null` when nothing remains. `release`
 * removes the listeners placed on long-lived sources.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): ScopedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);
  if (active.length === 0) {
    return null;
  }

  const controller = new AbortController();
  const detach: Array<() => void> = [];
  const release = () => {
    for (const remove of detach.splice(0)) {
      remove();
    }
  };

  const abortFrom = (source: AbortSignal) => {
    release();
    controller.abort(source.reason ?? new AbortError('error signal aborted without a reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    detach.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
