import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** An abort signal plus the cleanup that detaches its timers and listeners. */
export interface ScopedSignal {
  signal: AbortSignal | null;
  release: () => void;
}

const noop = () => {};

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * When `timeoutMs` is `false` or `0`, no signal is created.
 * `release` clears the pending timer so a settled call leaves nothing scheduled.
 */
export function createTimeoutSignal(timeoutMs?: number | false): ScopedSignal {
  if (!timeoutMs) {
    return { signal: null, release: noop };
  }

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return { signal: controller.signal, release: () => clearTimeout(timeout) };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, the signal is `null`.
 * - If a single signal is provided, it is returned as-is.
 * - Otherwise a new signal aborts when any source aborts, with the source's reason.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): ScopedSignal {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return { signal: null, release: noop };
  }

  if (active.length === 1) {
    return { signal: active[0], release: noop };
  }

  const controller = new AbortController();
  const listeners: VoidFunction[] = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  for (const signal of active) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      release();
      break;
    }

    const abort = () => {
      controller.abort(signal.reason);
      release();
    };
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}

/**
 * Normalizes the reason of an aborted signal: timeouts stay {@link TimeoutError}s,
 * anything else becomes an {@link AbortError} with the original reason as cause.
 */
export function abortReason(signal: AbortSignal): AbortError | TimeoutError {
  const { reason } = signal;
  if (reason instanceof TimeoutError || reason instanceof AbortError) {
    return reason;
  }

  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return new TimeoutError('error request timed out', { cause: reason });
  }

  return new AbortError('error request was canceled', { cause: reason });
}
