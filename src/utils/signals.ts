import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Timeout signal together with a disposer that releases its timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Clears the pending timer; call once the guarded work has settled. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after the
 * given number of milliseconds.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), { once: true });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - No signals: returns `null`.
 * - A single signal: returned as-is.
 * - Several: a new signal aborting when any source aborts, keeping the source's
 *   `reason` when it has one, else aborting with an {@link AbortError}.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): AbortSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0] ?? null;
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener(
    'abort',
    () => {
      for (const remove of listeners) {
        remove();
      }
    },
    { once: true },
  );

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return controller.signal;
}
