import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Signal aborting after a timeout, with a handle to stop the timer early. */
export interface TimeoutSignal {
  /** Signal that aborts with a {@link TimeoutError} once the timeout elapses. */
  signal: AbortSignal;
  /** Stops the timer; the signal then never aborts. */
  clear: VoidFunction;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} once `timeoutMs` elapses.
 * Returns `null` when the timeout is disabled (`false`, `0` or missing).
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  return { signal: controller.signal, clear: () => clearTimeout(timer) };
}

/** Signal merged from several sources, with a handle to detach it from them. */
export interface MergedSignal {
  /** Signal that aborts as soon as any source aborts. */
  signal: AbortSignal;
  /** Removes the listeners placed on the sources; call it once the guarded work has settled. */
  clear: VoidFunction;
}

/**
 * Merges several {@link AbortSignal}s into one that aborts when any source aborts.
 *
 * - No signals: `null`.
 * - One signal: returned as-is, with nothing to clear.
 * - Otherwise a new signal carrying the first source's `reason`, or an {@link AbortError}
 *   when the source has none. Listeners on the sources are removed once it aborts or `clear` runs.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active = signals.filter((signal): signal is AbortSignal => signal !== null && signal !== undefined);
  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], clear: () => {} };
  }

  const controller = new AbortController();
  const cleanups: VoidFunction[] = [];
  const clear = () => {
    for (const cleanup of cleanups.splice(0)) {
      cleanup();
    }
  };
  const abortFrom = (source: AbortSignal) =>
    controller.abort(source.reason ?? new AbortError('error signal aborted without a reason'));

  controller.signal.addEventListener('abort', clear, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const onAbort = () => abortFrom(signal);
    signal.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => signal.removeEventListener('abort', onAbort));
  }

  return { signal: controller.signal, clear };
}
