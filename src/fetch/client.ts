import type { Transport } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options to configure the {@link FetchClient} transport. */
export interface FetchClientOptions {
  /**
   * Request timeout in milliseconds, `false` or `0` to wait indefinitely.
   * @default false
   */
  timeout?: number | false;
}

/**
 * Thin transport around the native `fetch` API that:
 * - applies an optional timeout on top of the request's own abort signal,
 * - resolves every obtained response, whatever its status,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient implements Transport {
  /** Timeout applied to every request sent through this client. */
  #timeout: number | false;

  /** Creates a new fetch transport */
  constructor(opts: FetchClientOptions = {}) {
    this.#timeout = opts.timeout ?? false;
  }

  /**
   * Sends the request and resolves with whatever response comes back.
   *
   * Errors:
   * - Network failures, aborts and timeouts are wrapped in `Error` with the original as `cause`
   *   (a timeout's cause is a {@link TimeoutError}).
   *
   * @param request - Fully built request.
   * @returns A promise resolving to `[error, response]`.
   */
  async send(request: Request): SafeWrapAsync<Error, Response> {
    const timeout = createTimeoutSignal(this.#timeout);
    const merged = mergeSignals([request.signal, timeout?.signal]);
    const signal = merged?.signal;
    const [err, response] = await safeWrapAsync(() => fetch(request, signal ? { signal } : undefined));
    timeout?.clear();
    merged?.clear();
    if (err) {
      const cause = signal?.aborted ? signal.reason : err;
      return [new Error(`error sending ${request.method} request in fetchClient`, { cause }), null];
    }

    return [null, response];
  }
}

/**
 * Process-wide transport used by clients created without one of their own.
 * It sets no timeout; construct a {@link FetchClient} with options to change that.
 */
export const defaultTransport: Transport = new FetchClient();
