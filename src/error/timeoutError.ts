import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the transport gives up on a request after its configured timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  override name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  readonly timeout: number;

  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.timeout = timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
