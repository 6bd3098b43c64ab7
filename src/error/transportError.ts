import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when no response was obtained: connection refused, DNS failure,
 * timeout or abort. The transport's own error is kept as `cause`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  override name = 'TransportError';
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
