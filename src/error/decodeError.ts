import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a 2xx response body cannot be decoded into the requested shape,
 * either because it is not JSON or because it fails the target schema.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  override name = 'DecodeError';
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): DecodeError | null {
  return unwrapErrorType(DecodeError, error);
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}
