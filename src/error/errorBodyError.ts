import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a non-2xx response body could not be decoded as an error envelope.
 * The underlying failure (a `SyntaxError` from the JSON parser, a {@link ValidationError},
 * or a body read error) is kept as `cause`.
 */
export class ErrorBodyError extends HTTPError {
  /** ErrorBodyError error-name */
  override name = 'ErrorBodyError';
}

/**
 * Extract an {@link ErrorBodyError} from an unknown error value, following nested causes.
 */
export function getErrorBodyError(error: unknown): ErrorBodyError | null {
  return unwrapErrorType(ErrorBodyError, error);
}

/**
 * Type guard for {@link ErrorBodyError}.
 */
export function isErrorBodyError(error: unknown): error is ErrorBodyError {
  return isErrorType(ErrorBodyError, error);
}
