import { isErrorType } from './isErrorType.js';

/**
 * Error raised when decoding is asked for without a target to decode into.
 * This is a programming error on the caller's side, not a transport failure.
 */
export class NilTargetError extends Error {
  /** NilTargetError error-name */
  override name = 'NilTargetError';
}

/**
 * Type guard for {@link NilTargetError}.
 */
export function isNilTargetError(error: unknown): error is NilTargetError {
  return isErrorType(NilTargetError, error);
}
