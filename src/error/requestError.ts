import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request object cannot be created for a method/URL pair,
 * e.g. an invalid or forbidden HTTP method.
 */
export class RequestError extends Error {
  /** RequestError error-name */
  override name = 'RequestError';
  /** Method the request was built with */
  readonly method: string;
  /** URL the request was built for */
  readonly url: string;

  constructor(message: string, method: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.method = method;
    this.url = url;
  }
}

/**
 * Type guard for {@link RequestError}.
 */
export function isRequestError(error: unknown): error is RequestError {
  return isErrorType(RequestError, error);
}
