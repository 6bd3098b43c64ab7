import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response outside the 2xx range.
 * Base class for {@link APIError} and {@link ErrorBodyError}.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  override name = 'HTTPError';
  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: Response, message = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /**
   * Response causing the HTTPError. Its body has already been consumed.
   */
  get response(): Response {
    return this.#response;
  }

  /** HTTP status code of the response */
  get status(): number {
    return this.#response.status;
  }
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}
