import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Where the URL was rejected: resolving the client's base URL, or building a request URL. */
export type InvalidURLStage = 'config' | 'request';

/**
 * Error representing a URL that does not parse as an absolute URL.
 */
export class InvalidURLError extends Error {
  /** InvalidURLError error-name */
  override name = 'InvalidURLError';
  /** The rejected input */
  #url: string;
  /** Stage the URL was rejected at */
  #stage: InvalidURLStage;

  /** Creates a new instance of an InvalidURLError with the rejected URL and the stage it failed at */
  constructor(message: string, url: string, stage: InvalidURLStage, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
    this.#stage = stage;
  }

  /** The rejected URL input */
  get url(): string {
    return this.#url;
  }

  /** Stage the URL was rejected at */
  get stage(): InvalidURLStage {
    return this.#stage;
  }
}

/**
 * Extract an {@link InvalidURLError} from an unknown error value, following nested causes.
 */
export function getInvalidURLError(error: unknown): InvalidURLError | null {
  return unwrapErrorType(InvalidURLError, error);
}

/**
 * Type guard for {@link InvalidURLError}.
 */
export function isInvalidURLError(error: unknown): error is InvalidURLError {
  return isErrorType(InvalidURLError, error);
}
