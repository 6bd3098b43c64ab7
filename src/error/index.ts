/**
 * Error entrypoint: exports the typed errors returned by the client and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the core client.
 * @module
 */
/** Error thrown when a request is aborted without a reason. */
export { AbortError, isAbortError } from './abortError.js';
/** Error reported by the API through its error envelope. */
export { APIError, type ErrorEnvelope, errorEnvelopeSchema, getAPIError, isAPIError } from './apiError.js';
/** Error decoding a successful response into the requested shape. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Error decoding the body of a failed response. */
export { ErrorBodyError, getErrorBodyError, isErrorBodyError } from './errorBodyError.js';
/** Base error for responses outside the 2xx range. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Error representing a URL that could not be parsed. */
export { getInvalidURLError, InvalidURLError, type InvalidURLStage, isInvalidURLError } from './invalidUrlError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when decoding without a target. */
export { isNilTargetError, NilTargetError } from './nilTargetError.js';
/** Error building a request for a method/URL pair. */
export { isRequestError, RequestError } from './requestError.js';
/** Error thrown when a request exceeds the transport timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error raised when no response could be obtained. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of a value fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
