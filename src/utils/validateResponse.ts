import { APIError, errorEnvelopeSchema } from '../error/apiError.js';
import { ErrorBodyError } from '../error/errorBodyError.js';
import { validatorSync } from './validator.js';
import { safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Whether a status code counts as success (200 through 299).
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Checks a response's status and decodes the API error envelope for anything outside 2xx.
 *
 * Behavior:
 * - 2xx: resolves `null` and leaves the body untouched.
 * - Otherwise the whole body is read and:
 *   - a well-formed `{ "error": { "message": ... } }` envelope becomes an {@link APIError};
 *   - a body that cannot be read, is not JSON (the parser's `SyntaxError` is the cause) or is not
 *     an envelope becomes an {@link ErrorBodyError}.
 *
 * @param response - Response as returned by the transport.
 * @returns The failure, or `null` for success.
 */
export async function validateResponse(response: Response): Promise<APIError | ErrorBodyError | null> {
  if (isSuccessStatus(response.status)) {
    return null;
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return new ErrorBodyError(response, 'error reading error body in validateResponse', { cause: errText });
  }

  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(text));
  if (errJson) {
    return new ErrorBodyError(response, 'error parsing error body in validateResponse', { cause: errJson });
  }

  const [errEnvelope, envelope] = validatorSync(json, errorEnvelopeSchema);
  if (errEnvelope) {
    return new ErrorBodyError(response, 'error decoding error envelope in validateResponse', { cause: errEnvelope });
  }

  return new APIError(response, envelope);
}
