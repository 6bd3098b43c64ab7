import type { DecodeTarget } from '../core/types.js';
import { DecodeError } from '../error/decodeError.js';
import { NilTargetError } from '../error/nilTargetError.js';
import { validator } from './validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads the whole response body and decodes it into the shape described by `target`.
 *
 * - A missing target is a {@link NilTargetError}, reported before the body is touched.
 * - A body that cannot be read, is not JSON (an empty body included) or does not satisfy the
 *   target schema is a {@link DecodeError} carrying the underlying error as `cause`.
 *
 * @returns A promise resolving to `[error, value]` where `value` is the schema's output.
 */
export async function decodeResponse<T>(
  response: Response,
  target: DecodeTarget<T>,
): SafeWrapAsync<DecodeError | NilTargetError, T> {
  if (!target) {
    return [new NilTargetError('error nil target provided to decodeResponse'), null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new DecodeError('error reading response body in decodeResponse', { cause: errText }), null];
  }

  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(text));
  if (errJson) {
    return [new DecodeError('error parsing json response body in decodeResponse', { cause: errJson }), null];
  }

  const [errValidate, value] = await validator(json, target);
  if (errValidate) {
    return [new DecodeError('error validating response body in decodeResponse', { cause: errValidate }), null];
  }

  return [null, value];
}
