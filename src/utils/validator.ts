import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/** Result of a standard-schema validation for the output of `T`. */
type ValidationResult<T extends StandardSchemaV1> = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

/**
 * Turns a settled validation result into a tuple, collecting issues into a {@link ValidationError}.
 */
function settle<T extends StandardSchemaV1>(
  result: ValidationResult<T> | null | undefined,
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  if (!result) {
    return [new ValidationError('error validating data empty resulting validation', []), null];
  }

  if (typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  if (!('value' in result)) {
    return [new ValidationError('error validation result without value', []), null];
  }

  return [null, result.value];
}

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - A thrown or rejected validation is wrapped in a `ValidationError` with the original as `cause`.
 * - A result with `issues` is returned as `[ValidationError, null]` carrying those issues.
 * - On successful validation without issues, returns `[null, result.value]`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap<Error, ValidationResult<T> | Promise<ValidationResult<T>>>(() =>
    schema['~standard'].validate(input),
  );

  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    const [errAsync, resultAsync] = await safeWrapAsync(() => result);
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    return settle<T>(resultAsync);
  }

  return settle<T>(result);
}

/**
 * Synchronous counterpart of {@link validator} for schemas known to validate synchronously
 * (the client's own config and error envelope schemas).
 * A schema answering with a Promise is reported as a {@link ValidationError}.
 */
export function validatorSync<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap<Error, ValidationResult<T> | Promise<ValidationResult<T>>>(() =>
    schema['~standard'].validate(input),
  );

  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ValidationError('error schema validated asynchronously in validatorSync', []), null];
  }

  return settle<T>(result);
}
