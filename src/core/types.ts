import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { SafeWrapResponse } from '../utils/wrap.js';

/**
 * Shape a response body is decoded into, as a standard schema (a zod schema, for instance).
 * The schema's output is what the caller receives.
 *
 * @example
 * const checkTarget = z.object({ check: z.object({ id: z.number(), name: z.string() }) });
 */
export type DecodeTarget<T> = StandardSchemaV1<unknown, T>;

/**
 * Result of a round trip: `[error, data, response]`.
 *
 * - `[null, data, response]` when the response was 2xx and decoded.
 * - `[error, null, response]` when a response arrived but failed validation or decoding.
 * - `[error, null, null]` when no response was obtained.
 */
export type DoResult<T> = SafeWrapResponse<Error, T>;
