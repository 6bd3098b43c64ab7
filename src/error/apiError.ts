import { z } from 'zod';
import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * JSON envelope the API sends with every non-2xx response, e.g.
 * `{ "error": { "message": "bad request" } }`.
 *
 * Pingdom also sends `statuscode`, `statusdesc` and `errormessage` inside the
 * envelope; `message` takes precedence over `errormessage`.
 */
export const errorEnvelopeSchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      errormessage: z.string().optional(),
      statuscode: z.number().int().optional(),
      statusdesc: z.string().optional(),
    })
    .refine((body) => body.message !== undefined || body.errormessage !== undefined, {
      message: 'error envelope carries no message',
    }),
});

/** Decoded error envelope. */
export type ErrorEnvelope = z.infer<typeof errorEnvelopeSchema>;

/**
 * Error reported by the API itself: a non-2xx response carrying a well-formed error envelope.
 * The message is the remote service's message, unchanged.
 */
export class APIError extends HTTPError {
  /** APIError error-name */
  override name = 'APIError';
  /** Status code as reported in the envelope, falling back to the response status */
  #statusCode: number;
  /** Status description as reported in the envelope, falling back to the status text */
  #statusDescription: string;

  /** Creates a new instance of an APIError from the response and its decoded envelope */
  constructor(response: Response, envelope: ErrorEnvelope, opts?: ErrorOptions) {
    const { message, errormessage, statuscode, statusdesc } = envelope.error;
    super(response, message ?? errormessage ?? '', opts);
    this.#statusCode = statuscode ?? response.status;
    this.#statusDescription = statusdesc ?? response.statusText;
  }

  /** Status code reported by the API */
  get statusCode(): number {
    return this.#statusCode;
  }

  /** Status description reported by the API */
  get statusDescription(): string {
    return this.#statusDescription;
  }
}

/**
 * Extract an {@link APIError} from an unknown error value, following nested causes.
 */
export function getAPIError(error: unknown): APIError | null {
  return unwrapErrorType(APIError, error);
}

/**
 * Type guard for {@link APIError}.
 */
export function isAPIError(error: unknown): error is APIError {
  return isErrorType(APIError, error);
}
