import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * HTTP method of a request. The API uses GET, POST, PUT and DELETE; any other token the
 * `Request` constructor accepts is let through.
 */
// biome-ignore lint/complexity/noBannedTypes: `string & {}` keeps literal autocompletion while accepting any token
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | (string & {});

/** Query parameters for a resource, name to value. */
export type QueryParams = Record<string, string>;

/**
 * Contract for the HTTP transport the client sends its requests through.
 *
 * A transport resolves with any response it obtains, whatever the status code, and
 * returns an error only when no response could be obtained. It is shared between
 * concurrent calls, so it must be safe to use concurrently.
 */
export interface Transport {
  /** Performs the round trip for a prepared request. */
  send: (request: Request) => SafeWrapAsync<Error, Response>;
}
