import { RequestError } from '../error/requestError.js';
import { TransportError } from '../error/transportError.js';
import { basicAuthorization, buildHeaders } from '../fetch/utils.js';
import type { HttpMethod, QueryParams } from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { decodeResponse } from '../utils/decodeResponse.js';
import { releaseBody } from '../utils/releaseBody.js';
import { validateResponse } from '../utils/validateResponse.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { type ClientConfig, type ResolvedConfig, resolveConfig } from './config.js';
import type { DecodeTarget, DoResult } from './types.js';

/**
 * Client for the Pingdom REST API.
 *
 * It builds authenticated requests against resource paths, sends them through its transport,
 * validates the response status and decodes JSON bodies into caller-described shapes.
 * Per-resource helpers (checks, probes, teams, ...) sit on top of {@link PingdomClient.newRequest}
 * and {@link PingdomClient.do}.
 *
 * All methods return error-first tuples; nothing is thrown, logged or retried.
 *
 * @example
 * const [err, client] = PingdomClient.create({ user: 'me@example.com', password: 'secret', apiKey: 'key' });
 * const [errChecks, checks] = await client.request('GET', '/checks', { limit: '10' }, checksSchema);
 */
export class PingdomClient {
  /** Resolved configuration, frozen at construction. */
  #config: ResolvedConfig;

  private constructor(config: ResolvedConfig) {
    this.#config = config;
  }

  /**
   * Creates a client from its configuration.
   *
   * Construction is all-or-nothing: either a fully configured client or an error.
   * - An empty or missing `baseUrl` uses {@link DEFAULT_BASE_URL}.
   * - A missing `transport` uses the shared {@link defaultTransport}.
   *
   * @returns `[null, client]`, or `[error, null]` when the configuration is malformed
   *          (an {@link InvalidURLError} for a bad base URL).
   */
  static create(config: ClientConfig): SafeWrap<Error, PingdomClient> {
    const [err, resolved] = resolveConfig(config);
    if (err) {
      return [err, null];
    }

    return [null, new PingdomClient(resolved)];
  }

  /** User sent with Basic authentication. */
  get user(): string {
    return this.#config.user;
  }

  /** Application key sent as `App-Key`. */
  get apiKey(): string {
    return this.#config.apiKey;
  }

  /** Account email sent as `Account-Email`, `null` when not configured. */
  get accountEmail(): string | null {
    return this.#config.accountEmail;
  }

  /** Base URL every resource path is appended to. */
  get baseUrl(): string {
    return this.#config.baseUrl;
  }

  /**
   * Builds an authenticated request for a resource.
   *
   * - URL: base URL + `resource`, with `params` encoded as its query string (keys sorted).
   * - Headers: `Authorization` (Basic), `App-Key`, `Accept: application/json`, and
   *   `Account-Email` only when an account email is configured.
   *
   * @param method - HTTP method in capitals, e.g. `GET`, `POST`, `PUT`, `DELETE`.
   * @param resource - Resource path starting with `/`, e.g. `/checks/123`.
   * @param params - Optional query parameters.
   * @returns `[null, request]`, an {@link InvalidURLError}, or a {@link RequestError} when the method or a header
   *          value (a line break in the key, a non-Latin-1 account email) is refused.
   */
  newRequest(method: HttpMethod, resource: string, params?: QueryParams): SafeWrap<Error, Request> {
    const [errUrl, url] = constructUrl(this.#config.baseUrl, resource, params);
    if (errUrl) {
      return [errUrl, null];
    }

    const { user, password, apiKey, accountEmail } = this.#config;
    const [errRequest, request] = safeWrap(() => {
      const headers = buildHeaders({
        Accept: 'application/json',
        Authorization: basicAuthorization(user, password),
        'App-Key': apiKey,
        'Account-Email': accountEmail,
      });

      return new Request(url, { method, headers });
    });
    if (errRequest) {
      return [
        new RequestError(`error creating ${method} request in newRequest`, method, url.toString(), {
          cause: errRequest,
        }),
        null,
      ];
    }

    return [null, request];
  }

  /**
   * Sends a request and decodes a successful JSON response into `target`'s shape.
   *
   * - No response (network failure, timeout, abort): `[TransportError, null, null]`.
   * - Non-2xx: `[APIError | ErrorBodyError, null, response]`; the body is not decoded.
   * - 2xx: `[null, data, response]`, or `[DecodeError | NilTargetError, null, response]`.
   *
   * The response body is released before the promise resolves, whatever the outcome.
   *
   * @param request - Request built with {@link PingdomClient.newRequest}.
   * @param target - Schema describing the expected response body.
   */
  async do<T>(request: Request, target: DecodeTarget<T>): Promise<DoResult<T>> {
    const [errSend, response] = await safeWrapAsync(() => this.#config.transport.send(request));
    if (errSend) {
      return [
        new TransportError(`error calling transport for ${request.method} request`, { cause: errSend }),
        null,
        null,
      ];
    }

    const [errTransport, received] = response;
    if (errTransport) {
      return [new TransportError(`error sending ${request.method} request`, { cause: errTransport }), null, null];
    }

    const [errResult, data] = await this.#process(received, target);
    const [errRelease] = await releaseBody(received);
    if (errResult) {
      return [errResult, null, received];
    }

    if (errRelease) {
      return [new TransportError('error releasing response body', { cause: errRelease }), null, received];
    }

    return [null, data, received];
  }

  /**
   * Builds a request with {@link PingdomClient.newRequest} and sends it with {@link PingdomClient.do}.
   *
   * @returns Same as `do`; a request that cannot be built resolves `[error, null, null]`.
   */
  async request<T>(
    method: HttpMethod,
    resource: string,
    params: QueryParams | undefined,
    target: DecodeTarget<T>,
  ): Promise<DoResult<T>> {
    const [errRequest, request] = this.newRequest(method, resource, params);
    if (errRequest) {
      return [errRequest, null, null];
    }

    return this.do(request, target);
  }

  /**
   * Validates the status, then decodes the body. The decoder never runs for a failed status.
   */
  async #process<T>(response: Response, target: DecodeTarget<T>): SafeWrapAsync<Error, T> {
    const errStatus = await validateResponse(response);
    if (errStatus) {
      return [errStatus, null];
    }

    return decodeResponse(response, target);
  }
}

/**
 * Creates a client for the default endpoint.
 *
 * Construction errors are discarded and `null` is returned in their place; callers relying on
 * this always receiving a client keep doing so as long as the credentials are strings.
 *
 * @deprecated Use {@link PingdomClient.create}, which reports why construction failed.
 */
export function newClient(user: string, password: string, key: string): PingdomClient | null {
  const [, client] = PingdomClient.create({ user, password, apiKey: key });
  return client;
}

/**
 * Creates a client for the default endpoint acting on behalf of a sub-account.
 *
 * Construction errors are discarded and `null` is returned in their place, exactly like {@link newClient}.
 *
 * @deprecated Use {@link PingdomClient.create} with `accountEmail`, which reports why construction failed.
 */
export function newMultiUserClient(
  user: string,
  password: string,
  key: string,
  accountEmail: string,
): PingdomClient | null {
  const [, client] = PingdomClient.create({ user, password, apiKey: key, accountEmail });
  return client;
}
