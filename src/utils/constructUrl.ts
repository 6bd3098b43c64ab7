import { InvalidURLError } from '../error/invalidUrlError.js';
import type { QueryParams } from '../types/request.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Encodes query params as `application/x-www-form-urlencoded`, keys in ascending order.
 */
export function encodeQuery(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const key of Object.keys(params).sort()) {
    search.set(key, params[key]);
  }

  return search.toString();
}

/**
 * Builds the absolute URL for a resource by appending it to the base URL and re-parsing the result.
 *
 * When `params` is given it replaces any query string on the resource; an empty mapping
 * clears it.
 *
 * @param baseUrl - Base URL without a trailing slash, e.g. `https://api.pingdom.com/api/2.1`.
 * @param resource - Resource path, expected to start with `/`, e.g. `/checks/123`.
 * @param params - Optional query parameters.
 */
export function constructUrl(baseUrl: string, resource: string, params?: QueryParams): SafeWrap<InvalidURLError, URL> {
  const raw = `${baseUrl}${resource}`;
  const [errUrl, url] = safeWrap(() => new URL(raw));
  if (errUrl) {
    return [new InvalidURLError(`error constructing URL for ${resource}`, raw, 'request', { cause: errUrl }), null];
  }

  if (params) {
    url.search = encodeQuery(params);
  }

  return [null, url];
}
