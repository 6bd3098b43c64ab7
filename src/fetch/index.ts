/**
 * Fetch entrypoint: exports the default fetch-backed transport.
 * @module
 */
export { defaultTransport, FetchClient, type FetchClientOptions } from './client.js';
export { basicAuthorization, buildHeaders } from './utils.js';
