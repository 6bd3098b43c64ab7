/**
 * Root entrypoint: re-exports the client, the default transport, shared types and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */
export * from './core/index.js';
export * from './error/index.js';
export { defaultTransport, FetchClient, type FetchClientOptions } from './fetch/index.js';
/** Request building blocks shared with transports. */
export type { HttpMethod, QueryParams, Transport } from './types/request.js';
/** Error-first result tuples. */
export type { SafeWrap, SafeWrapAsync, SafeWrapResponse } from './utils/wrap.js';
