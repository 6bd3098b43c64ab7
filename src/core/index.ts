/**
 * Core entrypoint: exports the API client, its configuration and result types.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/** Client configuration, its schema and the default endpoint. */
export { type ClientConfig, clientConfigSchema, DEFAULT_BASE_URL, type ResolvedConfig } from './config.js';

/**
 * Pingdom API client plus the deprecated positional constructors.
 */
export { newClient, newMultiUserClient, PingdomClient } from './client.js';

/** Decode targets and round-trip results. */
export type { DecodeTarget, DoResult } from './types.js';
