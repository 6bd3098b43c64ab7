import { z } from 'zod';
import { InvalidURLError } from '../error/invalidUrlError.js';
import { defaultTransport } from '../fetch/client.js';
import type { Transport } from '../types/request.js';
import { validatorSync } from '../utils/validator.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Endpoint used when no base URL is configured. */
export const DEFAULT_BASE_URL = 'https://api.pingdom.com/api/2.1';

/** Configuration accepted by {@link PingdomClient.create}. */
export interface ClientConfig {
  /** Account user for HTTP Basic authentication. */
  user: string;
  /** Account password for HTTP Basic authentication. */
  password: string;
  /** Application key, sent as the `App-Key` header. */
  apiKey: string;
  /**
   * Email of the sub-account to act on behalf of in multi-user setups, sent as `Account-Email`.
   * Empty or missing sends no header.
   */
  accountEmail?: string;
  /**
   * Absolute base URL of the API.
   * @default 'https://api.pingdom.com/api/2.1'
   */
  baseUrl?: string;
  /**
   * Transport requests are sent through. Defaults to the shared fetch-based transport.
   */
  transport?: Transport;
}

/** Schema for {@link ClientConfig}. */
export const clientConfigSchema = z.object({
  user: z.string(),
  password: z.string(),
  apiKey: z.string(),
  accountEmail: z.string().optional(),
  baseUrl: z.string().optional(),
  transport: z
    .custom<Transport>(
      (value) => typeof value === 'object' && value !== null && 'send' in value && typeof value.send === 'function',
      { message: 'transport must implement send(request)' },
    )
    .optional(),
});

/** Configuration as held by a client, fixed at construction. */
export interface ResolvedConfig {
  readonly user: string;
  readonly password: string;
  readonly apiKey: string;
  /** `null` when no account email is configured. */
  readonly accountEmail: string | null;
  /** Base URL without a trailing slash. */
  readonly baseUrl: string;
  readonly transport: Transport;
}

/**
 * Validates a {@link ClientConfig} and fills in its defaults.
 *
 * Errors:
 * - {@link ValidationError} when a field has the wrong type.
 * - {@link InvalidURLError} (stage `config`) when the base URL is not an absolute URL.
 */
export function resolveConfig(config: ClientConfig): SafeWrap<Error, ResolvedConfig> {
  const [errConfig, fields] = validatorSync(config, clientConfigSchema);
  if (errConfig) {
    return [errConfig, null];
  }

  const rawBaseUrl = fields.baseUrl || DEFAULT_BASE_URL;
  const [errUrl, baseUrl] = safeWrap(() => new URL(rawBaseUrl));
  if (errUrl) {
    return [new InvalidURLError('error parsing base URL', rawBaseUrl, 'config', { cause: errUrl }), null];
  }

  return [
    null,
    Object.freeze({
      user: fields.user,
      password: fields.password,
      apiKey: fields.apiKey,
      accountEmail: fields.accountEmail || null,
      baseUrl: baseUrl.href.replace(/\/+$/, ''),
      transport: fields.transport ?? defaultTransport,
    }),
  ];
}
