/**
 * Builds request headers from a name to value map. A `null` value leaves the header out,
 * so optional headers are omitted rather than sent empty.
 *
 * Throws the `TypeError` of the `Headers` class for a value it refuses (CR, LF, NUL, or
 * characters above U+00FF).
 */
export function buildHeaders(values: Record<string, string | null>): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(values)) {
    if (value !== null) {
      headers.set(name, value);
    }
  }

  return headers;
}

/**
 * Builds an HTTP Basic `Authorization` header value from a user and password.
 * Credentials are UTF-8 encoded before base64, so non-ASCII characters survive.
 *
 * @example
 * basicAuthorization('u', 'p'); // 'Basic dTpw'
 */
export function basicAuthorization(user: string, password: string): string {
  const bytes = new TextEncoder().encode(`${user}:${password}`);
  let binary = '';
  for (const byte of bytes) {
    binary += String.fromCharCode(byte);
  }

  return `Basic ${btoa(binary)}`;
}
