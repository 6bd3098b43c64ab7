import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/**
 * Releases a response body that was not read to the end, so the underlying connection can be reused.
 * Bodies that were already consumed, or never existed, need nothing.
 */
export async function releaseBody(response: Response): SafeWrapAsync<Error, void> {
  if (!response.body || response.bodyUsed) {
    return [null, undefined];
  }

  const body = response.body;
  return safeWrapAsync(() => body.cancel());
}
