/**
 * Shared test fixtures
 */

import { CredentialState, emptyCredentials } from '../src/credentials.js';
import { EndpointDirectory } from '../src/directory.js';
import { AuthorizedExecutor } from '../src/executor.js';
import { refreshAuthentication } from '../src/auth.js';
import { silentLogger } from '../src/logger.js';
import type { LibraryContext } from '../src/library.js';
import type { CredentialRecord, CredentialStore, TransportConfig } from '../src/types.js';

export const API_URL = 'https://storeapi.kobo.test';
export const CDN_URL = 'https://cdn.kobo.test';
export const AUTH_URL = 'https://authorize.kobo.test';

export const RESOURCES = {
  sign_in_page: `${AUTH_URL}/ww/en/signin/signin`,
  library_sync: `${API_URL}/v1/library/sync`,
  user_wishlist: `${API_URL}/v1/user/wishlist`,
  book: `${API_URL}/v1/products/books/{ProductId}`,
  content_access_book: `${API_URL}/v1/products/{ProductId}/access`,
};

export const WORKFLOW_ID = 'a1b2c3d4-0000-4000-8000-123456789abc';

export const SIGN_IN_PAGE = `
<html><body>
  <a class="kobo-link partner-option kobo" href="/ww/en/signin/signin/kobo?workflowId=${WORKFLOW_ID}">Kobo</a>
  <form>
    <input name="__RequestVerificationToken" type="hidden" value="verify&amp;token" />
  </form>
</body></html>`;

export const SIGNED_IN_PAGE = `
<script>
  window.location.href = 'kobo://UserAuthenticated?userId=user-42&userKey=user-key-42&email=reader%40example.com';
</script>`;

export const transport: TransportConfig = { storeApiUrl: API_URL };

/**
 * A record that already holds a token pair.
 */
export function signedInRecord(overrides: Partial<CredentialRecord> = {}): CredentialRecord {
  return {
    ...emptyCredentials('reader@example.com'),
    deviceId: 'device-1',
    userId: 'user-1',
    userKey: 'user-key-1',
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    ...overrides,
  };
}

export function libraryContext(
  record: CredentialRecord = signedInRecord(),
  store?: CredentialStore
): LibraryContext {
  const credentials = new CredentialState(record, store);
  return {
    credentials,
    directory: new EndpointDirectory(RESOURCES),
    executor: new AuthorizedExecutor(
      transport,
      credentials,
      () => refreshAuthentication(transport, credentials),
      silentLogger
    ),
    log: silentLogger,
  };
}
