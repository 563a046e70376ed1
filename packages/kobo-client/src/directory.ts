/**
 * Endpoint directory
 *
 * The store publishes its resource URLs in an initialization document
 * instead of fixing them. The directory is loaded once per session and is
 * read-only afterwards.
 */

import type { InitializationApiResponse, TransportConfig } from './types.js';
import type { AuthorizedExecutor } from './executor.js';
import { DirectoryError, ProtocolError } from './errors.js';
import { readJson, isRecord } from './http.js';
import { INITIALIZATION_PATH } from './constants.js';

/** Resources the client reads from the directory */
export type ResourceName =
  | 'sign_in_page'
  | 'library_sync'
  | 'user_wishlist'
  | 'book'
  | 'content_access_book';

const PRODUCT_ID_PLACEHOLDER = '{ProductId}';

export class EndpointDirectory {
  private readonly resources: Readonly<Record<string, string>>;

  constructor(resources: Record<string, string>) {
    this.resources = Object.freeze({ ...resources });
  }

  /**
   * URL of a resource. Throws DirectoryError if the store did not list it.
   */
  url(name: ResourceName): string {
    const url = this.resources[name];
    if (url === undefined) {
      throw new DirectoryError(name);
    }
    return url;
  }

  /**
   * URL of a per-product resource, with the product id filled in.
   */
  expand(name: ResourceName, productId: string): string {
    return this.url(name).replace(PRODUCT_ID_PLACEHOLDER, encodeURIComponent(productId));
  }

  get names(): string[] {
    return Object.keys(this.resources);
  }
}

function isInitializationResponse(body: unknown): body is InitializationApiResponse {
  return isRecord(body) && isRecord(body.Resources);
}

/**
 * Fetch the initialization document and build the directory from its
 * string-valued resources.
 */
export async function loadEndpointDirectory(
  config: TransportConfig,
  executor: AuthorizedExecutor
): Promise<EndpointDirectory> {
  const response = await executor.send({
    method: 'GET',
    url: `${config.storeApiUrl}${INITIALIZATION_PATH}`,
  });
  const body = await readJson(response);

  if (!isInitializationResponse(body)) {
    throw new ProtocolError("Initialization response has no 'Resources' object.");
  }

  const resources: Record<string, string> = {};
  for (const [name, value] of Object.entries(body.Resources)) {
    if (typeof value === 'string') {
      resources[name] = value;
    }
  }

  return new EndpointDirectory(resources);
}
