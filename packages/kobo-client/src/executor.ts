/**
 * Authorized request executor
 *
 * Every call that needs a bearer token goes through here. An expired access
 * token is repaired once: refresh, then resend the same request.
 */

import type { TransportConfig } from './types.js';
import type { CredentialState } from './credentials.js';
import type { Logger } from './logger.js';
import { sendRequest, assertOk, drain, type HttpRequest } from './http.js';

/**
 * Refreshes the credential's token pair. Must not route through the
 * executor itself.
 */
export type RefreshHandler = () => Promise<void>;

export interface SendOptions {
  /** Allow the 401 repair for this request (default: true) */
  repairable?: boolean;
}

export class AuthorizedExecutor {
  private readonly config: TransportConfig;
  private readonly credentials: CredentialState;
  private readonly refresh: RefreshHandler;
  private readonly log: Logger;

  constructor(
    config: TransportConfig,
    credentials: CredentialState,
    refresh: RefreshHandler,
    log: Logger
  ) {
    this.config = config;
    this.credentials = credentials;
    this.refresh = refresh;
    this.log = log;
  }

  /**
   * Send the request with the current bearer token.
   *
   * On 401 the failed response is drained, the token pair refreshed and the
   * request resent once with the new token. The resent request is not
   * repairable, so a second 401 is thrown as a TransportError.
   */
  async send(request: HttpRequest, options: SendOptions = {}): Promise<Response> {
    const { repairable = true } = options;

    const response = await sendRequest(this.config, this.authorize(request));

    if (response.status === 401 && repairable) {
      this.log.warn('Refreshing expired authentication token...', { url: request.url });
      await drain(response);
      await this.refresh();
      return this.send(request, { repairable: false });
    }

    return assertOk(response, request);
  }

  private authorize(request: HttpRequest): HttpRequest {
    return {
      ...request,
      headers: {
        ...request.headers,
        Authorization: this.credentials.authorizationHeader,
      },
    };
  }
}
