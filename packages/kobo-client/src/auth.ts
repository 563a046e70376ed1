/**
 * Authentication flows
 *
 * Device registration, password login and token refresh. Each flow mutates
 * the credential state in place and persists it only once it succeeded.
 */

import { randomUUID } from 'node:crypto';
import type { AuthApiResponse, LoginPageScraper, TransportConfig } from './types.js';
import type { CredentialState } from './credentials.js';
import type { EndpointDirectory } from './directory.js';
import type { Logger } from './logger.js';
import { ProtocolError } from './errors.js';
import { send, readJson, isRecord } from './http.js';
import type { CookieJar } from './http.js';
import { parseAuthenticatedUser } from './scraper.js';
import {
  AFFILIATE,
  APPLICATION_VERSION,
  CLIENT_KEY,
  DEFAULT_PLATFORM_ID,
  DEVICE_AUTH_PATH,
  REFRESH_AUTH_PATH,
  SIGN_IN_SUBMIT_PATH,
} from './constants.js';

function isAuthResponse(body: unknown): body is AuthApiResponse {
  return (
    isRecord(body) &&
    typeof body.TokenType === 'string' &&
    typeof body.AccessToken === 'string' &&
    typeof body.RefreshToken === 'string' &&
    (body.UserKey === undefined || typeof body.UserKey === 'string')
  );
}

/**
 * Validate a token response and store its token pair.
 */
function applyTokens(state: CredentialState, body: unknown, operation: string): AuthApiResponse {
  if (!isAuthResponse(body)) {
    throw new ProtocolError(`${operation} returned an unexpected response.`);
  }

  if (body.TokenType !== 'Bearer') {
    throw new ProtocolError(
      `${operation} returned with an unsupported token type: '${body.TokenType}'`
    );
  }

  state.record.accessToken = body.AccessToken;
  state.record.refreshToken = body.RefreshToken;
  if (!state.isAuthenticated()) {
    throw new ProtocolError(`Authentication settings are not set after ${operation.toLowerCase()}.`);
  }

  return body;
}

/**
 * Register the device, and the user when a user key is given.
 *
 * Without a user key this yields a device-scoped token pair; the user key
 * the store returns in that case is not usable and is ignored.
 *
 * @param userKey - Key from the authenticated login redirect
 */
export async function authenticateDevice(
  config: TransportConfig,
  state: CredentialState,
  userKey = '',
  log?: Logger
): Promise<void> {
  const { record } = state;

  if (record.deviceId.length === 0) {
    record.deviceId = randomUUID();
    record.accessToken = '';
    record.refreshToken = '';
    log?.debug('Generated device id', { deviceId: record.deviceId });
  }

  const payload: Record<string, string> = {
    AffiliateName: AFFILIATE,
    AppVersion: APPLICATION_VERSION,
    ClientKey: CLIENT_KEY,
    DeviceId: record.deviceId,
    PlatformId: DEFAULT_PLATFORM_ID,
  };

  if (userKey.length > 0) {
    payload.UserKey = userKey;
  }

  const request = {
    method: 'POST' as const,
    url: `${config.storeApiUrl}${DEVICE_AUTH_PATH}`,
    json: payload,
  };
  const response = await send(config, request);
  const body = applyTokens(state, await readJson(response), 'Device authentication');

  if (userKey.length > 0) {
    if (!body.UserKey) {
      throw new ProtocolError('Device authentication did not return a user key.');
    }
    record.userKey = body.UserKey;
  }

  await state.persist();
  log?.info('Device authenticated', { deviceId: record.deviceId, withUser: userKey.length > 0 });
}

/**
 * Exchange the refresh token for a new token pair.
 *
 * The refresh endpoint is itself bearer protected and is called with the
 * expired access token. It is never repaired on 401.
 */
export async function refreshAuthentication(
  config: TransportConfig,
  state: CredentialState,
  log?: Logger
): Promise<void> {
  const response = await send(config, {
    method: 'POST',
    url: `${config.storeApiUrl}${REFRESH_AUTH_PATH}`,
    headers: { Authorization: state.authorizationHeader },
    json: {
      AppVersion: APPLICATION_VERSION,
      ClientKey: CLIENT_KEY,
      PlatformId: DEFAULT_PLATFORM_ID,
      RefreshToken: state.record.refreshToken,
    },
  });

  applyTokens(state, await readJson(response), 'Authentication refresh');

  await state.persist();
  log?.info('Authentication refreshed', { email: state.record.email });
}

/**
 * Derive the credential form URL from the sign-in page URL.
 */
export function signInSubmitUrl(signInPageUrl: string): string {
  const parsed = new URL(signInPageUrl);
  parsed.search = '';
  parsed.hash = '';
  parsed.pathname = SIGN_IN_SUBMIT_PATH;
  return parsed.toString();
}

/**
 * Log in with email and password, then register the device for the user.
 *
 * @param captcha - Response token of the reCAPTCHA shown on the sign-in page
 */
export async function login(
  config: TransportConfig,
  state: CredentialState,
  directory: EndpointDirectory,
  scraper: LoginPageScraper,
  email: string,
  password: string,
  captcha: string,
  log?: Logger
): Promise<void> {
  const signInPageUrl = directory.url('sign_in_page');
  // The form POST must carry the anti-forgery cookie the page sets
  const cookies: CookieJar = {};

  const pageRequest = {
    method: 'GET' as const,
    url: signInPageUrl,
    cookies,
    params: {
      wsa: AFFILIATE,
      pwsav: APPLICATION_VERSION,
      pwspid: DEFAULT_PLATFORM_ID,
      pwsdid: state.record.deviceId,
    },
  };
  const page = await send(config, pageRequest);
  const form = scraper.parseSignInForm(await page.text());
  log?.debug('Sign-in form parsed', { workflowId: form.workflowId });

  const submitted = await send(config, {
    method: 'POST',
    url: signInSubmitUrl(signInPageUrl),
    cookies,
    form: {
      'LogInModel.WorkflowId': form.workflowId,
      'LogInModel.Provider': AFFILIATE,
      ReturnUrl: '',
      __RequestVerificationToken: form.requestVerificationToken,
      'LogInModel.UserName': email,
      'LogInModel.Password': password,
      'g-recaptcha-response': captcha,
    },
  });

  const redirectUrl = scraper.parseAuthenticatedRedirect(await submitted.text());
  const { userId, userKey } = parseAuthenticatedUser(redirectUrl);

  // Persisted by authenticateDevice once it succeeds
  state.record.email = email;
  state.record.userId = userId;
  log?.info('Signed in', { email, userId });

  await authenticateDevice(config, state, userKey, log);
}
