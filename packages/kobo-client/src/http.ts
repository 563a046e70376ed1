/**
 * Unauthenticated transport
 *
 * Thin layer over fetch shared by every request the client issues.
 */

import type { TransportConfig } from './types.js';
import { NetworkError, TimeoutError, TransportError } from './errors.js';

export type HttpMethod = 'GET' | 'POST';

/**
 * A request as the client describes it, before headers are finalized.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  /** Query parameters appended to the URL */
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  /** Sent as application/json */
  json?: unknown;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  /** Cookie jar shared by the requests of one browser-like session */
  cookies?: CookieJar;
}

/** Cookie values by name */
export type CookieJar = Record<string, string>;

/**
 * Copy the cookies a response sets into the jar. Attributes (path, expiry)
 * are not tracked; a later value for the same name wins.
 */
export function storeCookies(response: Response, jar: CookieJar): void {
  for (const header of response.headers.getSetCookie()) {
    const pair = header.split(';', 1)[0] ?? '';
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    jar[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
  }
}

function cookieHeader(jar: CookieJar): string | undefined {
  const pairs = Object.entries(jar).map(([name, value]) => `${name}=${value}`);
  return pairs.length > 0 ? pairs.join('; ') : undefined;
}

/**
 * Append query parameters to a URL, keeping any it already carries.
 */
export function buildUrl(url: string, params?: Record<string, string | number>): string {
  if (!params) return url;
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    parsed.searchParams.set(key, String(value));
  }
  return parsed.toString();
}

/**
 * Send a request and return the response whatever its status.
 *
 * Fetch failures surface as NetworkError, an elapsed `timeout` as
 * TimeoutError. Cookies the response sets are stored in `request.cookies`.
 */
export async function sendRequest(
  config: TransportConfig,
  request: HttpRequest
): Promise<Response> {
  const url = buildUrl(request.url, request.params);

  const headers: Record<string, string> = {
    ...config.defaultHeaders,
    ...request.headers,
  };

  const cookie = request.cookies ? cookieHeader(request.cookies) : undefined;
  if (cookie) {
    headers['Cookie'] = cookie;
  }

  let body: string | URLSearchParams | undefined;
  if (request.json !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(request.json);
  } else if (request.form) {
    body = new URLSearchParams(request.form);
  }

  const controller = new AbortController();
  const timeoutId = config.timeout
    ? setTimeout(() => controller.abort(), config.timeout)
    : undefined;

  try {
    const response = await fetch(url, {
      method: request.method,
      headers,
      body,
      signal: controller.signal,
    });
    if (request.cookies) {
      storeCookies(response, request.cookies);
    }
    return response;
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError(config.timeout ?? 0);
    }

    throw new NetworkError(
      `Failed to ${request.method} ${url}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      error instanceof Error ? error : undefined
    );
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

/**
 * Read and discard the body so the connection can be reused.
 */
export async function drain(response: Response): Promise<void> {
  if (!response.bodyUsed) {
    await response.arrayBuffer();
  }
}

/**
 * Throw a TransportError for any non-2xx response, after draining it.
 */
export async function assertOk(response: Response, request: HttpRequest): Promise<Response> {
  if (response.ok) return response;
  await drain(response);
  throw new TransportError(
    response.status,
    response.statusText,
    request.method,
    buildUrl(request.url, request.params)
  );
}

/**
 * Send a request that needs no authorization and require a 2xx response.
 */
export async function send(config: TransportConfig, request: HttpRequest): Promise<Response> {
  const response = await sendRequest(config, request);
  return assertOk(response, request);
}

/**
 * Parse a JSON body. Callers narrow the result with a type guard.
 */
export async function readJson(response: Response): Promise<unknown> {
  const body: unknown = await response.json();
  return body;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
