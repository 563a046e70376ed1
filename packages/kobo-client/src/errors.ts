/**
 * Kobo Client Errors
 *
 * Every failure the client raises is a KoboError carrying a code, so callers
 * can branch on the kind without instanceof chains.
 */

import type { KoboErrorCode } from './types.js';

/**
 * Base class for errors raised by the client.
 *
 * @example
 * ```ts
 * try {
 *   await client.listOwnedBooks();
 * } catch (err) {
 *   if (KoboError.isNotAuthenticated(err)) {
 *     console.log('Log in first');
 *   }
 * }
 * ```
 */
export class KoboError extends Error {
  readonly code: KoboErrorCode;

  constructor(code: KoboErrorCode, message: string) {
    super(message);
    this.name = 'KoboError';
    this.code = code;

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace(this, new.target);
  }

  /**
   * Type guard to check if an error is a KoboError
   */
  static isKoboError(error: unknown): error is KoboError {
    return error instanceof KoboError;
  }

  /**
   * Type guard for the local "log in first" precondition
   */
  static isNotAuthenticated(error: unknown): error is NotAuthenticatedError {
    return error instanceof KoboError && error.code === 'NOT_AUTHENTICATED';
  }

  /**
   * Type guard for server responses that broke an assumed contract
   */
  static isProtocolError(error: unknown): error is ProtocolError {
    return error instanceof KoboError && error.code === 'PROTOCOL';
  }

  /**
   * Type guard for non-2xx responses
   */
  static isTransportError(error: unknown): error is TransportError {
    return error instanceof KoboError && error.code === 'TRANSPORT';
  }
}

/**
 * Raised before any network call when the credentials hold no token pair.
 */
export class NotAuthenticatedError extends KoboError {
  constructor(email: string) {
    super('NOT_AUTHENTICATED', `User ${email} is not authenticated`);
    this.name = 'NotAuthenticatedError';
  }
}

/**
 * The store answered, but not in the shape the client depends on:
 * wrong token type, a login page that no longer matches, no usable
 * download format.
 */
export class ProtocolError extends KoboError {
  constructor(message: string) {
    super('PROTOCOL', message);
    this.name = 'ProtocolError';
  }
}

/**
 * Non-2xx HTTP status that the single re-authentication did not resolve.
 */
export class TransportError extends KoboError {
  readonly status: number;
  readonly method: string;
  readonly url: string;

  constructor(status: number, statusText: string, method: string, url: string) {
    super('TRANSPORT', `${status} ${statusText || 'Error'} for ${method} ${url}`.trim());
    this.name = 'TransportError';
    this.status = status;
    this.method = method;
    this.url = url;
  }
}

/**
 * A resource call ran before the endpoint directory was loaded, or named a
 * resource the directory does not list.
 */
export class DirectoryError extends KoboError {
  readonly resource: string;

  constructor(resource: string, message?: string) {
    super('DIRECTORY', message ?? `Resource '${resource}' is not in the endpoint directory.`);
    this.name = 'DirectoryError';
    this.resource = resource;
  }
}

/**
 * Error thrown when a network request fails
 */
export class NetworkError extends Error {
  readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'NetworkError';
    this.cause = cause;

    Error.captureStackTrace(this, NetworkError);
  }

  static isNetworkError(error: unknown): error is NetworkError {
    return error instanceof NetworkError;
  }
}

/**
 * Error thrown when a request times out
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;

    Error.captureStackTrace(this, TimeoutError);
  }

  static isTimeoutError(error: unknown): error is TimeoutError {
    return error instanceof TimeoutError;
  }
}
