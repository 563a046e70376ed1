/**
 * Debug logging for @kobo-fetch/client
 *
 * Enable via config:
 * ```ts
 * const client = new KoboClient(credentials, {
 *   debug: true,  // or custom logger
 * });
 * ```
 */

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

/**
 * Default console logger with formatting
 */
export const consoleLogger: Logger = {
  debug: (message, data) => {
    console.debug(`[kobo:debug] ${message}`, data ?? '');
  },
  info: (message, data) => {
    console.info(`[kobo:info] ${message}`, data ?? '');
  },
  warn: (message, data) => {
    console.warn(`[kobo:warn] ${message}`, data ?? '');
  },
  error: (message, data) => {
    console.error(`[kobo:error] ${message}`, data ?? '');
  },
};

/**
 * Silent/no-op logger
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a logger based on debug config
 */
export function createLogger(debug: boolean | Logger | undefined): Logger {
  if (!debug) return silentLogger;
  if (debug === true) return consoleLogger;
  return debug;
}

/**
 * Shorten a secret for log output.
 */
export function redact(value: string): string {
  return value.length > 8 ? `${value.substring(0, 8)}...` : '***';
}
