/**
 * @kobo-fetch/client
 *
 * Client for the Kobo store's private API: device and password
 * authentication, library and wishlist listing, and book downloads.
 *
 * @example
 * ```ts
 * import { KoboClient, MemoryCredentialStore, emptyCredentials } from '@kobo-fetch/client';
 *
 * const client = new KoboClient(emptyCredentials(), {
 *   store: new MemoryCredentialStore(),
 * });
 *
 * await client.authenticateDevice();
 * await client.loadInitializationSettings();
 * await client.login(email, password, captchaResponse);
 *
 * const books = await client.listBooks();
 * await client.download(books[0].revisionId, 'book.epub');
 * ```
 *
 * @packageDocumentation
 */

// Main client class
export { KoboClient } from './client.js';

// Standalone functions
export { emptyCredentials, CredentialState } from './credentials.js';
export { authenticateDevice, refreshAuthentication, login, signInSubmitUrl } from './auth.js';
export { AuthorizedExecutor, type RefreshHandler, type SendOptions } from './executor.js';
export { EndpointDirectory, loadEndpointDirectory, type ResourceName } from './directory.js';
export { listOwnedBooks, listWishlist, listBooks, getBookInfo, toBook } from './library.js';
export {
  getContentAccess,
  getContentKeys,
  selectDownload,
  downloadToFile,
  downloadBook,
  suggestFileName,
} from './download.js';
export { PatternLoginPageScraper, parseAuthenticatedUser } from './scraper.js';
export { MemoryCredentialStore } from './storage/index.js';

// Logging
export {
  createLogger,
  consoleLogger,
  silentLogger,
} from './logger.js';

// Error classes
export {
  KoboError,
  NotAuthenticatedError,
  ProtocolError,
  TransportError,
  DirectoryError,
  NetworkError,
  TimeoutError,
} from './errors.js';

// Types
export type {
  KoboClientConfig,
  CredentialRecord,
  CredentialStore,
  DrmRemover,
  DrmRemovalRequest,
  LoginPageScraper,
  SignInForm,
  Book,
  ListBooksOptions,
  DownloadInfo,
  DrmType,
  UrlFormat,
  KoboErrorCode,
  LibrarySyncEntry,
  ContentAccessApiResponse,
  Logger,
} from './types.js';
