/**
 * KoboClient - Main client class
 *
 * Unified interface for one user's session with the store.
 */

import type {
  Book,
  CredentialRecord,
  DrmRemover,
  KoboClientConfig,
  LibrarySyncEntry,
  ListBooksOptions,
  LoginPageScraper,
  TransportConfig,
} from './types.js';
import { CredentialState } from './credentials.js';
import { AuthorizedExecutor } from './executor.js';
import { EndpointDirectory, loadEndpointDirectory } from './directory.js';
import { authenticateDevice, login, refreshAuthentication } from './auth.js';
import {
  assertAuthenticated,
  getBookInfo,
  listBooks,
  listOwnedBooks,
  listWishlist,
  type LibraryContext,
} from './library.js';
import { downloadBook } from './download.js';
import { PatternLoginPageScraper } from './scraper.js';
import {
  DirectoryError,
  KoboError,
  type NotAuthenticatedError,
  type ProtocolError,
  type TransportError,
} from './errors.js';
import { createLogger, redact, type Logger } from './logger.js';
import { DEFAULT_STORE_API_URL } from './constants.js';

/**
 * Stateful client for the store's private API.
 *
 * Calls run one at a time; the credential record is shared by every call
 * and is not safe to refresh from two sessions at once.
 *
 * @example
 * ```ts
 * const client = new KoboClient(record, { store, drmRemover });
 *
 * await client.authenticateDevice();
 * await client.loadInitializationSettings();
 * await client.login('reader@example.com', 'password', captchaResponse);
 *
 * for (const book of await client.listBooks()) {
 *   await client.download(book.revisionId, suggestFileName(book));
 * }
 * ```
 */
export class KoboClient {
  private readonly config: TransportConfig;
  private readonly credentials: CredentialState;
  private readonly executor: AuthorizedExecutor;
  private readonly scraper: LoginPageScraper;
  private readonly drmRemover?: DrmRemover;
  private readonly log: Logger;
  private directory?: EndpointDirectory;

  constructor(record: CredentialRecord, config: KoboClientConfig = {}) {
    // Normalize store URL (remove trailing slash)
    this.config = {
      storeApiUrl: (config.storeApiUrl ?? DEFAULT_STORE_API_URL).replace(/\/+$/, ''),
      defaultHeaders: config.defaultHeaders,
      timeout: config.timeout,
    };
    this.log = createLogger(config.debug);
    this.credentials = new CredentialState(record, config.store);
    this.executor = new AuthorizedExecutor(
      this.config,
      this.credentials,
      () => refreshAuthentication(this.config, this.credentials, this.log),
      this.log
    );
    this.scraper = config.scraper ?? new PatternLoginPageScraper();
    this.drmRemover = config.drmRemover;
    this.log.info('KoboClient initialized', {
      storeApiUrl: this.config.storeApiUrl,
      email: record.email,
    });
  }

  // ==========================================================================
  // Authentication
  // ==========================================================================

  /**
   * Register this device, generating a device id on first use.
   *
   * @param userKey - Key from a password login; omit for a device-only session
   */
  async authenticateDevice(userKey = ''): Promise<void> {
    this.log.info('Authenticating device', { withUser: userKey.length > 0 });
    try {
      await authenticateDevice(this.config, this.credentials, userKey, this.log);
    } catch (error) {
      this.log.error('Device authentication failed', { error: String(error) });
      throw error;
    }
  }

  /**
   * Log in with email and password.
   *
   * Needs the endpoint directory for the sign-in page URL, and a device id,
   * so `authenticateDevice()` and `loadInitializationSettings()` come first.
   */
  async login(email: string, password: string, captcha: string): Promise<void> {
    this.log.info('Logging in', { email });
    try {
      await login(
        this.config,
        this.credentials,
        this.requireDirectory('sign_in_page'),
        this.scraper,
        email,
        password,
        captcha,
        this.log
      );
    } catch (error) {
      this.log.error('Login failed', { email, error: String(error) });
      throw error;
    }
  }

  /**
   * Whether both tokens are set.
   */
  get isAuthenticated(): boolean {
    return this.credentials.isAuthenticated();
  }

  // ==========================================================================
  // Endpoint Directory
  // ==========================================================================

  /**
   * Load the endpoint directory. Call once per session, after device
   * authentication and before any library or download call.
   */
  async loadInitializationSettings(): Promise<EndpointDirectory> {
    this.directory = await loadEndpointDirectory(this.config, this.executor);
    this.log.debug('Endpoint directory loaded', { resources: this.directory.names.length });
    return this.directory;
  }

  // ==========================================================================
  // Library & Catalog
  // ==========================================================================

  /**
   * Raw library sync entries of every page, in server order.
   */
  async listOwnedBooks(): Promise<LibrarySyncEntry[]> {
    assertAuthenticated(this.credentials);
    return listOwnedBooks(this.libraryContext('library_sync'));
  }

  /**
   * Owned titles as Books.
   */
  async listBooks(options?: ListBooksOptions): Promise<Book[]> {
    assertAuthenticated(this.credentials);
    return listBooks(this.libraryContext('library_sync'), options);
  }

  async listWishlist(): Promise<unknown[]> {
    return listWishlist(this.libraryContext('user_wishlist'));
  }

  async getBookInfo(productId: string): Promise<unknown> {
    return getBookInfo(this.libraryContext('book'), productId);
  }

  // ==========================================================================
  // Content Acquisition
  // ==========================================================================

  /**
   * Download a title to `outputPath`, decrypting it when it is KDRM
   * protected.
   *
   * @returns The output path
   */
  async download(productId: string, outputPath: string): Promise<string> {
    this.log.info('Requesting download', {
      productId,
      token: redact(this.credentials.record.accessToken),
    });
    try {
      return await downloadBook(
        this.libraryContext('content_access_book'),
        this.config,
        this.drmRemover,
        productId,
        outputPath
      );
    } catch (error) {
      this.log.error('Download failed', { productId, error: String(error) });
      throw error;
    }
  }

  // ==========================================================================
  // Static Utilities
  // ==========================================================================

  /**
   * Type guard to check if an error is a KoboError
   */
  static isKoboError(error: unknown): error is KoboError {
    return KoboError.isKoboError(error);
  }

  /**
   * Type guard for "log in first"
   */
  static isNotAuthenticated(error: unknown): error is NotAuthenticatedError {
    return KoboError.isNotAuthenticated(error);
  }

  /**
   * Type guard for an upstream format change
   */
  static isProtocolError(error: unknown): error is ProtocolError {
    return KoboError.isProtocolError(error);
  }

  /**
   * Type guard for an HTTP failure
   */
  static isTransportError(error: unknown): error is TransportError {
    return KoboError.isTransportError(error);
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /**
   * Get the configured store API URL
   */
  get storeApiUrl(): string {
    return this.config.storeApiUrl;
  }

  /**
   * The credential record this client mutates
   */
  get record(): CredentialRecord {
    return this.credentials.record;
  }

  private requireDirectory(resource: string): EndpointDirectory {
    if (!this.directory) {
      throw new DirectoryError(
        resource,
        `Endpoint directory is not loaded; call loadInitializationSettings() before using '${resource}'.`
      );
    }
    return this.directory;
  }

  private libraryContext(resource: string): LibraryContext {
    return {
      credentials: this.credentials,
      directory: this.requireDirectory(resource),
      executor: this.executor,
      log: this.log,
    };
  }
}
