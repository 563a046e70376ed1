/**
 * Kobo Client Types
 *
 * Core interfaces for the store API, the credential record and the
 * collaborators the client is configured with.
 */

import type { Logger } from './logger.js';

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration for KoboClient
 */
export interface KoboClientConfig {
  /** Base URL of the store API (default: 'https://storeapi.kobo.com') */
  storeApiUrl?: string;
  /** Default headers to include with every request */
  defaultHeaders?: Record<string, string>;
  /** Request timeout in milliseconds. Unset means no client-side timeout. */
  timeout?: number;
  /** Enable debug logging (true for console, or provide custom Logger) */
  debug?: boolean | Logger;
  /** Where credential changes are persisted after each successful mutation */
  store?: CredentialStore;
  /** Strips KDRM protection from downloaded artifacts */
  drmRemover?: DrmRemover;
  /** Extracts login tokens from the sign-in pages */
  scraper?: LoginPageScraper;
}

/**
 * Transport settings shared by every request function.
 * @internal
 */
export interface TransportConfig {
  storeApiUrl: string;
  defaultHeaders?: Record<string, string>;
  timeout?: number;
}

export type { Logger } from './logger.js';

// ============================================================================
// Credentials
// ============================================================================

/**
 * Persisted credential record for one user.
 */
export interface CredentialRecord {
  deviceId: string;
  userId: string;
  userKey: string;
  email: string;
  accessToken: string;
  refreshToken: string;
}

/**
 * Persistence port for credential records.
 *
 * @example
 * ```ts
 * class SettingsFileStore implements CredentialStore {
 *   async save(record: CredentialRecord): Promise<void> {
 *     // Write to your settings file, keyed by record.email
 *   }
 * }
 * ```
 */
export interface CredentialStore {
  /**
   * Persist the record. Overwrites any record stored under the same email.
   */
  save(record: CredentialRecord): Promise<void>;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Input for DRM removal
 */
export interface DrmRemovalRequest {
  /** Encrypted artifact as downloaded */
  inputPath: string;
  /** Where the decrypted artifact must be written */
  outputPath: string;
  deviceId: string;
  userId: string;
  /** Content keys by name, from the content access response */
  contentKeys: Record<string, string>;
}

/**
 * Removes per-publisher protection from a downloaded KDRM artifact.
 */
export interface DrmRemover {
  removeDrm(request: DrmRemovalRequest): Promise<void>;
}

/**
 * Values scraped from the sign-in page
 */
export interface SignInForm {
  workflowId: string;
  requestVerificationToken: string;
}

/**
 * Reads the login tokens out of the store's HTML pages.
 */
export interface LoginPageScraper {
  parseSignInForm(html: string): SignInForm;
  /** Returns the `kobo://UserAuthenticated?...` URL */
  parseAuthenticatedRedirect(html: string): string;
}

// ============================================================================
// Catalog
// ============================================================================

/**
 * A title in the user's library.
 */
export interface Book {
  revisionId: string;
  title: string;
  author: string;
  archived: boolean;
  /** Credentials the title was listed with */
  owner: CredentialRecord;
}

/**
 * Options for listBooks
 */
export interface ListBooksOptions {
  /** Include titles the user archived (default: false) */
  includeArchived?: boolean;
}

/**
 * Supported DRM types for downloads
 */
export type DrmType = 'KDRM' | 'SignedNoDrm';

/**
 * Supported artifact formats for downloads
 */
export type UrlFormat = 'EPUB3' | 'KEPUB' | 'EPUB3FL';

/**
 * The encoding chosen for a download
 */
export interface DownloadInfo {
  downloadUrl: string;
  drmType: DrmType;
  urlFormat: UrlFormat;
  hasDrm: boolean;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Error codes raised by the client
 */
export type KoboErrorCode =
  | 'NOT_AUTHENTICATED'
  | 'PROTOCOL'
  | 'TRANSPORT'
  | 'DIRECTORY';

// ============================================================================
// API Response Types (internal)
// ============================================================================

/** @internal */
export interface AuthApiResponse {
  TokenType: string;
  AccessToken: string;
  RefreshToken: string;
  UserKey?: string;
}

/** @internal */
export interface InitializationApiResponse {
  Resources: Record<string, unknown>;
}

/** @internal */
export interface ContentKeyApiData {
  Name: string;
  Value: string;
}

/** @internal */
export interface ContentUrlApiData {
  DRMType: string;
  UrlFormat: string;
  /** Read only on the entry that gets selected */
  DownloadUrl?: string | null;
}

/** @internal */
export interface ContentAccessApiResponse {
  ContentKeys?: ContentKeyApiData[] | null;
  ContentUrls?: ContentUrlApiData[] | null;
}

/** @internal */
export interface WishlistApiResponse<T = unknown> {
  Items: T[];
  TotalPageCount: number;
}

/** @internal */
export interface ContributorRoleApiData {
  Name?: string;
  Role?: string;
}

/** @internal */
export interface EntitlementApiData {
  BookEntitlement?: {
    Accessibility?: string;
    IsLocked?: boolean;
    IsRemoved?: boolean;
  };
  BookMetadata?: {
    RevisionId?: string;
    Title?: string;
    /** Narrowed to ContributorRoleApiData entries where read */
    ContributorRoles?: unknown;
  };
}

/** @internal */
export interface LibrarySyncEntry {
  NewEntitlement?: EntitlementApiData;
  ChangedEntitlement?: EntitlementApiData;
  [key: string]: unknown;
}
