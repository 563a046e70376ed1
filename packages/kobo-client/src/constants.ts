/**
 * Store protocol constants
 *
 * Values the store expects from its own Android reading app.
 */

export const AFFILIATE = 'Kobo';
export const APPLICATION_VERSION = '8.11.24971';
export const DEFAULT_PLATFORM_ID = '00000000-0000-0000-0000-000000004000';
export const DISPLAY_PROFILE = 'Android';

export const DEFAULT_STORE_API_URL = 'https://storeapi.kobo.com';

export const DEVICE_AUTH_PATH = '/v1/auth/device';
export const REFRESH_AUTH_PATH = '/v1/auth/refresh';
export const INITIALIZATION_PATH = '/v1/initialization';

/** Path of the credential form behind the sign-in page */
export const SIGN_IN_SUBMIT_PATH = '/ww/en/signin/signin/kobo';

export const SYNC_TOKEN_HEADER = 'x-kobo-synctoken';
export const SYNC_RESULT_HEADER = 'x-kobo-sync';

export const WISHLIST_PAGE_SIZE = 100;

/** Suffix of the in-progress download beside the output path */
export const DOWNLOADING_SUFFIX = '.downloading';
export const DOWNLOAD_CHUNK_SIZE = 256 * 1024;

/** The client key is the platform id, base64 encoded */
export const CLIENT_KEY = Buffer.from(DEFAULT_PLATFORM_ID).toString('base64');
