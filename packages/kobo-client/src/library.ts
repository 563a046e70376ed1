/**
 * Library and catalog operations
 *
 * Owned titles are paged with the sync token the store hands back; the
 * wishlist is paged by index.
 */

import type {
  Book,
  ContributorRoleApiData,
  CredentialRecord,
  EntitlementApiData,
  LibrarySyncEntry,
  ListBooksOptions,
  WishlistApiResponse,
} from './types.js';
import type { CredentialState } from './credentials.js';
import type { EndpointDirectory } from './directory.js';
import type { AuthorizedExecutor } from './executor.js';
import type { Logger } from './logger.js';
import { NotAuthenticatedError, ProtocolError } from './errors.js';
import { readJson, isRecord } from './http.js';
import { SYNC_RESULT_HEADER, SYNC_TOKEN_HEADER, WISHLIST_PAGE_SIZE } from './constants.js';

/**
 * Everything a library call needs.
 * @internal
 */
export interface LibraryContext {
  credentials: CredentialState;
  directory: EndpointDirectory;
  executor: AuthorizedExecutor;
  log: Logger;
}

interface BookListPage {
  entries: LibrarySyncEntry[];
  /** Empty when the store has no more pages */
  syncToken: string;
}

function isLibrarySyncEntry(value: unknown): value is LibrarySyncEntry {
  return isRecord(value);
}

async function getBookListPage(ctx: LibraryContext, syncToken: string): Promise<BookListPage> {
  const headers: Record<string, string> = {};
  if (syncToken.length > 0) {
    headers[SYNC_TOKEN_HEADER] = syncToken;
  }

  const response = await ctx.executor.send({
    method: 'GET',
    url: ctx.directory.url('library_sync'),
    headers,
  });
  const body = await readJson(response);

  if (!Array.isArray(body)) {
    throw new ProtocolError('Library sync returned something other than a list.');
  }
  const entries = body.filter(isLibrarySyncEntry);

  let nextToken = '';
  if (response.headers.get(SYNC_RESULT_HEADER) === 'continue') {
    nextToken = response.headers.get(SYNC_TOKEN_HEADER) ?? '';
  }

  return { entries, syncToken: nextToken };
}

/**
 * @throws NotAuthenticatedError when no token pair is set
 */
export function assertAuthenticated(credentials: CredentialState): void {
  if (!credentials.isAuthenticated()) {
    throw new NotAuthenticatedError(credentials.record.email);
  }
}

/**
 * List every library sync entry of the user, in server order.
 *
 * @throws NotAuthenticatedError before any request when no token pair is set
 */
export async function listOwnedBooks(ctx: LibraryContext): Promise<LibrarySyncEntry[]> {
  assertAuthenticated(ctx.credentials);

  const all: LibrarySyncEntry[] = [];
  let syncToken = '';
  let pages = 0;

  do {
    const page = await getBookListPage(ctx, syncToken);
    all.push(...page.entries);
    syncToken = page.syncToken;
    pages++;
  } while (syncToken.length > 0);

  ctx.log.debug('Library synced', { pages, entries: all.length });
  return all;
}

function isWishlistPage(body: unknown): body is WishlistApiResponse {
  return isRecord(body) && Array.isArray(body.Items);
}

/**
 * List every wishlist item, 100 per page.
 *
 * One page is always requested. A missing, zero or negative
 * `TotalPageCount` ends the listing after it.
 */
export async function listWishlist(ctx: LibraryContext): Promise<unknown[]> {
  const items: unknown[] = [];
  let pageIndex = 0;

  for (;;) {
    const response = await ctx.executor.send({
      method: 'GET',
      url: ctx.directory.url('user_wishlist'),
      params: {
        PageIndex: pageIndex,
        PageSize: WISHLIST_PAGE_SIZE,
      },
    });
    const body = await readJson(response);
    if (!isWishlistPage(body)) {
      throw new ProtocolError(`Wishlist page ${pageIndex} has no 'Items' list.`);
    }

    items.push(...body.Items);
    pageIndex++;

    const totalPages = typeof body.TotalPageCount === 'number' ? body.TotalPageCount : 0;
    if (pageIndex >= totalPages) break;
  }

  return items;
}

/**
 * Fetch the catalog record of one product.
 */
export async function getBookInfo(ctx: LibraryContext, productId: string): Promise<unknown> {
  const response = await ctx.executor.send({
    method: 'GET',
    url: ctx.directory.expand('book', productId),
  });
  return readJson(response);
}

function isContributorRole(value: unknown): value is ContributorRoleApiData {
  return isRecord(value) && (value.Name === undefined || typeof value.Name === 'string');
}

function authorsOf(entitlement: EntitlementApiData): string {
  const roles = entitlement.BookMetadata?.ContributorRoles;
  if (!Array.isArray(roles)) return '';
  return roles
    .filter(isContributorRole)
    .filter(role => role.Role === 'Author' && role.Name)
    .map(role => role.Name)
    .join(' & ');
}

/**
 * Project a library sync entry onto a Book.
 *
 * Returns undefined for entries that are not a purchasable title the user
 * can download: no entitlement, saved previews and refunded (locked) titles.
 */
export function toBook(entry: LibrarySyncEntry, owner: CredentialRecord): Book | undefined {
  const entitlement = entry.NewEntitlement ?? entry.ChangedEntitlement;
  if (!entitlement) return undefined;

  const bookEntitlement = entitlement.BookEntitlement;
  if (bookEntitlement?.Accessibility === 'Preview') return undefined;
  if (bookEntitlement?.IsLocked) return undefined;

  const metadata = entitlement.BookMetadata;
  if (!metadata?.RevisionId) return undefined;

  return {
    revisionId: metadata.RevisionId,
    title: metadata.Title ?? '',
    author: authorsOf(entitlement),
    archived: bookEntitlement?.IsRemoved === true,
    owner,
  };
}

/**
 * List the user's titles as Books, skipping archived ones unless asked.
 */
export async function listBooks(
  ctx: LibraryContext,
  options: ListBooksOptions = {}
): Promise<Book[]> {
  const entries = await listOwnedBooks(ctx);
  const books: Book[] = [];

  for (const entry of entries) {
    const book = toBook(entry, ctx.credentials.record);
    if (!book) continue;
    if (book.archived && !options.includeArchived) continue;
    books.push(book);
  }

  return books;
}
