/**
 * Content acquisition
 *
 * Resolves the encoding to download for a product, streams it beside the
 * output path and either decrypts or renames it into place. On failure
 * nothing is left at either path.
 */

import { createWriteStream } from 'node:fs';
import { rename, rm } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type {
  Book,
  ContentAccessApiResponse,
  ContentKeyApiData,
  ContentUrlApiData,
  DownloadInfo,
  DrmRemover,
  DrmType,
  TransportConfig,
  UrlFormat,
} from './types.js';
import type { LibraryContext } from './library.js';
import type { Logger } from './logger.js';
import { ProtocolError } from './errors.js';
import { send, readJson, isRecord } from './http.js';
import { DISPLAY_PROFILE, DOWNLOADING_SUFFIX, DOWNLOAD_CHUNK_SIZE } from './constants.js';

const SUPPORTED_DRM_TYPES: readonly DrmType[] = ['KDRM', 'SignedNoDrm'];
const SUPPORTED_FORMATS: readonly UrlFormat[] = ['EPUB3', 'KEPUB', 'EPUB3FL'];

function isDrmType(value: string): value is DrmType {
  return SUPPORTED_DRM_TYPES.some(type => type === value);
}

function isUrlFormat(value: string): value is UrlFormat {
  return SUPPORTED_FORMATS.some(format => format === value);
}

function isContentKey(value: unknown): value is ContentKeyApiData {
  return isRecord(value) && typeof value.Name === 'string' && typeof value.Value === 'string';
}

function isContentUrl(value: unknown): value is ContentUrlApiData {
  return (
    isRecord(value) &&
    typeof value.DRMType === 'string' &&
    typeof value.UrlFormat === 'string'
  );
}

function isContentAccessResponse(body: unknown): body is ContentAccessApiResponse {
  if (!isRecord(body)) return false;
  const { ContentKeys: keys, ContentUrls: urls } = body;
  return (
    (keys === undefined || keys === null || (Array.isArray(keys) && keys.every(isContentKey))) &&
    (urls === undefined || urls === null || (Array.isArray(urls) && urls.every(isContentUrl)))
  );
}

/**
 * Fetch the content access descriptor of a product.
 */
export async function getContentAccess(
  ctx: LibraryContext,
  productId: string,
  displayProfile = DISPLAY_PROFILE
): Promise<ContentAccessApiResponse> {
  const response = await ctx.executor.send({
    method: 'GET',
    url: ctx.directory.expand('content_access_book', productId),
    params: { DisplayProfile: displayProfile },
  });
  const body = await readJson(response);

  if (!isContentAccessResponse(body)) {
    throw new ProtocolError(`Content access response for product '${productId}' has an unexpected shape.`);
  }
  return body;
}

/**
 * Content keys by name. Archived titles come back without keys, which is
 * not an error here.
 */
export function getContentKeys(descriptor: ContentAccessApiResponse): Record<string, string> {
  const keys: Record<string, string> = {};
  for (const key of descriptor.ContentKeys ?? []) {
    keys[key.Name] = key.Value;
  }
  return keys;
}

/**
 * Pick the first content URL, in server order, with a supported DRM type
 * and format.
 */
export function selectDownload(
  productId: string,
  descriptor: ContentAccessApiResponse
): DownloadInfo {
  const urls: ContentUrlApiData[] | null | undefined = descriptor.ContentUrls;

  if (!urls) {
    throw new ProtocolError(`Download URL can't be found for product '${productId}'.`);
  }

  if (urls.length === 0) {
    throw new ProtocolError(
      `Download URL list is empty for product '${productId}'. ` +
        'If this is an archived book then it must be unarchived first on the Kobo website ' +
        '(https://www.kobo.com/help/en-US/article/1799/restoring-deleted-books-or-magazines).'
    );
  }

  for (const url of urls) {
    const { DRMType: drmType, UrlFormat: urlFormat } = url;
    if (isDrmType(drmType) && isUrlFormat(urlFormat)) {
      if (typeof url.DownloadUrl !== 'string' || url.DownloadUrl.length === 0) {
        throw new ProtocolError(
          `Download URL is missing from the ${drmType} ${urlFormat} entry of product '${productId}'.`
        );
      }
      return {
        downloadUrl: url.DownloadUrl,
        drmType,
        urlFormat,
        hasDrm: drmType === 'KDRM',
      };
    }
  }

  const available = urls
    .map(url => `\nDRMType: '${url.DRMType}', UrlFormat: '${url.UrlFormat}'`)
    .join('');
  throw new ProtocolError(
    `Download URL for supported formats can't be found for product '${productId}'.\n` +
      `Available formats:${available}`
  );
}

/**
 * Stream a URL to a file in fixed-size buffered writes.
 */
export async function downloadToFile(
  config: TransportConfig,
  url: string,
  outputPath: string
): Promise<void> {
  const response = await send(config, { method: 'GET', url });
  if (!response.body) {
    throw new ProtocolError(`Download from '${url}' returned no body.`);
  }

  await pipeline(
    Readable.fromWeb(response.body),
    createWriteStream(outputPath, { highWaterMark: DOWNLOAD_CHUNK_SIZE })
  );
}

/**
 * Download a product to `outputPath`.
 *
 * KDRM artifacts go through the DRM remover with the device and user
 * identity; SignedNoDrm artifacts are renamed into place as downloaded.
 *
 * @returns The output path
 */
export async function downloadBook(
  ctx: LibraryContext,
  config: TransportConfig,
  drmRemover: DrmRemover | undefined,
  productId: string,
  outputPath: string
): Promise<string> {
  const descriptor = await getContentAccess(ctx, productId);
  const contentKeys = getContentKeys(descriptor);
  const info = selectDownload(productId, descriptor);

  if (info.hasDrm && !drmRemover) {
    throw new ProtocolError(
      `Product '${productId}' is protected with ${info.drmType} and no DRM remover is configured.`
    );
  }

  ctx.log.info('Downloading', {
    productId,
    drmType: info.drmType,
    urlFormat: info.urlFormat,
    contentKeys: Object.keys(contentKeys).length,
  });

  const temporaryPath = outputPath + DOWNLOADING_SUFFIX;
  const { deviceId, userId } = ctx.credentials.record;

  try {
    await downloadToFile(config, info.downloadUrl, temporaryPath);

    if (drmRemover && info.hasDrm) {
      await drmRemover.removeDrm({
        inputPath: temporaryPath,
        outputPath,
        deviceId,
        userId,
        contentKeys,
      });
      await rm(temporaryPath);
    } else {
      await rename(temporaryPath, outputPath);
    }
  } catch (error) {
    await removePartialOutput([temporaryPath, outputPath], ctx.log);
    throw error;
  }

  ctx.log.info('Downloaded', { productId, outputPath });
  return outputPath;
}

async function removePartialOutput(paths: string[], log: Logger): Promise<void> {
  for (const path of paths) {
    try {
      await rm(path, { force: true });
    } catch (cleanupError) {
      // Logged only, the download error is rethrown
      log.error('Could not remove partial download', { path, error: String(cleanupError) });
    }
  }
}

/**
 * File name for a downloaded book: "Author - Title.epub".
 */
export function suggestFileName(book: Pick<Book, 'author' | 'title'>): string {
  const base = book.author ? `${book.author} - ${book.title}` : book.title;
  const safe = base.replace(/[\\/:*?"<>|\u0000-\u001f]/g, '_').trim();
  return `${safe || 'book'}.epub`;
}
