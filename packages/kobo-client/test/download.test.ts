/**
 * Content acquisition tests
 */

import { describe, it, expect, vi, beforeAll, afterAll, afterEach, beforeEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  downloadBook,
  getContentKeys,
  selectDownload,
  suggestFileName,
} from '../src/download.js';
import { ProtocolError, TransportError } from '../src/errors.js';
import type { ContentUrlApiData, DrmRemovalRequest, DrmRemover } from '../src/types.js';
import { API_URL, CDN_URL, libraryContext, transport } from './fixtures.js';

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

const ACCESS_URL = `${API_URL}/v1/products/prod-1/access`;
const FILE_URL = `${CDN_URL}/files/prod-1.epub`;

function contentUrl(
  drmType: string,
  urlFormat: string,
  downloadUrl: string | null = FILE_URL
): ContentUrlApiData {
  return { DRMType: drmType, UrlFormat: urlFormat, DownloadUrl: downloadUrl };
}

describe('selectDownload', () => {
  it('should pick the first supported entry in server order', () => {
    const info = selectDownload('prod-1', {
      ContentUrls: [
        contentUrl('AdobeDrm', 'PDF', `${CDN_URL}/a.pdf`),
        contentUrl('SignedNoDrm', 'EPUB3', `${CDN_URL}/b.epub`),
        contentUrl('KDRM', 'KEPUB', `${CDN_URL}/c.kepub`),
      ],
    });

    expect(info).toEqual({
      downloadUrl: `${CDN_URL}/b.epub`,
      drmType: 'SignedNoDrm',
      urlFormat: 'EPUB3',
      hasDrm: false,
    });
  });

  it('should skip unsupported entries that carry no download URL', () => {
    const info = selectDownload('prod-1', {
      ContentUrls: [
        contentUrl('AdobeDrm', 'PDF', null),
        contentUrl('SignedNoDrm', 'EPUB3', `${CDN_URL}/b.epub`),
      ],
    });

    expect(info.downloadUrl).toBe(`${CDN_URL}/b.epub`);
  });

  it('should fail when the selected entry has no download URL', () => {
    expect(() =>
      selectDownload('prod-1', { ContentUrls: [contentUrl('SignedNoDrm', 'KEPUB', null)] })
    ).toThrow("Download URL is missing from the SignedNoDrm KEPUB entry of product 'prod-1'.");
  });

  it('should flag KDRM entries as protected', () => {
    const info = selectDownload('prod-1', { ContentUrls: [contentUrl('KDRM', 'EPUB3FL')] });

    expect(info.hasDrm).toBe(true);
    expect(info.urlFormat).toBe('EPUB3FL');
  });

  it('should point at unarchiving when the list is empty', () => {
    expect(() => selectDownload('prod-1', { ContentUrls: [] })).toThrow(
      "Download URL list is empty for product 'prod-1'. If this is an archived book"
    );
  });

  it('should fail when the list is missing', () => {
    expect(() => selectDownload('prod-1', {})).toThrow(
      "Download URL can't be found for product 'prod-1'."
    );
  });

  it('should list every available format when none is supported', () => {
    const descriptor = {
      ContentUrls: [contentUrl('AdobeDrm', 'EPUB3'), contentUrl('None', 'PDF')],
    };

    expect(() => selectDownload('prod-1', descriptor)).toThrow(
      "Download URL for supported formats can't be found for product 'prod-1'.\n" +
        'Available formats:\n' +
        "DRMType: 'AdobeDrm', UrlFormat: 'EPUB3'\n" +
        "DRMType: 'None', UrlFormat: 'PDF'"
    );
  });
});

describe('getContentKeys', () => {
  it('should map keys by name', () => {
    expect(
      getContentKeys({
        ContentKeys: [
          { Name: 'OEBPS/chapter1.xhtml', Value: 'key-a' },
          { Name: 'OEBPS/chapter2.xhtml', Value: 'key-b' },
        ],
      })
    ).toEqual({ 'OEBPS/chapter1.xhtml': 'key-a', 'OEBPS/chapter2.xhtml': 'key-b' });
  });

  it('should return an empty map without keys', () => {
    expect(getContentKeys({})).toEqual({});
    expect(getContentKeys({ ContentKeys: null })).toEqual({});
  });
});

describe('downloadBook', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kobo-download-'));
    outputPath = join(dir, 'book.epub');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function serveAccess(drmType: string, keys = [{ Name: 'OEBPS/chapter1.xhtml', Value: 'key-a' }]) {
    let displayProfile: string | null = null;
    server.use(
      http.get(ACCESS_URL, ({ request }) => {
        displayProfile = new URL(request.url).searchParams.get('DisplayProfile');
        return HttpResponse.json({
          ContentKeys: keys,
          ContentUrls: [contentUrl(drmType, 'EPUB3')],
        });
      })
    );
    return () => displayProfile;
  }

  it('should rename an unprotected download into place', async () => {
    const displayProfile = serveAccess('SignedNoDrm');
    server.use(http.get(FILE_URL, () => new HttpResponse('signed epub bytes')));

    const result = await downloadBook(libraryContext(), transport, undefined, 'prod-1', outputPath);

    expect(result).toBe(outputPath);
    expect(displayProfile()).toBe('Android');
    expect(await readFile(outputPath, 'utf8')).toBe('signed epub bytes');
    expect(existsSync(`${outputPath}.downloading`)).toBe(false);
  });

  it('should hand KDRM downloads to the DRM remover', async () => {
    serveAccess('KDRM');
    server.use(http.get(FILE_URL, () => new HttpResponse('encrypted bytes')));

    const requests: DrmRemovalRequest[] = [];
    const drmRemover: DrmRemover = {
      async removeDrm(request) {
        requests.push(request);
        const encrypted = await readFile(request.inputPath, 'utf8');
        await writeFile(request.outputPath, `decrypted ${encrypted}`);
      },
    };

    await downloadBook(libraryContext(), transport, drmRemover, 'prod-1', outputPath);

    expect(requests).toEqual([
      {
        inputPath: `${outputPath}.downloading`,
        outputPath,
        deviceId: 'device-1',
        userId: 'user-1',
        contentKeys: { 'OEBPS/chapter1.xhtml': 'key-a' },
      },
    ]);
    expect(await readFile(outputPath, 'utf8')).toBe('decrypted encrypted bytes');
    expect(existsSync(`${outputPath}.downloading`)).toBe(false);
  });

  it('should remove both paths and rethrow when DRM removal fails', async () => {
    serveAccess('KDRM');
    server.use(http.get(FILE_URL, () => new HttpResponse('encrypted bytes')));

    const failure = new Error('bad content key');
    const drmRemover: DrmRemover = {
      async removeDrm(request) {
        await writeFile(request.outputPath, 'partial');
        throw failure;
      },
    };

    await expect(
      downloadBook(libraryContext(), transport, drmRemover, 'prod-1', outputPath)
    ).rejects.toBe(failure);
    expect(existsSync(outputPath)).toBe(false);
    expect(existsSync(`${outputPath}.downloading`)).toBe(false);
  });

  it('should leave nothing behind when the artifact request fails', async () => {
    serveAccess('SignedNoDrm');
    server.use(http.get(FILE_URL, () => new HttpResponse('gone', { status: 410 })));

    const error = await downloadBook(libraryContext(), transport, undefined, 'prod-1', outputPath)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 410, url: FILE_URL });
    expect(existsSync(outputPath)).toBe(false);
    expect(existsSync(`${outputPath}.downloading`)).toBe(false);
  });

  it('should download past an unsupported entry whose URL is null', async () => {
    server.use(
      http.get(ACCESS_URL, () =>
        HttpResponse.json({
          ContentKeys: [],
          ContentUrls: [
            { DRMType: 'AdobeDrm', UrlFormat: 'PDF', DownloadUrl: null },
            contentUrl('SignedNoDrm', 'EPUB3'),
          ],
        })
      ),
      http.get(FILE_URL, () => new HttpResponse('signed epub bytes'))
    );

    await downloadBook(libraryContext(), transport, undefined, 'prod-1', outputPath);

    expect(await readFile(outputPath, 'utf8')).toBe('signed epub bytes');
  });

  it('should remove the partly written file when the body fails mid-transfer', async () => {
    serveAccess('SignedNoDrm');
    const encoder = new TextEncoder();
    let pulls = 0;
    server.use(
      http.get(FILE_URL, () => {
        const body = new ReadableStream<Uint8Array>({
          pull(controller) {
            pulls++;
            if (pulls === 1) {
              controller.enqueue(encoder.encode('first half of the book'));
            } else {
              controller.error(new Error('connection reset'));
            }
          },
        });
        return new HttpResponse(body);
      })
    );

    await expect(
      downloadBook(libraryContext(), transport, undefined, 'prod-1', outputPath)
    ).rejects.toThrow();
    expect(pulls).toBeGreaterThan(1);
    expect(existsSync(outputPath)).toBe(false);
    expect(existsSync(`${outputPath}.downloading`)).toBe(false);
  });

  it('should refuse KDRM titles without a DRM remover before downloading', async () => {
    serveAccess('KDRM');
    const fileRequest = vi.fn(() => new HttpResponse('encrypted bytes'));
    server.use(http.get(FILE_URL, fileRequest));

    await expect(
      downloadBook(libraryContext(), transport, undefined, 'prod-1', outputPath)
    ).rejects.toBeInstanceOf(ProtocolError);
    expect(fileRequest).not.toHaveBeenCalled();
    expect(existsSync(outputPath)).toBe(false);
  });

  it('should fail for archived titles without touching the filesystem', async () => {
    server.use(
      http.get(ACCESS_URL, () => HttpResponse.json({ ContentKeys: null, ContentUrls: [] }))
    );

    await expect(
      downloadBook(libraryContext(), transport, undefined, 'prod-1', outputPath)
    ).rejects.toThrow(/archived/);
    expect(existsSync(outputPath)).toBe(false);
  });
});

describe('suggestFileName', () => {
  it('should join author and title', () => {
    expect(suggestFileName({ author: 'Ada Writer', title: 'Notes' })).toBe('Ada Writer - Notes.epub');
  });

  it('should replace path separators and reserved characters', () => {
    expect(suggestFileName({ author: '', title: 'What/Why: A "Primer"?' })).toBe(
      'What_Why_ A _Primer__.epub'
    );
  });
});
