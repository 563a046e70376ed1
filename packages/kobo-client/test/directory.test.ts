/**
 * Endpoint directory tests
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { EndpointDirectory, loadEndpointDirectory } from '../src/directory.js';
import { DirectoryError, ProtocolError } from '../src/errors.js';
import { API_URL, RESOURCES, libraryContext, transport } from './fixtures.js';

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

describe('EndpointDirectory', () => {
  const directory = new EndpointDirectory(RESOURCES);

  it('should return listed URLs', () => {
    expect(directory.url('library_sync')).toBe(RESOURCES.library_sync);
  });

  it('should fill and encode the product id', () => {
    expect(directory.expand('book', 'a b/c')).toBe(`${API_URL}/v1/products/books/a%20b%2Fc`);
  });

  it('should throw DirectoryError for unlisted resources', () => {
    const empty = new EndpointDirectory({});
    expect(() => empty.url('book')).toThrow(DirectoryError);
    expect(() => empty.url('book')).toThrow("Resource 'book' is not in the endpoint directory.");
  });

  it('should not change when the source map does', () => {
    const source: Record<string, string> = { book: 'https://one.test/{ProductId}' };
    const copy = new EndpointDirectory(source);
    source.book = 'https://two.test/{ProductId}';

    expect(copy.url('book')).toBe('https://one.test/{ProductId}');
  });
});

describe('loadEndpointDirectory', () => {
  it('should keep the string resources of the initialization document', async () => {
    let authorization: string | null = null;
    server.use(
      http.get(`${API_URL}/v1/initialization`, ({ request }) => {
        authorization = request.headers.get('Authorization');
        return HttpResponse.json({
          Resources: {
            ...RESOURCES,
            image_host: 'https://images.kobo.test',
            kobo_subscriptions_enabled: false,
          },
        });
      })
    );

    const directory = await loadEndpointDirectory(transport, libraryContext().executor);

    expect(authorization).toBe('Bearer access-1');
    expect(directory.url('content_access_book')).toBe(RESOURCES.content_access_book);
    expect(directory.names).toContain('image_host');
    expect(directory.names).not.toContain('kobo_subscriptions_enabled');
  });

  it('should fail without a Resources object', async () => {
    server.use(http.get(`${API_URL}/v1/initialization`, () => HttpResponse.json({})));

    await expect(
      loadEndpointDirectory(transport, libraryContext().executor)
    ).rejects.toBeInstanceOf(ProtocolError);
  });
});
