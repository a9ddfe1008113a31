import { describe, it, expect } from 'vitest';
import type { IntegrationConfig } from '@homelab/types';
import { fetchAudiobookshelfStats } from '@/services/integrations/audiobookshelf.js';
import { FakeHttp } from '../../../helpers/fake-http.js';

const config: IntegrationConfig = { enabled: true, url: 'http://abs.lan', api_key: 'test-key' };

const libraries = {
  libraries: [
    { id: 'pod1', name: 'Podcasts', mediaType: 'podcast' },
    { id: 'lib 1', name: 'Books', mediaType: 'book' },
  ],
};

describe('audiobookshelf.ts', () => {
  it('should list recent items of the first book library', async () => {
    const http = new FakeHttp()
      .on('http://abs.lan/api/libraries', { json: libraries })
      .on('http://abs.lan/api/libraries/lib%201/items', {
        json: {
          total: 42,
          results: [
            {
              id: 'li_1',
              addedAt: 1700000000000,
              media: { duration: 3600.5, metadata: { title: 'Book One', authorName: 'Author A' } },
            },
            {
              id: 'li_2',
              name: 'Fallback Name',
              media: { metadata: { authors: [{ name: 'Author B' }] } },
            },
          ],
        },
      });

    const result = await fetchAudiobookshelfStats(config, { http: http.client, verifySsl: true });

    expect(result).toEqual({
      ok: true,
      data: {
        total_books: 42,
        library_name: 'Books',
        recent_books: [
          {
            title: 'Book One',
            author: 'Author A',
            cover: 'http://abs.lan/api/items/li_1/cover?token=test-key',
            added_at: 1700000000000,
            duration: 3600.5,
          },
          {
            title: 'Fallback Name',
            author: 'Author B',
            cover: 'http://abs.lan/api/items/li_2/cover?token=test-key',
            added_at: null,
            duration: 0,
          },
        ],
      },
    });
    expect(http.urls()[1]).toBe(
      'http://abs.lan/api/libraries/lib%201/items?sort=addedAt&desc=1&limit=5&minified=1'
    );
    expect(http.requests[1].options.headers).toEqual({ Authorization: 'Bearer test-key' });
  });

  it('should keep the library name when its items cannot be listed', async () => {
    const http = new FakeHttp()
      .on('http://abs.lan/api/libraries', { json: libraries })
      .on('http://abs.lan/api/libraries/lib%201/items', { status: 500 });

    const result = await fetchAudiobookshelfStats(config, { http: http.client, verifySsl: true });

    expect(result).toEqual({
      ok: true,
      data: { total_books: 0, recent_books: [], library_name: 'Books' },
    });
  });

  it('should report an unknown library when there are no book libraries', async () => {
    const http = new FakeHttp().on('http://abs.lan/api/libraries', {
      json: { libraries: [libraries.libraries[0]] },
    });

    const result = await fetchAudiobookshelfStats(config, { http: http.client, verifySsl: true });

    expect(result).toEqual({
      ok: true,
      data: { total_books: 0, recent_books: [], library_name: 'Unknown' },
    });
  });
});
