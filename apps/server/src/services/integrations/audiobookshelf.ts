/**
 * Audiobookshelf: recently added books from the first book library
 */

import type {
  AudiobookshelfBook,
  AudiobookshelfStats,
  FetchResult,
  IntegrationConfig,
} from '@homelab/types';
import { requestJson } from '../../lib/http-client.js';
import {
  asObject,
  getArray,
  getNumber,
  getObject,
  getString,
  objects,
  type JsonObject,
} from '../../lib/json.js';
import { requestOptions, runIntegration, type IntegrationContext } from './common.js';

const RECENT_LIMIT = 5;

function authorOf(metadata: JsonObject): string {
  const authorName = getString(metadata, 'authorName');
  if (authorName) return authorName;
  const [firstAuthor] = objects(getArray(metadata, 'authors'));
  return firstAuthor ? getString(firstAuthor, 'name', 'Unknown') : 'Unknown';
}

export function parseBook(item: JsonObject, baseUrl: string, apiKey: string): AudiobookshelfBook {
  const media = getObject(item, 'media');
  const metadata = getObject(media, 'metadata');
  const id = encodeURIComponent(getString(item, 'id'));
  const addedAt = item['addedAt'];

  return {
    title: getString(metadata, 'title') || getString(item, 'name'),
    author: authorOf(metadata),
    cover: `${baseUrl}/api/items/${id}/cover?token=${encodeURIComponent(apiKey)}`,
    added_at: typeof addedAt === 'number' ? addedAt : null,
    duration: getNumber(media, 'duration'),
  };
}

export function fetchAudiobookshelfStats(
  config: IntegrationConfig,
  context: IntegrationContext
): Promise<FetchResult<AudiobookshelfStats>> {
  return runIntegration('audiobookshelf', config, ['url', 'api_key'], async (baseUrl) => {
    const apiKey = config.api_key ?? '';
    const options = requestOptions(context, {
      headers: { Authorization: `Bearer ${apiKey}` },
      timeoutMs: 5000,
    });

    const librariesPayload = await requestJson(context.http, `${baseUrl}/api/libraries`, options);
    const libraries = objects(getArray(asObject(librariesPayload), 'libraries'));
    const library = libraries.find((candidate) => getString(candidate, 'mediaType') === 'book');
    if (!library) {
      return { total_books: 0, recent_books: [], library_name: 'Unknown' };
    }

    const params = new URLSearchParams({
      sort: 'addedAt',
      desc: '1',
      limit: String(RECENT_LIMIT),
      minified: '1',
    });
    const libraryId = encodeURIComponent(getString(library, 'id'));
    const response = await context.http(
      `${baseUrl}/api/libraries/${libraryId}/items?${params.toString()}`,
      options
    );

    // The library exists even when its item listing fails
    let items: JsonObject[] = [];
    let total = 0;
    if (response.status === 200) {
      const data = asObject(await response.json());
      items = objects(getArray(data, 'results'));
      total = getNumber(data, 'total');
    } else {
      await response.discard();
    }

    return {
      total_books: total,
      recent_books: items.map((item) => parseBook(item, baseUrl, apiKey)),
      library_name: getString(library, 'name', 'Unknown'),
    };
  });
}
