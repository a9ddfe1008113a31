/**
 * Hacker News top stories and the world headlines ticker
 */

import type { HackerNewsStory, Headline } from '@homelab/types';
import { createLogger, getErrorMessage } from '@homelab/utils';
import { requestJson, type HttpClient } from '../../lib/http-client.js';
import {
  asObject,
  getArray,
  getBoolean,
  getNumber,
  getObject,
  getString,
  objects,
  toNumber,
  type JsonObject,
} from '../../lib/json.js';

const logger = createLogger('NewsWidget');

const HN_API = 'https://hacker-news.firebaseio.com/v0';
const WORLDNEWS_URL = 'https://www.reddit.com/r/worldnews/hot.json?limit=15';

const LIST_TIMEOUT_MS = 5000;
const ITEM_TIMEOUT_MS = 3000;

/** Minimum scores for a story to make the headlines ticker */
export const REDDIT_HEADLINE_MIN_SCORE = 1000;
export const HN_HEADLINE_MIN_SCORE = 100;

const HEADLINE_MAX_LENGTH = 120;

interface StoryItem {
  id: number;
  item: JsonObject;
}

export function hackerNewsItemUrl(id: number): string {
  return `https://news.ycombinator.com/item?id=${id}`;
}

async function fetchTopStoryIds(http: HttpClient, limit: number): Promise<number[]> {
  const ids = await requestJson(http, `${HN_API}/topstories.json`, { timeoutMs: LIST_TIMEOUT_MS });
  if (!Array.isArray(ids)) return [];
  return ids.map((id) => toNumber(id, -1)).filter((id) => id >= 0).slice(0, limit);
}

/**
 * Fetch items in parallel; an item that fails to load is left out
 */
async function fetchItems(http: HttpClient, ids: number[]): Promise<StoryItem[]> {
  const results = await Promise.all(
    ids.map(async (id): Promise<StoryItem | null> => {
      try {
        const item = await requestJson(http, `${HN_API}/item/${id}.json`, {
          timeoutMs: ITEM_TIMEOUT_MS,
        });
        return { id, item: asObject(item) };
      } catch (error) {
        logger.debug(`HN item ${id} failed:`, getErrorMessage(error));
        return null;
      }
    })
  );
  return results.filter((result): result is StoryItem => result !== null);
}

export async function fetchHackerNews(http: HttpClient, limit: number): Promise<HackerNewsStory[]> {
  const ids = await fetchTopStoryIds(http, limit);
  const items = await fetchItems(http, ids);

  return items.map(({ id, item }) => ({
    title: getString(item, 'title'),
    url: getString(item, 'url', hackerNewsItemUrl(id)),
    score: getNumber(item, 'score'),
    comments: getNumber(item, 'descendants'),
    hn_url: hackerNewsItemUrl(id),
  }));
}

/**
 * Popular r/worldnews posts, linking to the article rather than the thread
 */
export function parseWorldNews(payload: unknown): Headline[] {
  const children = objects(getArray(getObject(asObject(payload), 'data'), 'children'));
  const headlines: Headline[] = [];

  for (const child of children) {
    const post = getObject(child, 'data');
    if (getBoolean(post, 'stickied') || getNumber(post, 'score') <= REDDIT_HEADLINE_MIN_SCORE) {
      continue;
    }
    let url = getString(post, 'url');
    if (!url || url.includes('reddit.com')) {
      url = `https://reddit.com${getString(post, 'permalink')}`;
    }
    headlines.push({
      title: getString(post, 'title').slice(0, HEADLINE_MAX_LENGTH),
      url,
      source: 'Reddit',
    });
  }
  return headlines;
}

async function fetchWorldNews(http: HttpClient): Promise<Headline[]> {
  const payload = await requestJson(http, WORLDNEWS_URL, { timeoutMs: LIST_TIMEOUT_MS });
  return parseWorldNews(payload);
}

async function fetchHackerNewsHeadlines(http: HttpClient): Promise<Headline[]> {
  const items = await fetchItems(http, await fetchTopStoryIds(http, 5));
  return items
    .filter(({ item }) => getNumber(item, 'score') > HN_HEADLINE_MIN_SCORE)
    .map(({ id, item }) => ({
      title: getString(item, 'title').slice(0, HEADLINE_MAX_LENGTH),
      url: getString(item, 'url', hackerNewsItemUrl(id)),
      source: 'HN' as const,
    }));
}

/**
 * Reddit worldnews followed by the top HN stories. Either source may fail on
 * its own; the call only fails when neither yields a headline.
 */
export async function fetchHeadlines(http: HttpClient, limit: number): Promise<Headline[]> {
  const sources: Array<[string, (client: HttpClient) => Promise<Headline[]>]> = [
    ['Reddit', fetchWorldNews],
    ['HN', fetchHackerNewsHeadlines],
  ];

  const headlines: Headline[] = [];
  for (const [name, fetchSource] of sources) {
    try {
      headlines.push(...(await fetchSource(http)));
    } catch (error) {
      logger.warn(`${name} headlines failed:`, getErrorMessage(error));
    }
  }

  if (headlines.length === 0) {
    throw new Error('No headlines available');
  }
  return headlines.slice(0, limit);
}
