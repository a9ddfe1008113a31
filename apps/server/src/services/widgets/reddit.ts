/**
 * Hot posts from a subreddit (public JSON, no API key)
 */

import type { RedditPost } from '@homelab/types';
import { requestJson, type HttpClient } from '../../lib/http-client.js';
import {
  asObject,
  getArray,
  getBoolean,
  getNumber,
  getObject,
  getString,
  objects,
} from '../../lib/json.js';

export const DEFAULT_SUBREDDIT = 'technology';

const SUBREDDIT_PATTERN = /^[A-Za-z0-9_]{2,21}$/;

const TITLE_MAX_LENGTH = 100;

/** A usable subreddit name, or the default one */
export function sanitizeSubreddit(name: string | undefined): string {
  return name && SUBREDDIT_PATTERN.test(name) ? name : DEFAULT_SUBREDDIT;
}

/**
 * Relative age of a unix timestamp (seconds)
 *
 * @example
 * timeAgo(now - 30, now)   // => 'just now'
 * timeAgo(now - 7200, now) // => '2h ago'
 */
export function timeAgo(timestamp: number, nowSeconds: number = Date.now() / 1000): string {
  const diff = nowSeconds - timestamp;
  if (diff < 60) return 'just now';
  if (diff < 3600) return `${Math.trunc(diff / 60)}m ago`;
  if (diff < 86400) return `${Math.trunc(diff / 3600)}h ago`;
  return `${Math.trunc(diff / 86400)}d ago`;
}

export function parseRedditPosts(
  payload: unknown,
  subreddit: string,
  limit: number,
  nowSeconds?: number
): RedditPost[] {
  const children = objects(getArray(getObject(asObject(payload), 'data'), 'children'));
  const posts: RedditPost[] = [];

  for (const child of children) {
    const post = getObject(child, 'data');
    if (getBoolean(post, 'stickied')) continue;

    const created = getNumber(post, 'created_utc');
    posts.push({
      title: getString(post, 'title').slice(0, TITLE_MAX_LENGTH),
      url: getString(post, 'url'),
      score: getNumber(post, 'score'),
      comments: getNumber(post, 'num_comments'),
      subreddit: getString(post, 'subreddit', subreddit),
      reddit_url: `https://reddit.com${getString(post, 'permalink')}`,
      time_ago: created ? timeAgo(created, nowSeconds) : '',
    });
  }
  return posts.slice(0, limit);
}

export async function fetchRedditTop(
  http: HttpClient,
  subreddit: string,
  limit: number
): Promise<RedditPost[]> {
  // Extra posts make up for stickied ones
  const path = `/r/${encodeURIComponent(subreddit)}/hot.json?limit=${limit + 5}`;
  const payload = await requestJson(http, `https://www.reddit.com${path}`, { timeoutMs: 5000 });
  return parseRedditPosts(payload, subreddit, limit);
}
