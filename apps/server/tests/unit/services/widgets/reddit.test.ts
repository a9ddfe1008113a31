import { describe, it, expect } from 'vitest';
import {
  fetchRedditTop,
  parseRedditPosts,
  sanitizeSubreddit,
  timeAgo,
} from '@/services/widgets/reddit.js';
import { FakeHttp } from '../../../helpers/fake-http.js';

const NOW = 1_700_000_000;

describe('reddit.ts', () => {
  it('should accept only valid subreddit names', () => {
    expect(sanitizeSubreddit('selfhosted')).toBe('selfhosted');
    expect(sanitizeSubreddit('home_lab')).toBe('home_lab');
    expect(sanitizeSubreddit('a')).toBe('technology');
    expect(sanitizeSubreddit('../admin')).toBe('technology');
    expect(sanitizeSubreddit(undefined)).toBe('technology');
  });

  it('should describe ages relative to now', () => {
    expect(timeAgo(NOW - 30, NOW)).toBe('just now');
    expect(timeAgo(NOW - 90, NOW)).toBe('1m ago');
    expect(timeAgo(NOW - 7200, NOW)).toBe('2h ago');
    expect(timeAgo(NOW - 3 * 86400, NOW)).toBe('3d ago');
  });

  it('should skip stickied posts and apply the limit', () => {
    const payload = {
      data: {
        children: [
          { data: { title: 'Rules', stickied: true } },
          {
            data: {
              title: 'Home server tour',
              url: 'https://i.example/1.jpg',
              score: 420,
              num_comments: 37,
              subreddit: 'homelab',
              permalink: '/r/homelab/comments/1/',
              created_utc: NOW - 7200,
            },
          },
          { data: { title: 'No date', permalink: '/r/homelab/comments/2/' } },
          { data: { title: 'Over the limit' } },
        ],
      },
    };

    expect(parseRedditPosts(payload, 'homelab', 2, NOW)).toEqual([
      {
        title: 'Home server tour',
        url: 'https://i.example/1.jpg',
        score: 420,
        comments: 37,
        subreddit: 'homelab',
        reddit_url: 'https://reddit.com/r/homelab/comments/1/',
        time_ago: '2h ago',
      },
      {
        title: 'No date',
        url: '',
        score: 0,
        comments: 0,
        subreddit: 'homelab',
        reddit_url: 'https://reddit.com/r/homelab/comments/2/',
        time_ago: '',
      },
    ]);
  });

  it('should ask for extra posts to cover stickied ones', async () => {
    const http = new FakeHttp().on('https://www.reddit.com/r/selfhosted/', {
      json: { data: { children: [] } },
    });

    expect(await fetchRedditTop(http.client, 'selfhosted', 5)).toEqual([]);
    expect(http.urls()).toEqual(['https://www.reddit.com/r/selfhosted/hot.json?limit=10']);
  });
});
