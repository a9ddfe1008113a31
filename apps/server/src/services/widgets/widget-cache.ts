/**
 * The cache shared by every widget data source
 *
 * One TtlCache holds all sources; each entry is tagged with the source that
 * produced it so readers can narrow the value without trusting the key.
 */

import type {
  CryptoPrice,
  DisasterAlert,
  Earthquake,
  HackerNewsStory,
  Headline,
  IconEntry,
  RedditPost,
  ThreatStatus,
  WeatherReport,
} from '@homelab/types';
import { TtlCache } from '../../lib/ttl-cache.js';

export type WidgetCacheValue =
  | { kind: 'weather'; data: WeatherReport }
  | { kind: 'hackernews'; data: HackerNewsStory[] }
  | { kind: 'headlines'; data: Headline[] }
  | { kind: 'reddit'; data: RedditPost[] }
  | { kind: 'crypto'; data: CryptoPrice[] }
  | { kind: 'earthquakes'; data: Earthquake[] }
  | { kind: 'disasters'; data: DisasterAlert[] }
  | { kind: 'threats'; data: ThreatStatus }
  | { kind: 'icons'; data: IconEntry[] };

export type WidgetCache = TtlCache<WidgetCacheValue>;

export function createWidgetCache(maxEntries?: number): WidgetCache {
  return new TtlCache<WidgetCacheValue>({ maxEntries });
}
