/**
 * Widget Service - Public-API widget data behind the shared cache
 *
 * Every method returns a FetchResult and never throws. A fetch that fails
 * while a stale entry exists serves the stale entry; with nothing cached
 * the result is `unavailable`.
 */

import {
  fetchFailed,
  fetchOk,
  MARKET_CACHE_TTL_MS,
  NEWS_CACHE_TTL_MS,
  SEISMIC_CACHE_TTL_MS,
  WEATHER_CACHE_TTL_MS,
  type CryptoPrice,
  type DisasterAlert,
  type Earthquake,
  type FetchResult,
  type HackerNewsStory,
  type Headline,
  type RedditPost,
  type ThreatStatus,
  type WeatherReport,
} from '@homelab/types';
import { undiciClient, type HttpClient } from '../../lib/http-client.js';
import { createWidgetCache, type WidgetCache } from './widget-cache.js';
import { DEFAULT_COORDINATES, fetchWeather } from './weather.js';
import { fetchHackerNews, fetchHeadlines } from './news.js';
import { DEFAULT_SUBREDDIT, fetchRedditTop } from './reddit.js';
import { DEFAULT_COINS, fetchCryptoPrices } from './crypto.js';
import {
  buildThreatStatus,
  DEFAULT_MIN_MAGNITUDE,
  fetchDisasterAlerts,
  fetchEarthquakes,
} from './security.js';

export interface WeatherQuery {
  city?: string;
  lat?: number;
  lon?: number;
}

export interface WidgetServiceOptions {
  cache?: WidgetCache;
  http?: HttpClient;
}

function unavailable<T>(): FetchResult<T> {
  return fetchFailed('unavailable');
}

export class WidgetService {
  readonly cache: WidgetCache;
  private readonly http: HttpClient;

  constructor(options: WidgetServiceOptions = {}) {
    this.cache = options.cache ?? createWidgetCache();
    this.http = options.http ?? undiciClient;
  }

  /**
   * Current weather. Without both coordinates the default location is used
   * and the city name (or "auto") keys the cache.
   */
  async getWeather(query: WeatherQuery = {}): Promise<FetchResult<WeatherReport>> {
    const city = query.city || 'auto';
    const { lat, lon } = query;
    const hasCoordinates = lat !== undefined && lon !== undefined;
    const lookup = hasCoordinates ? { lat, lon } : DEFAULT_COORDINATES;
    const key = hasCoordinates ? `weather_${lookup.lat}_${lookup.lon}` : `weather_${city}`;
    const label = city !== 'auto' ? city : `${lookup.lat.toFixed(2)}, ${lookup.lon.toFixed(2)}`;

    const value = await this.cache.getOrFetch(
      key,
      async () => ({
        kind: 'weather',
        data: await fetchWeather(this.http, lookup.lat, lookup.lon, label),
      }),
      WEATHER_CACHE_TTL_MS
    );
    return value?.kind === 'weather' ? fetchOk(value.data) : unavailable();
  }

  async getHackerNews(limit = 5): Promise<FetchResult<HackerNewsStory[]>> {
    const value = await this.cache.getOrFetch(
      `hackernews_${limit}`,
      async () => ({ kind: 'hackernews', data: await fetchHackerNews(this.http, limit) }),
      NEWS_CACHE_TTL_MS
    );
    return value?.kind === 'hackernews' ? fetchOk(value.data) : unavailable();
  }

  async getHeadlines(limit = 10): Promise<FetchResult<Headline[]>> {
    const value = await this.cache.getOrFetch(
      `headlines_${limit}`,
      async () => ({ kind: 'headlines', data: await fetchHeadlines(this.http, limit) }),
      NEWS_CACHE_TTL_MS
    );
    return value?.kind === 'headlines' ? fetchOk(value.data) : unavailable();
  }

  async getRedditTop(
    subreddit: string = DEFAULT_SUBREDDIT,
    limit = 5
  ): Promise<FetchResult<RedditPost[]>> {
    const value = await this.cache.getOrFetch(
      `reddit_${subreddit}_${limit}`,
      async () => ({ kind: 'reddit', data: await fetchRedditTop(this.http, subreddit, limit) }),
      NEWS_CACHE_TTL_MS
    );
    return value?.kind === 'reddit' ? fetchOk(value.data) : unavailable();
  }

  async getCryptoPrices(coins: string[] = DEFAULT_COINS): Promise<FetchResult<CryptoPrice[]>> {
    const value = await this.cache.getOrFetch(
      `crypto_${coins.join(',')}`,
      async () => ({ kind: 'crypto', data: await fetchCryptoPrices(this.http, coins) }),
      MARKET_CACHE_TTL_MS
    );
    return value?.kind === 'crypto' ? fetchOk(value.data) : unavailable();
  }

  async getEarthquakes(
    minMagnitude: number = DEFAULT_MIN_MAGNITUDE
  ): Promise<FetchResult<Earthquake[]>> {
    const value = await this.cache.getOrFetch(
      `usgs_earthquakes_${minMagnitude}`,
      async () => ({ kind: 'earthquakes', data: await fetchEarthquakes(this.http, minMagnitude) }),
      SEISMIC_CACHE_TTL_MS
    );
    return value?.kind === 'earthquakes' ? fetchOk(value.data) : unavailable();
  }

  async getDisasterAlerts(): Promise<FetchResult<DisasterAlert[]>> {
    const value = await this.cache.getOrFetch(
      'gdacs_alerts',
      async () => ({ kind: 'disasters', data: await fetchDisasterAlerts(this.http) }),
      NEWS_CACHE_TTL_MS
    );
    return value?.kind === 'disasters' ? fetchOk(value.data) : unavailable();
  }

  /**
   * Aggregate threat level from the quake and disaster feeds (each read
   * through its own cache entry)
   */
  async getThreatStatus(): Promise<FetchResult<ThreatStatus>> {
    const value = await this.cache.getOrFetch(
      'threat_status',
      async () => {
        const [quakes, disasters] = await Promise.all([
          this.getEarthquakes(DEFAULT_MIN_MAGNITUDE),
          this.getDisasterAlerts(),
        ]);
        return {
          kind: 'threats',
          data: buildThreatStatus(
            quakes.ok ? quakes.data : null,
            disasters.ok ? disasters.data : null
          ),
        };
      },
      SEISMIC_CACHE_TTL_MS
    );
    return value?.kind === 'threats' ? fetchOk(value.data) : unavailable();
  }
}
