/**
 * Cache configuration types and TTL constants for widget data sources.
 *
 * TTLs are chosen per upstream based on how frequently the data changes and
 * how strict the free API is about request volume:
 *
 * - **Market**: Short TTL: crypto prices move constantly
 * - **Seismic**: Short TTL: earthquake feeds and the threat aggregate
 * - **News**: Medium TTL: headline lists reorder slowly
 * - **Weather**: Long TTL: forecasts refresh a few times an hour upstream
 * - **Icons**: Very long TTL: the icon index changes a few times a week
 */

// ---------------------------------------------------------------------------
// Cache options type
// ---------------------------------------------------------------------------

/**
 * Configuration options for the shared TTL/LRU cache.
 */
export interface CacheOptions {
  /** Time-to-live in milliseconds used when a call does not pass its own */
  defaultTtl?: number;
  /** Maximum number of entries before least-recently-used eviction (default: 50) */
  maxEntries?: number;
}

// ---------------------------------------------------------------------------
// TTL constants (milliseconds)
// ---------------------------------------------------------------------------

/** Fallback TTL when a caller passes none (5 minutes) */
export const DEFAULT_CACHE_TTL_MS = 5 * 60_000;

/** Default capacity of the widget cache */
export const DEFAULT_CACHE_MAX_ENTRIES = 50;

/**
 * Cache TTL for crypto prices (CoinGecko).
 *
 * 2 minutes
 */
export const MARKET_CACHE_TTL_MS = 2 * 60_000;

/**
 * Cache TTL for USGS earthquakes and the aggregated threat status.
 *
 * 2 minutes
 */
export const SEISMIC_CACHE_TTL_MS = 2 * 60_000;

/**
 * Cache TTL for Hacker News, Reddit, world headlines and GDACS alerts.
 *
 * 5 minutes
 */
export const NEWS_CACHE_TTL_MS = 5 * 60_000;

/**
 * Cache TTL for Open-Meteo weather.
 *
 * 10 minutes
 */
export const WEATHER_CACHE_TTL_MS = 10 * 60_000;

/**
 * Cache TTL for the dashboard icon index fetched from GitHub.
 *
 * 1 hour
 */
export const ICONS_CACHE_TTL_MS = 60 * 60_000;

/**
 * Cache TTL for the settings document read cache.
 *
 * Settings only change on explicit save, and saves write through.
 *
 * 60 seconds
 */
export const SETTINGS_CACHE_TTL_MS = 60_000;
