/**
 * @homelab/types
 * Shared type definitions for the homelab dashboard
 */

// Bookmark app types
export type {
  BookmarkApp,
  BookmarkAppWithStatus,
  BookmarkAppUpdate,
  BookmarkCandidate,
  ReorderPosition,
  ProbeResult,
} from './apps.js';

// Settings types and defaults
export type {
  WidgetName,
  WidgetConfig,
  IntegrationName,
  IntegrationConfig,
  IntegrationField,
  LoadingScreenStyle,
  AppearanceSettings,
  DashboardSettings,
  UnitSystem,
  LocationSettings,
  SettingsDocument,
} from './settings.js';
export { DEFAULT_SETTINGS, INTEGRATION_FIELDS } from './settings.js';

// Cache options and TTL constants
export type { CacheOptions } from './cache.js';
export {
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_CACHE_MAX_ENTRIES,
  MARKET_CACHE_TTL_MS,
  SEISMIC_CACHE_TTL_MS,
  NEWS_CACHE_TTL_MS,
  WEATHER_CACHE_TTL_MS,
  ICONS_CACHE_TTL_MS,
  SETTINGS_CACHE_TTL_MS,
} from './cache.js';

// Fetch outcomes
export type { FetchResult, FetchFailureReason } from './fetch-result.js';
export { fetchOk, fetchFailed } from './fetch-result.js';

// Widget data shapes
export type {
  WeatherReport,
  HackerNewsStory,
  Headline,
  HeadlineSource,
  RedditPost,
  CryptoPrice,
  QuakeAlert,
  Earthquake,
  DisasterAlertLevel,
  DisasterAlert,
  ThreatLevel,
  ThreatStatus,
  ContainerSummary,
  SystemStats,
  SystemInfo,
  IconEntry,
  ThemeColors,
  Theme,
} from './widgets.js';

// Integration data shapes
export type {
  PiholeDiagnosis,
  PiholeStats,
  PortainerStats,
  ProxmoxStats,
  SpeedtestResult,
  MonitorStatus,
  UptimeMonitor,
  UptimeKumaStats,
  AudiobookshelfBook,
  AudiobookshelfStats,
} from './integrations.js';

// Event types
export type { EventType, EventCallback } from './events.js';
