/**
 * Settings Types - Persisted dashboard configuration
 *
 * The settings document is a nested key/value tree. Every read is merged onto
 * DEFAULT_SETTINGS so lookups never fail on a key that an older settings file
 * does not have yet.
 */

// ============================================================================
// Widgets
// ============================================================================

/** Widgets known to the dashboard, in default display order */
export type WidgetName =
  | 'weather'
  | 'crypto'
  | 'news'
  | 'reddit'
  | 'threats'
  | 'earthquakes'
  | 'system_stats'
  | 'docker';

export interface WidgetConfig {
  enabled: boolean;
  /** Display position, lower first */
  position: number;
}

// ============================================================================
// Integrations
// ============================================================================

export type IntegrationName =
  | 'pihole'
  | 'portainer'
  | 'proxmox'
  | 'speedtest'
  | 'uptime_kuma'
  | 'audiobookshelf';

/**
 * Connection settings for one integration. Only the fields an integration
 * needs are present in its defaults; the form accepts the union.
 */
export interface IntegrationConfig {
  enabled: boolean;
  url: string;
  api_key?: string;
  user?: string;
  token_name?: string;
  token_secret?: string;
  slug?: string;
}

/** Form fields accepted when saving or testing an integration */
export const INTEGRATION_FIELDS = [
  'url',
  'api_key',
  'user',
  'token_name',
  'token_secret',
  'slug',
] as const;

export type IntegrationField = (typeof INTEGRATION_FIELDS)[number];

// ============================================================================
// Appearance, dashboard and location
// ============================================================================

export type LoadingScreenStyle = 'server' | 'terrain';

export interface AppearanceSettings {
  theme: string;
  show_loading_screen: boolean;
  loading_screen_style: LoadingScreenStyle;
  animations_enabled: boolean;
}

export interface DashboardSettings {
  news_ticker_enabled: boolean;
  weather_bar_enabled: boolean;
  crypto_bar_enabled: boolean;
}

/** imperial (°F, mph) or metric (°C) */
export type UnitSystem = 'imperial' | 'metric';

export interface LocationSettings {
  city: string;
  /** Stored as entered in the settings form; parsed when used */
  latitude: string;
  longitude: string;
  timezone: string;
  use_auto: boolean;
  units: UnitSystem;
}

// ============================================================================
// Document
// ============================================================================

export interface SettingsDocument {
  widgets: Record<string, WidgetConfig>;
  integrations: Record<string, IntegrationConfig>;
  appearance: AppearanceSettings;
  dashboard: DashboardSettings;
  location: LocationSettings;
  /** Unknown top-level sections written through `set()` are preserved */
  [section: string]: unknown;
}

/**
 * Canonical default settings document
 */
export const DEFAULT_SETTINGS: SettingsDocument = {
  widgets: {
    weather: { enabled: true, position: 0 },
    crypto: { enabled: true, position: 1 },
    news: { enabled: true, position: 2 },
    reddit: { enabled: true, position: 3 },
    threats: { enabled: true, position: 4 },
    earthquakes: { enabled: true, position: 5 },
    system_stats: { enabled: true, position: 6 },
    docker: { enabled: true, position: 7 },
  },
  integrations: {
    pihole: { enabled: false, url: '', api_key: '' },
    portainer: { enabled: false, url: '', api_key: '' },
    proxmox: { enabled: false, url: '', user: '', token_name: '', token_secret: '' },
    speedtest: { enabled: false, url: '', api_key: '' },
    uptime_kuma: { enabled: false, url: '', slug: 'default' },
    audiobookshelf: { enabled: false, url: '', api_key: '' },
  },
  appearance: {
    theme: 'dark',
    show_loading_screen: true,
    loading_screen_style: 'server',
    animations_enabled: true,
  },
  dashboard: {
    news_ticker_enabled: true,
    weather_bar_enabled: true,
    crypto_bar_enabled: true,
  },
  location: {
    city: '',
    latitude: '',
    longitude: '',
    timezone: '',
    use_auto: true,
    units: 'imperial',
  },
};
