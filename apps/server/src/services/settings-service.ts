/**
 * Settings Service - Persisted dashboard settings with a write-through read cache
 *
 * The stored document is deep-merged onto DEFAULT_SETTINGS on every read, so
 * keys added in newer versions always resolve. Reads are served from a
 * short-TTL cache; every write persists and then refreshes the cache with
 * the merged result, so a read right after a write sees it without touching
 * the disk.
 *
 * One lock (p-limit with concurrency 1) guards every persist and every
 * read-modify-write (`set`, `update` and the helpers built on them), so two
 * concurrent `set` calls on different paths cannot drop each other's change.
 */

import pLimit from 'p-limit';
import {
  DEFAULT_SETTINGS,
  SETTINGS_CACHE_TTL_MS,
  type AppearanceSettings,
  type DashboardSettings,
  type IntegrationConfig,
  type LocationSettings,
  type SettingsDocument,
  type WidgetConfig,
} from '@homelab/types';
import { createLogger } from '@homelab/utils';
import {
  atomicWriteJson,
  getSettingsPath,
  logRecoveryWarning,
  readJsonWithRecovery,
} from '@homelab/platform';
import { TtlCache } from '../lib/ttl-cache.js';
import {
  asObject,
  getBoolean,
  getNumber,
  getString,
  isObject,
  type JsonObject,
} from '../lib/json.js';

const logger = createLogger('Settings');

const CACHE_KEY = 'settings';

/** Returned for widgets that have no entry in the document */
export const UNKNOWN_WIDGET_CONFIG: WidgetConfig = { enabled: false, position: 99 };

/** Keys that would reach Object.prototype through a bracket write */
const RESERVED_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Whether `key` may name a settings section, key or path segment.
 */
export function isSafeSettingsKey(key: string): boolean {
  return key !== '' && !RESERVED_KEYS.has(key);
}

/**
 * Whether every segment of a dotted path is a safe settings key.
 */
export function isSafeSettingsPath(dottedPath: string): boolean {
  return dottedPath.split('.').every(isSafeSettingsKey);
}

function assertSafeKey(key: string, dottedPath = key): void {
  if (!isSafeSettingsKey(key)) {
    throw new Error(`Invalid settings path: "${dottedPath}"`);
  }
}

function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

// ---------------------------------------------------------------------------
// Merge and normalization
// ---------------------------------------------------------------------------

/**
 * Deep-merge `override` onto `base`. Keys from `override` win; when both
 * sides hold an object the merge recurses, otherwise the override value
 * replaces the base value wholesale. Neither input is mutated.
 */
export function deepMerge(base: JsonObject, override: JsonObject): JsonObject {
  const result: JsonObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (RESERVED_KEYS.has(key)) continue;
    const current = ownEntry(result, key);
    result[key] = isObject(current) && isObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function toWidgets(value: unknown): Record<string, WidgetConfig> {
  const widgets: Record<string, WidgetConfig> = {};
  for (const [name, config] of Object.entries(asObject(value))) {
    if (!isObject(config) || RESERVED_KEYS.has(name)) continue;
    widgets[name] = {
      enabled: getBoolean(config, 'enabled', true),
      position: getNumber(config, 'position', UNKNOWN_WIDGET_CONFIG.position),
    };
  }
  return widgets;
}

const OPTIONAL_INTEGRATION_FIELDS = [
  'api_key',
  'user',
  'token_name',
  'token_secret',
  'slug',
] as const;

function toIntegrationConfig(config: JsonObject): IntegrationConfig {
  const result: IntegrationConfig = {
    enabled: getBoolean(config, 'enabled', false),
    url: getString(config, 'url'),
  };
  for (const field of OPTIONAL_INTEGRATION_FIELDS) {
    const value = config[field];
    if (typeof value === 'string') result[field] = value;
  }
  return result;
}

function toIntegrations(value: unknown): Record<string, IntegrationConfig> {
  const integrations: Record<string, IntegrationConfig> = {};
  for (const [name, config] of Object.entries(asObject(value))) {
    if (isObject(config) && !RESERVED_KEYS.has(name)) {
      integrations[name] = toIntegrationConfig(config);
    }
  }
  return integrations;
}

function toAppearance(value: unknown): AppearanceSettings {
  const obj = asObject(value);
  const defaults = DEFAULT_SETTINGS.appearance;
  return {
    theme: getString(obj, 'theme', defaults.theme),
    show_loading_screen: getBoolean(obj, 'show_loading_screen', defaults.show_loading_screen),
    loading_screen_style:
      obj.loading_screen_style === 'terrain' ? 'terrain' : defaults.loading_screen_style,
    animations_enabled: getBoolean(obj, 'animations_enabled', defaults.animations_enabled),
  };
}

function toDashboard(value: unknown): DashboardSettings {
  const obj = asObject(value);
  const defaults = DEFAULT_SETTINGS.dashboard;
  return {
    news_ticker_enabled: getBoolean(obj, 'news_ticker_enabled', defaults.news_ticker_enabled),
    weather_bar_enabled: getBoolean(obj, 'weather_bar_enabled', defaults.weather_bar_enabled),
    crypto_bar_enabled: getBoolean(obj, 'crypto_bar_enabled', defaults.crypto_bar_enabled),
  };
}

function toLocation(value: unknown): LocationSettings {
  const obj = asObject(value);
  const defaults = DEFAULT_SETTINGS.location;
  return {
    city: getString(obj, 'city', defaults.city),
    latitude: getString(obj, 'latitude', defaults.latitude),
    longitude: getString(obj, 'longitude', defaults.longitude),
    timezone: getString(obj, 'timezone', defaults.timezone),
    use_auto: getBoolean(obj, 'use_auto', defaults.use_auto),
    units: obj.units === 'metric' ? 'metric' : 'imperial',
  };
}

/**
 * Merge stored data onto the defaults and type the known sections.
 * Unknown top-level sections are carried through untouched.
 */
export function mergeWithDefaults(stored: unknown): SettingsDocument {
  const merged = deepMerge(DEFAULT_SETTINGS, asObject(stored));
  return {
    ...merged,
    widgets: toWidgets(merged.widgets),
    integrations: toIntegrations(merged.integrations),
    appearance: toAppearance(merged.appearance),
    dashboard: toDashboard(merged.dashboard),
    location: toLocation(merged.location),
  };
}

// ---------------------------------------------------------------------------
// Dotted paths
// ---------------------------------------------------------------------------

/**
 * Read a dotted path such as `widgets.weather.enabled`. Any missing segment
 * or non-object intermediate yields `fallback`.
 */
export function getPath(root: JsonObject, dottedPath: string, fallback: unknown): unknown {
  let node: unknown = root;
  for (const segment of dottedPath.split('.')) {
    if (!isObject(node) || RESERVED_KEYS.has(segment) || !Object.hasOwn(node, segment)) {
      return fallback;
    }
    node = node[segment];
  }
  return node;
}

/**
 * Write a dotted path in place, creating intermediate objects and replacing
 * non-object intermediates. Only own properties are followed; empty and
 * reserved segments (`__proto__`, `constructor`, `prototype`) throw.
 */
export function setPath(root: JsonObject, dottedPath: string, value: unknown): void {
  const segments = dottedPath.split('.');
  for (const segment of segments) {
    assertSafeKey(segment, dottedPath);
  }
  const last = segments.pop();
  if (last === undefined) {
    throw new Error(`Invalid settings path: "${dottedPath}"`);
  }

  let target = root;
  for (const segment of segments) {
    const next = ownEntry(target, segment);
    if (isObject(next)) {
      target = next;
    } else {
      const created: JsonObject = {};
      target[segment] = created;
      target = created;
    }
  }
  target[last] = value;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export interface SettingsServiceOptions {
  /** Read-cache TTL in ms (default: 60000) */
  cacheTtlMs?: number;
}

export class SettingsService {
  private readonly filePath: string;
  private readonly cacheTtlMs: number;
  private readonly cache = new TtlCache<SettingsDocument>({ maxEntries: 1 });
  private readonly lock = pLimit(1);

  constructor(dataDir: string, options: SettingsServiceOptions = {}) {
    this.filePath = getSettingsPath(dataDir);
    this.cacheTtlMs = options.cacheTtlMs ?? SETTINGS_CACHE_TTL_MS;
  }

  /**
   * Return the settings document. Served from the cache while it is younger
   * than the TTL unless `bypassCache` is set; disk reloads take the lock.
   * The result is a copy the caller may mutate freely.
   */
  async load(bypassCache = false): Promise<SettingsDocument> {
    if (bypassCache) {
      this.cache.delete(CACHE_KEY);
    }
    const document = await this.cache.getOrFetch(
      CACHE_KEY,
      () => this.lock(() => this.readFromDisk()),
      this.cacheTtlMs
    );
    return structuredClone(document ?? mergeWithDefaults({}));
  }

  /**
   * Persist a full document and refresh the cache with its merged form.
   */
  save(document: SettingsDocument): Promise<void> {
    return this.lock(() => this.persist(document));
  }

  /**
   * Read a dotted path from the current settings.
   *
   * @example
   * await settings.get('widgets.weather.enabled', true)
   */
  async get(dottedPath: string, fallback: unknown = null): Promise<unknown> {
    return getPath(await this.load(), dottedPath, fallback);
  }

  /**
   * Write a dotted path as one locked read-modify-write.
   */
  set(dottedPath: string, value: unknown): Promise<void> {
    return this.update((document) => {
      setPath(document, dottedPath, value);
    });
  }

  /**
   * Run `mutator` on a fresh copy of the document under the lock and persist
   * the result. The mutator's return value is passed through.
   */
  update<T>(mutator: (document: SettingsDocument) => T): Promise<T> {
    return this.lock(async () => {
      const document = structuredClone(await this.readFromDisk());
      const result = mutator(document);
      await this.persist(document);
      return result;
    });
  }

  /** Drop the cached document so the next read goes to disk */
  invalidate(): void {
    this.cache.delete(CACHE_KEY);
  }

  // ---------------------------------------------------------------------------
  // Widgets
  // ---------------------------------------------------------------------------

  async getWidgetConfig(name: string): Promise<WidgetConfig> {
    const { widgets } = await this.load();
    return ownEntry(widgets, name) ?? { ...UNKNOWN_WIDGET_CONFIG };
  }

  setWidgetEnabled(name: string, enabled: boolean): Promise<void> {
    return this.update((document) => {
      assertSafeKey(name);
      const current = ownEntry(document.widgets, name) ?? { ...UNKNOWN_WIDGET_CONFIG };
      document.widgets[name] = { ...current, enabled };
    });
  }

  /**
   * Flip a widget's enabled flag. A widget without an entry counts as enabled.
   *
   * @returns The new enabled state
   */
  toggleWidget(name: string): Promise<boolean> {
    return this.update((document) => {
      assertSafeKey(name);
      const current = ownEntry(document.widgets, name);
      const enabled = !(current?.enabled ?? true);
      document.widgets[name] = { ...(current ?? UNKNOWN_WIDGET_CONFIG), enabled };
      return enabled;
    });
  }

  /**
   * Enabled widget names ordered by position.
   */
  async getEnabledWidgets(): Promise<string[]> {
    const { widgets } = await this.load();
    return Object.entries(widgets)
      .filter(([, config]) => config.enabled)
      .sort(([, a], [, b]) => a.position - b.position)
      .map(([name]) => name);
  }

  // ---------------------------------------------------------------------------
  // Integrations
  // ---------------------------------------------------------------------------

  async getIntegrationConfig(name: string): Promise<IntegrationConfig | null> {
    const { integrations } = await this.load();
    return ownEntry(integrations, name) ?? null;
  }

  /**
   * Shallow-merge fields into an integration's config, creating it if needed.
   */
  updateIntegration(name: string, fields: Partial<IntegrationConfig>): Promise<void> {
    return this.update((document) => {
      assertSafeKey(name);
      const current = ownEntry(document.integrations, name) ?? { enabled: false, url: '' };
      document.integrations[name] = { ...current, ...fields };
    });
  }

  /**
   * @returns The new enabled state (an unknown integration starts disabled)
   */
  toggleIntegration(name: string): Promise<boolean> {
    return this.update((document) => {
      assertSafeKey(name);
      const current = ownEntry(document.integrations, name) ?? { enabled: false, url: '' };
      const enabled = !current.enabled;
      document.integrations[name] = { ...current, enabled };
      return enabled;
    });
  }

  // ---------------------------------------------------------------------------
  // Generic toggles, location and theme
  // ---------------------------------------------------------------------------

  /**
   * Flip `section.key`. A missing or non-boolean value counts as true.
   *
   * @returns The new value
   */
  toggleSetting(section: string, key: string): Promise<boolean> {
    const dottedPath = `${section}.${key}`;
    return this.update((document) => {
      const current = getPath(document, dottedPath, true);
      const next = !(typeof current === 'boolean' ? current : true);
      setPath(document, dottedPath, next);
      return next;
    });
  }

  async getLocation(): Promise<LocationSettings> {
    return (await this.load()).location;
  }

  saveLocation(fields: Partial<LocationSettings>): Promise<LocationSettings> {
    return this.update((document) => {
      document.location = { ...document.location, ...fields };
      return document.location;
    });
  }

  setTheme(theme: string): Promise<void> {
    return this.update((document) => {
      document.appearance = { ...document.appearance, theme };
    });
  }

  // ---------------------------------------------------------------------------
  // Internal helpers (call with the lock held)
  // ---------------------------------------------------------------------------

  private async readFromDisk(): Promise<SettingsDocument> {
    const result = await readJsonWithRecovery(this.filePath, {});
    if (result.recovered) {
      logRecoveryWarning(result, this.filePath, 'settings');
      if (result.reason === 'missing') {
        logger.info(`Creating ${this.filePath} with defaults`);
        await atomicWriteJson(this.filePath, DEFAULT_SETTINGS);
      }
    }

    const document = mergeWithDefaults(result.data);
    this.cache.set(CACHE_KEY, document);
    return document;
  }

  private async persist(document: SettingsDocument): Promise<void> {
    await atomicWriteJson(this.filePath, document);
    this.cache.set(CACHE_KEY, mergeWithDefaults(document));
  }
}
