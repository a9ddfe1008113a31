/**
 * Icon Service - Search the dashboard-icons collection
 *
 * The icon index (file names of the PNG folder) comes from the GitHub
 * contents API and is cached for an hour in the shared widget cache.
 */

import {
  fetchFailed,
  fetchOk,
  ICONS_CACHE_TTL_MS,
  type FetchResult,
  type IconEntry,
} from '@homelab/types';
import { requestJson, undiciClient, type HttpClient } from '../lib/http-client.js';
import { getString, isObject } from '../lib/json.js';
import type { WidgetCache } from './widgets/widget-cache.js';

const ICON_REPO = 'homarr-labs/dashboard-icons';

export const ICON_RAW_BASE = `https://raw.githubusercontent.com/${ICON_REPO}/main/png/`;
const ICON_INDEX_URL = `https://api.github.com/repos/${ICON_REPO}/contents/png`;

export const DEFAULT_ICON = `${ICON_RAW_BASE}homarr.png`;

export const DEFAULT_ICON_LIMIT = 50;

const INDEX_CACHE_KEY = 'icon_index';

export function iconUrl(name: string): string {
  return `${ICON_RAW_BASE}${encodeURIComponent(name)}.png`;
}

/** Icon names from a GitHub contents listing (PNG files only) */
export function parseIconIndex(payload: unknown): IconEntry[] {
  if (!Array.isArray(payload)) return [];
  return payload
    .filter(isObject)
    .map((item) => getString(item, 'name'))
    .filter((file) => file.toLowerCase().endsWith('.png'))
    .map((file) => {
      const name = file.slice(0, -'.png'.length);
      return { name, url: iconUrl(name) };
    });
}

/**
 * Case-insensitive substring match on icon names
 */
export function filterIcons(icons: IconEntry[], query: string, limit: number): IconEntry[] {
  const needle = query.trim().toLowerCase();
  const matches = needle ? icons.filter((icon) => icon.name.toLowerCase().includes(needle)) : icons;
  return matches.slice(0, limit);
}

export class IconService {
  constructor(
    private readonly cache: WidgetCache,
    private readonly http: HttpClient = undiciClient
  ) {}

  async search(query = '', limit: number = DEFAULT_ICON_LIMIT): Promise<FetchResult<IconEntry[]>> {
    const value = await this.cache.getOrFetch(
      INDEX_CACHE_KEY,
      async () => ({ kind: 'icons', data: await this.fetchIndex() }),
      ICONS_CACHE_TTL_MS
    );
    if (value?.kind !== 'icons') return fetchFailed('unavailable');
    return fetchOk(filterIcons(value.data, query, limit));
  }

  private async fetchIndex(): Promise<IconEntry[]> {
    const payload = await requestJson(this.http, ICON_INDEX_URL, {
      headers: { Accept: 'application/vnd.github+json' },
      timeoutMs: 6000,
    });
    return parseIconIndex(payload);
  }
}
