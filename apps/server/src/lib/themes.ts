/**
 * Theme catalog
 *
 * Built-in color themes live in `data/themes.json` next to the server
 * sources and are read once at startup.
 */

import { fileURLToPath } from 'url';
import type { Theme, ThemeColors } from '@homelab/types';
import { secureFs } from '@homelab/platform';
import { createLogger } from '@homelab/utils';
import { getObject, getString, isObject } from './json.js';

const logger = createLogger('Themes');

export const THEMES_FILE = fileURLToPath(new URL('../../data/themes.json', import.meta.url));

/** Used for unknown theme names */
export const FALLBACK_THEME = 'military';

const COLOR_KEYS = [
  'black',
  'dark',
  'card',
  'border',
  'text',
  'muted',
  'accent',
  'success',
  'error',
] as const satisfies ReadonlyArray<keyof ThemeColors>;

export type ThemeCatalog = Record<string, Theme>;

function parseTheme(value: unknown): Theme | null {
  if (!isObject(value)) return null;
  const colors = getObject(value, 'colors');
  const color = (key: keyof ThemeColors): string => getString(colors, key);
  if (COLOR_KEYS.some((key) => !color(key))) return null;

  return {
    name: getString(value, 'name'),
    colors: {
      black: color('black'),
      dark: color('dark'),
      card: color('card'),
      border: color('border'),
      text: color('text'),
      muted: color('muted'),
      accent: color('accent'),
      success: color('success'),
      error: color('error'),
    },
  };
}

/**
 * Parse a theme catalog document. Entries missing any color are dropped.
 */
export function parseThemeCatalog(document: unknown): ThemeCatalog {
  const catalog: ThemeCatalog = {};
  if (!isObject(document)) return catalog;
  for (const [id, value] of Object.entries(document)) {
    const theme = parseTheme(value);
    if (theme) {
      catalog[id] = theme;
    } else {
      logger.warn(`Skipping malformed theme "${id}"`);
    }
  }
  return catalog;
}

export async function loadThemes(file: string = THEMES_FILE): Promise<ThemeCatalog> {
  const raw = await secureFs.readFile(file);
  const catalog = parseThemeCatalog(JSON.parse(raw));
  logger.info(`Loaded ${Object.keys(catalog).length} themes`);
  return catalog;
}

/**
 * Colors for a theme, falling back to the military palette (or nothing,
 * for a catalog without it)
 */
export function getThemeColors(catalog: ThemeCatalog, name: string): ThemeColors | null {
  const theme = Object.hasOwn(catalog, name) ? catalog[name] : catalog[FALLBACK_THEME];
  return theme ? theme.colors : null;
}
