/**
 * Dashboard data paths
 *
 * All persistent state lives in one data directory (DATA_DIR, default
 * `./data`):
 * - apps.json      bookmark list, array order is display order
 * - settings.json  settings document
 *
 * Directory creation is handled separately by ensureDataDir().
 */

import path from 'path';
import * as secureFs from './secure-fs.js';

/** Default data directory, relative to the working directory */
export const DEFAULT_DATA_DIR = './data';

/**
 * Resolve the data directory to an absolute path
 *
 * @param dataDir - Configured directory; falls back to DEFAULT_DATA_DIR when empty
 */
export function getDataDir(dataDir?: string): string {
  return path.resolve(dataDir && dataDir.trim() ? dataDir : DEFAULT_DATA_DIR);
}

/**
 * Get the bookmark store file path
 *
 * @returns Absolute path to {dataDir}/apps.json
 */
export function getAppsPath(dataDir: string): string {
  return path.join(getDataDir(dataDir), 'apps.json');
}

/**
 * Get the settings file path
 *
 * @returns Absolute path to {dataDir}/settings.json
 */
export function getSettingsPath(dataDir: string): string {
  return path.join(getDataDir(dataDir), 'settings.json');
}

/**
 * Create the data directory if it doesn't exist
 *
 * @returns Absolute path to the data directory
 */
export async function ensureDataDir(dataDir: string): Promise<string> {
  const resolved = getDataDir(dataDir);
  await secureFs.mkdir(resolved, { recursive: true });
  return resolved;
}
