/**
 * Server configuration
 *
 * Read once at startup from environment variables. Invalid numbers fall back
 * to their defaults.
 */

import { createLogger } from '@homelab/utils';
import { DEFAULT_DATA_DIR } from '@homelab/platform';
import { DEFAULT_CACHE_MAX_ENTRIES, SETTINGS_CACHE_TTL_MS } from '@homelab/types';

const logger = createLogger('Config');

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  /** TLS verification for integration requests */
  verifySsl: boolean;
  cacheMaxEntries: number;
  settingsCacheTtlMs: number;
  terminalEnabled: boolean;
  /** Host used when building URLs for auto-discovered containers */
  discoveryHost: string;
  dockerSocket: string;
}

export const DEFAULT_PORT = 5050;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';

const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);
const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);

function readInt(value: string | undefined, fallback: number, min = 1): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (FALSE_VALUES.has(normalized)) return false;
  if (TRUE_VALUES.has(normalized)) return true;
  return fallback;
}

function readString(value: string | undefined, fallback: string): string {
  return value && value.trim() ? value.trim() : fallback;
}

/**
 * Build the server configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const config: ServerConfig = {
    port: readInt(env.PORT, DEFAULT_PORT),
    host: readString(env.HOST, DEFAULT_HOST),
    dataDir: readString(env.DATA_DIR, DEFAULT_DATA_DIR),
    verifySsl: readBool(env.VERIFY_SSL, true),
    cacheMaxEntries: readInt(env.CACHE_MAX_ENTRIES, DEFAULT_CACHE_MAX_ENTRIES),
    settingsCacheTtlMs: readInt(env.SETTINGS_CACHE_TTL_MS, SETTINGS_CACHE_TTL_MS, 0),
    terminalEnabled: readBool(env.TERMINAL_ENABLED, true),
    discoveryHost: readString(env.DISCOVERY_HOST, 'localhost'),
    dockerSocket: readString(env.DOCKER_SOCKET, DEFAULT_DOCKER_SOCKET),
  };

  if (!config.verifySsl) {
    logger.warn('VERIFY_SSL is disabled: integration requests will accept any TLS certificate');
  }

  return config;
}
