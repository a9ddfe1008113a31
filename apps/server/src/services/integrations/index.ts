/**
 * Integration registry and service
 *
 * Each integration reads its saved connection settings; `test()` runs one
 * against unsaved form values instead.
 */

import {
  fetchFailed,
  INTEGRATION_FIELDS,
  type FetchResult,
  type IntegrationConfig,
  type IntegrationName,
} from '@homelab/types';
import type { SettingsService } from '../settings-service.js';
import type { IntegrationContext, IntegrationFetcher } from './common.js';
import { fetchAudiobookshelfStats } from './audiobookshelf.js';
import { fetchPiholeStats } from './pihole.js';
import { fetchPortainerStats } from './portainer.js';
import { fetchProxmoxStats } from './proxmox.js';
import { fetchSpeedtestResult } from './speedtest.js';
import { fetchUptimeKumaStats } from './uptime-kuma.js';

export type { IntegrationContext, IntegrationFetcher } from './common.js';

export const INTEGRATIONS: Record<IntegrationName, IntegrationFetcher<unknown>> = {
  pihole: fetchPiholeStats,
  portainer: fetchPortainerStats,
  proxmox: fetchProxmoxStats,
  speedtest: fetchSpeedtestResult,
  uptime_kuma: fetchUptimeKumaStats,
  audiobookshelf: fetchAudiobookshelfStats,
};

export function isIntegrationName(name: string): name is IntegrationName {
  return Object.hasOwn(INTEGRATIONS, name);
}

/**
 * Connection config from submitted form values; only known string fields
 * are taken
 *
 * @example
 * configFromForm({ url: 'http://pi.hole', extra: 1 }, true)
 * // => { enabled: true, url: 'http://pi.hole' }
 */
export function configFromForm(
  form: Record<string, unknown>,
  enabled: boolean
): IntegrationConfig {
  const config: IntegrationConfig = { enabled, url: '' };
  for (const field of INTEGRATION_FIELDS) {
    const value = form[field];
    if (typeof value === 'string') config[field] = value;
  }
  return config;
}

/**
 * Run an integration against form values, forced enabled
 */
export async function testIntegration(
  name: IntegrationName,
  form: Record<string, unknown>,
  context: IntegrationContext
): Promise<FetchResult<unknown>> {
  return INTEGRATIONS[name](configFromForm(form, true), context);
}

export class IntegrationService {
  constructor(
    private readonly settings: SettingsService,
    private readonly context: IntegrationContext
  ) {}

  /**
   * Fetch an integration with its saved settings.
   * A name missing from the settings document counts as disabled.
   */
  async fetch(name: IntegrationName): Promise<FetchResult<unknown>> {
    const config = await this.settings.getIntegrationConfig(name);
    if (!config) return fetchFailed('disabled');
    return INTEGRATIONS[name](config, this.context);
  }

  /** Try unsaved form values; the integration is treated as enabled */
  test(name: IntegrationName, form: Record<string, unknown>): Promise<FetchResult<unknown>> {
    return testIntegration(name, form, this.context);
  }
}
