/**
 * Uptime Kuma monitor health from a public status page
 */

import type {
  FetchResult,
  IntegrationConfig,
  MonitorStatus,
  UptimeKumaStats,
  UptimeMonitor,
} from '@homelab/types';
import { requestJson } from '../../lib/http-client.js';
import { asObject, getArray, getNumber, getString, objects, roundTo } from '../../lib/json.js';
import { requestOptions, runIntegration, type IntegrationContext } from './common.js';

export const DEFAULT_STATUS_PAGE = 'default';

const MAX_MONITORS = 10;

/** Kuma status codes: 1 up, 0 down, anything else paused/pending */
function monitorStatus(code: number): MonitorStatus {
  if (code === 1) return 'up';
  if (code === 0) return 'down';
  return 'paused';
}

export function parseStatusPage(payload: unknown): UptimeKumaStats {
  const monitors: UptimeMonitor[] = [];
  for (const group of objects(getArray(asObject(payload), 'publicGroupList'))) {
    for (const monitor of objects(getArray(group, 'monitorList'))) {
      monitors.push({
        name: getString(monitor, 'name', 'Unknown'),
        status: monitorStatus(getNumber(monitor, 'status')),
        uptime_24h: getNumber(monitor, 'uptime24'),
      });
    }
  }

  const count = (status: MonitorStatus): number =>
    monitors.filter((monitor) => monitor.status === status).length;
  const up = count('up');

  return {
    total_monitors: monitors.length,
    up,
    down: count('down'),
    paused: count('paused'),
    health_percent: roundTo(monitors.length > 0 ? (up / monitors.length) * 100 : 0, 1),
    monitors: monitors.slice(0, MAX_MONITORS),
  };
}

export function fetchUptimeKumaStats(
  config: IntegrationConfig,
  context: IntegrationContext
): Promise<FetchResult<UptimeKumaStats>> {
  return runIntegration('uptime_kuma', config, ['url'], async (baseUrl) => {
    const slug = encodeURIComponent(config.slug?.trim() || DEFAULT_STATUS_PAGE);
    const payload = await requestJson(
      context.http,
      `${baseUrl}/api/status-page/${slug}`,
      requestOptions(context, { timeoutMs: 5000 })
    );
    return parseStatusPage(payload);
  });
}
