/**
 * Latest result from Speedtest Tracker
 */

import type { FetchResult, IntegrationConfig, SpeedtestResult } from '@homelab/types';
import { requestJson } from '../../lib/http-client.js';
import { asObject, getNumber, getObject, getString, roundTo } from '../../lib/json.js';
import { requestOptions, runIntegration, type IntegrationContext } from './common.js';

/** Values above this are bits per second rather than Mbps */
const BPS_THRESHOLD = 1_000_000;

export function toMbps(value: number): number {
  return value > BPS_THRESHOLD ? value / BPS_THRESHOLD : value;
}

export function parseSpeedtest(payload: unknown): SpeedtestResult {
  const data = getObject(asObject(payload), 'data');
  return {
    download_mbps: roundTo(toMbps(getNumber(data, 'download')), 2),
    upload_mbps: roundTo(toMbps(getNumber(data, 'upload')), 2),
    ping_ms: roundTo(getNumber(data, 'ping'), 1),
    server: getString(data, 'server_name', 'Unknown'),
    isp: getString(data, 'isp', 'Unknown'),
    tested_at: getString(data, 'created_at'),
  };
}

export function fetchSpeedtestResult(
  config: IntegrationConfig,
  context: IntegrationContext
): Promise<FetchResult<SpeedtestResult>> {
  return runIntegration('speedtest', config, ['url'], async (baseUrl) => {
    const headers: Record<string, string> = {};
    if (config.api_key) headers['Authorization'] = `Bearer ${config.api_key}`;

    const payload = await requestJson(
      context.http,
      `${baseUrl}/api/speedtest/latest`,
      requestOptions(context, { headers, timeoutMs: 5000 })
    );
    return parseSpeedtest(payload);
  });
}
