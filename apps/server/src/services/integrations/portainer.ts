/**
 * Portainer container statistics, summed over all environments
 */

import type { FetchResult, IntegrationConfig, PortainerStats } from '@homelab/types';
import { requestJson } from '../../lib/http-client.js';
import { getArray, getNumber, getObject, isObject, objects } from '../../lib/json.js';
import { requestOptions, runIntegration, type IntegrationContext } from './common.js';

/**
 * Aggregate the latest snapshot of every endpoint
 */
export function parseEndpoints(payload: unknown): PortainerStats {
  const endpoints = Array.isArray(payload) ? payload.filter(isObject) : [];
  const stats: PortainerStats = {
    endpoints: endpoints.length,
    total_containers: 0,
    running_containers: 0,
    stopped_containers: 0,
    stacks: 0,
    volumes: 0,
    images: 0,
  };

  for (const endpoint of endpoints) {
    const [snapshot] = objects(getArray(endpoint, 'Snapshots'));
    if (!snapshot) continue;

    const running = getNumber(snapshot, 'RunningContainerCount');
    const stopped = getNumber(snapshot, 'StoppedContainerCount');
    const rawCount = getNumber(getObject(snapshot, 'DockerSnapshotRaw'), 'Containers');

    stats.total_containers += getNumber(snapshot, 'ContainerCount', rawCount || running + stopped);
    stats.running_containers += running;
    stats.stopped_containers += stopped;
    stats.stacks += getNumber(snapshot, 'StackCount');
    stats.volumes += getNumber(snapshot, 'VolumeCount');
    stats.images += getNumber(snapshot, 'ImageCount');
  }
  return stats;
}

export function fetchPortainerStats(
  config: IntegrationConfig,
  context: IntegrationContext
): Promise<FetchResult<PortainerStats>> {
  return runIntegration('portainer', config, ['url', 'api_key'], async (baseUrl) => {
    const endpoints = await requestJson(
      context.http,
      `${baseUrl}/api/endpoints`,
      requestOptions(context, { headers: { 'X-API-Key': config.api_key ?? '' }, timeoutMs: 5000 })
    );
    return parseEndpoints(endpoints);
  });
}
