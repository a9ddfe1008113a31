/**
 * Proxmox VE cluster statistics via an API token
 */

import type { FetchResult, IntegrationConfig, ProxmoxStats } from '@homelab/types';
import { createLogger, getErrorMessage } from '@homelab/utils';
import { requestJson } from '../../lib/http-client.js';
import {
  asObject,
  getArray,
  getNumber,
  getString,
  objects,
  roundTo,
  type JsonObject,
} from '../../lib/json.js';
import {
  requestOptions,
  runIntegration,
  type IntegrationContext,
  type RequiredField,
} from './common.js';

const logger = createLogger('Proxmox');

export interface GuestCounts {
  total: number;
  running: number;
}

/** `Authorization` header value for a PVE API token */
export function proxmoxTokenHeader(user: string, tokenName: string, secret: string): string {
  return `PVEAPIToken=${user}!${tokenName}=${secret}`;
}

function countGuests(guests: JsonObject[]): GuestCounts {
  return {
    total: guests.length,
    running: guests.filter((guest) => getString(guest, 'status') === 'running').length,
  };
}

/**
 * Node resource totals plus guest counts.
 * CPU is the average node load; memory and disk are cluster-wide percentages.
 */
export function summarizeCluster(
  nodes: JsonObject[],
  vms: GuestCounts,
  containers: GuestCounts
): ProxmoxStats {
  let cpu = 0;
  let mem = 0;
  let maxMem = 0;
  let disk = 0;
  let maxDisk = 0;
  for (const node of nodes) {
    cpu += getNumber(node, 'cpu') * 100;
    mem += getNumber(node, 'mem');
    maxMem += getNumber(node, 'maxmem');
    disk += getNumber(node, 'disk');
    maxDisk += getNumber(node, 'maxdisk');
  }

  return {
    nodes: nodes.length,
    total_vms: vms.total,
    running_vms: vms.running,
    total_containers: containers.total,
    running_containers: containers.running,
    cpu_usage: roundTo(nodes.length > 0 ? cpu / nodes.length : 0, 1),
    memory_usage: roundTo(maxMem > 0 ? (mem / maxMem) * 100 : 0, 1),
    disk_usage: roundTo(maxDisk > 0 ? (disk / maxDisk) * 100 : 0, 1),
  };
}

export function fetchProxmoxStats(
  config: IntegrationConfig,
  context: IntegrationContext
): Promise<FetchResult<ProxmoxStats>> {
  const required: RequiredField[] = ['url', 'user', 'token_name', 'token_secret'];
  return runIntegration('proxmox', config, required, async (baseUrl) => {
    const headers = {
      Authorization: proxmoxTokenHeader(
        config.user ?? '',
        config.token_name ?? '',
        config.token_secret ?? ''
      ),
    };

    const readData = async (path: string, timeoutMs: number): Promise<JsonObject[]> => {
      const payload = await requestJson(
        context.http,
        `${baseUrl}/api2/json${path}`,
        requestOptions(context, { headers, timeoutMs })
      );
      return objects(getArray(asObject(payload), 'data'));
    };

    // A node whose guest list cannot be read counts as having none
    const readGuests = async (path: string): Promise<JsonObject[]> => {
      try {
        return await readData(path, 5000);
      } catch (error) {
        logger.debug(`${path} failed:`, getErrorMessage(error));
        return [];
      }
    };

    const nodes = await readData('/nodes', 10_000);
    const vms: JsonObject[] = [];
    const containers: JsonObject[] = [];
    for (const node of nodes) {
      const name = encodeURIComponent(getString(node, 'node'));
      const [nodeVms, nodeContainers] = await Promise.all([
        readGuests(`/nodes/${name}/qemu`),
        readGuests(`/nodes/${name}/lxc`),
      ]);
      vms.push(...nodeVms);
      containers.push(...nodeContainers);
    }

    return summarizeCluster(nodes, countGuests(vms), countGuests(containers));
  });
}
