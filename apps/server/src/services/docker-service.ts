/**
 * Docker Service - Container listing over the Docker Engine API
 *
 * Talks to the engine on its unix socket. Every call resolves; when the
 * engine cannot be reached the result carries an error message for the
 * dashboard instead of containers.
 */

import type { BookmarkCandidate, ContainerSummary } from '@homelab/types';
import { createLogger, getErrorCode, getErrorMessage } from '@homelab/utils';
import { createSocketClient, requestJson, type HttpClient } from '../lib/http-client.js';
import { getArray, getNumber, getString, isObject, objects, type JsonObject } from '../lib/json.js';
import { iconUrl } from './icon-service.js';

const logger = createLogger('Docker');

/** Host part is ignored on a socket connection */
const ENGINE_URL = 'http://docker';

const SOCKET_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'ECONNREFUSED', 'EPERM']);

export const SOCKET_UNAVAILABLE_MESSAGE =
  'Docker socket not accessible. Check permissions or mount /var/run/docker.sock.';

export interface ContainerListing {
  containers: ContainerSummary[];
  error: string | null;
}

export interface DockerServiceOptions {
  socketPath: string;
  /** Host name used in URLs of discovered apps */
  discoveryHost: string;
  /** Overrides the socket client (tests) */
  http?: HttpClient;
}

function containerName(container: JsonObject): string {
  const [first] = getArray(container, 'Names');
  return typeof first === 'string' ? first.replace(/^\//, '') : '';
}

export function toContainerSummary(container: JsonObject): ContainerSummary {
  return {
    id: getString(container, 'Id').slice(0, 12),
    name: containerName(container),
    status: getString(container, 'State'),
    image: getString(container, 'Image'),
  };
}

/** Lowest published TCP port of a container, or null */
export function publishedTcpPort(container: JsonObject): number | null {
  const ports = objects(getArray(container, 'Ports'))
    .filter((port) => getString(port, 'Type', 'tcp') === 'tcp')
    .map((port) => getNumber(port, 'PublicPort'))
    .filter((port) => port > 0);
  return ports.length > 0 ? Math.min(...ports) : null;
}

/**
 * Bookmark candidates for running containers that publish a TCP port.
 * A running `grafana` container publishing 3000 on host `nas.lan` becomes
 * `{ name: 'grafana', url: 'http://nas.lan:3000' }` with the grafana icon.
 */
export function containersToCandidates(
  containers: JsonObject[],
  host: string
): BookmarkCandidate[] {
  const candidates: BookmarkCandidate[] = [];
  for (const container of containers) {
    const name = containerName(container);
    const port = publishedTcpPort(container);
    if (!name || port === null || getString(container, 'State') !== 'running') continue;
    candidates.push({ name, url: `http://${host}:${port}`, icon: iconUrl(name.toLowerCase()) });
  }
  return candidates;
}

export function describeDockerError(error: unknown): string {
  const code = getErrorCode(error);
  if (code && SOCKET_ERROR_CODES.has(code)) return SOCKET_UNAVAILABLE_MESSAGE;
  return `Unable to communicate with Docker: ${getErrorMessage(error)}`;
}

export class DockerService {
  private readonly http: HttpClient;

  constructor(private readonly options: DockerServiceOptions) {
    this.http = options.http ?? createSocketClient(options.socketPath);
  }

  async listContainers(): Promise<ContainerListing> {
    try {
      const containers = await this.readContainers();
      return { containers: containers.map(toContainerSummary), error: null };
    } catch (error) {
      const message = describeDockerError(error);
      logger.warn(message);
      return { containers: [], error: message };
    }
  }

  /**
   * Bookmark candidates for the dashboard's import dialog. Empty when the
   * engine is unreachable.
   */
  async discoverApps(): Promise<BookmarkCandidate[]> {
    try {
      return containersToCandidates(await this.readContainers(), this.options.discoveryHost);
    } catch (error) {
      logger.warn(describeDockerError(error));
      return [];
    }
  }

  private async readContainers(): Promise<JsonObject[]> {
    const payload = await requestJson(this.http, `${ENGINE_URL}/containers/json?all=1`, {
      timeoutMs: 5000,
    });
    return Array.isArray(payload) ? payload.filter(isObject) : [];
  }
}
