/**
 * Liveness Prober - Decides whether a bookmarked URL is reachable
 *
 * A HEAD request is tried first (2s); if it errors or answers >= 400, a GET
 * follows (3s) whose body is discarded unread. Certificates are never
 * verified: homelab services commonly run on self-signed TLS. Worst case the
 * probe settles in about 5 seconds.
 */

import type { ProbeResult } from '@homelab/types';
import { createLogger, getErrorMessage } from '@homelab/utils';
import { undiciClient, type HttpClient } from '../lib/http-client.js';

const logger = createLogger('LivenessProber');

export const HEAD_TIMEOUT_MS = 2000;
export const GET_TIMEOUT_MS = 3000;

function offline(): ProbeResult {
  return { online: false, latencyMs: 0 };
}

/**
 * Prepend `http://` when a URL has no scheme. Empty input stays empty.
 *
 * @example
 * normalizeUrl('192.168.1.5')         // => 'http://192.168.1.5'
 * normalizeUrl('https://nas.lan:5001') // => 'https://nas.lan:5001'
 */
export function normalizeUrl(url: string): string {
  if (!url) return '';
  if (url.startsWith('http://') || url.startsWith('https://')) return url;
  return `http://${url}`;
}

export class LivenessProber {
  constructor(private readonly http: HttpClient = undiciClient) {}

  /**
   * Probe a URL. Never throws: any failure of the second attempt reports
   * the target offline with zero latency.
   */
  async probe(url: string): Promise<ProbeResult> {
    const target = normalizeUrl(url);
    if (!target) return offline();

    let start = Date.now();
    try {
      const response = await this.http(target, {
        method: 'HEAD',
        timeoutMs: HEAD_TIMEOUT_MS,
        insecure: true,
      });
      const elapsed = Date.now() - start;
      await response.discard();
      if (response.status < 400) {
        return { online: true, latencyMs: elapsed };
      }
    } catch (error) {
      logger.debug(`HEAD ${target} failed:`, getErrorMessage(error));
    }

    start = Date.now();
    try {
      const response = await this.http(target, {
        method: 'GET',
        timeoutMs: GET_TIMEOUT_MS,
        insecure: true,
      });
      const elapsed = Date.now() - start;
      await response.discard();
      return { online: response.status < 400, latencyMs: elapsed };
    } catch (error) {
      logger.debug(`GET ${target} failed:`, getErrorMessage(error));
      return offline();
    }
  }
}
