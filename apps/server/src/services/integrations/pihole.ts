/**
 * Pi-hole DNS statistics
 *
 * Pi-hole v6 exposes a session-authenticated REST API; v5 serves a single
 * `api.php` endpoint keyed by an API token. v6 is tried first and any
 * failure there falls through to v5.
 */

import type {
  FetchResult,
  IntegrationConfig,
  PiholeDiagnosis,
  PiholeStats,
} from '@homelab/types';
import { createLogger, getErrorMessage } from '@homelab/utils';
import { requestJson } from '../../lib/http-client.js';
import {
  asObject,
  getArray,
  getBoolean,
  getNumber,
  getObject,
  getString,
  objects,
  toNumber,
  type JsonObject,
} from '../../lib/json.js';
import { requestOptions, runIntegration, type IntegrationContext } from './common.js';

const logger = createLogger('Pihole');

const REQUEST_TIMEOUT_MS = 5000;
const LOGOUT_TIMEOUT_MS = 2000;

/** Message types counted as errors; anything else is a warning */
const ERROR_MESSAGE_TYPES = [
  'CONNECTION_ERROR',
  'RATE_LIMIT',
  'DATABASE_ERROR',
  'GRAVITY_ERROR',
  'FATAL',
];

/**
 * Split Pi-hole diagnosis messages into errors and warnings
 */
export function classifyMessages(payload: unknown): PiholeDiagnosis[] {
  return objects(getArray(asObject(payload), 'messages')).map((item) => {
    const type = getString(item, 'type').toUpperCase();
    const message = getString(item, 'plain') || getString(item, 'html');
    const isError = ERROR_MESSAGE_TYPES.some((errorType) => type.includes(errorType));
    return { type: isError ? 'error' : 'warning', message };
  });
}

/** `relative.days` of a gravity timestamp block, or 'N/A' */
function gravityAgeDays(lastUpdate: JsonObject): number | string {
  const days = getObject(lastUpdate, 'relative')['days'];
  return typeof days === 'number' ? days : 'N/A';
}

export function parseV6Summary(
  summary: unknown,
  gravity: unknown,
  diagnosis: PiholeDiagnosis[]
): PiholeStats {
  const data = asObject(summary);
  const queries = getObject(data, 'queries');
  const domainsBlocked = Math.trunc(getNumber(getObject(data, 'gravity'), 'domains_being_blocked'));
  const lastUpdate = getObject(getObject(asObject(gravity), 'gravity'), 'last_update');

  return {
    domains_blocked: domainsBlocked,
    dns_queries_today: Math.trunc(getNumber(queries, 'total')),
    ads_blocked_today: Math.trunc(getNumber(queries, 'blocked')),
    ads_percentage_today: getNumber(queries, 'percent_blocked'),
    unique_clients: Math.trunc(getNumber(getObject(data, 'clients'), 'total')),
    queries_cached: Math.trunc(getNumber(queries, 'cached')),
    queries_forwarded: Math.trunc(getNumber(queries, 'forwarded')),
    status: domainsBlocked > 0 ? 'enabled' : 'disabled',
    gravity_last_updated: gravityAgeDays(lastUpdate),
    diagnosis_errors: diagnosis.filter((item) => item.type === 'error').length,
    diagnosis_warnings: diagnosis.filter((item) => item.type === 'warning').length,
    diagnosis_items: diagnosis,
    api_version: 6,
  };
}

/** v5 reports counters as formatted strings ("12,345") */
export function parseV5Summary(summary: unknown): PiholeStats {
  const data = asObject(summary);
  const count = (key: string): number => Math.trunc(toNumber(data[key]));

  return {
    domains_blocked: count('domains_being_blocked'),
    dns_queries_today: count('dns_queries_today'),
    ads_blocked_today: count('ads_blocked_today'),
    ads_percentage_today: toNumber(data['ads_percentage_today']),
    unique_clients: count('unique_clients'),
    queries_cached: count('queries_cached'),
    queries_forwarded: count('queries_forwarded'),
    status: getString(data, 'status', 'unknown'),
    gravity_last_updated: gravityAgeDays(getObject(data, 'gravity_last_updated')),
    api_version: 5,
  };
}

async function tryV6(
  baseUrl: string,
  password: string,
  context: IntegrationContext
): Promise<PiholeStats | null> {
  const { http } = context;
  const auth = await http(
    `${baseUrl}/api/auth`,
    requestOptions(context, {
      method: 'POST',
      body: { password },
      timeoutMs: REQUEST_TIMEOUT_MS,
    })
  );
  if (auth.status !== 200) {
    await auth.discard();
    return null;
  }
  const session = getObject(asObject(await auth.json()), 'session');
  if (!getBoolean(session, 'valid')) return null;

  const headers = { 'X-FTL-SID': getString(session, 'sid') };
  const options = requestOptions(context, { headers, timeoutMs: REQUEST_TIMEOUT_MS });

  // Optional endpoints: a failure there only blanks their fields
  const optional = async (path: string): Promise<unknown> => {
    try {
      return await requestJson(http, `${baseUrl}${path}`, options);
    } catch (error) {
      logger.debug(`${path} failed:`, getErrorMessage(error));
      return {};
    }
  };

  try {
    const summary = await requestJson(http, `${baseUrl}/api/stats/summary`, options);
    const gravity = await optional('/api/info/gravity');
    const messages = await optional('/api/info/messages');
    return parseV6Summary(summary, gravity, classifyMessages(messages));
  } finally {
    // Free the session seat
    try {
      const logout = await http(
        `${baseUrl}/api/auth`,
        requestOptions(context, { method: 'DELETE', headers, timeoutMs: LOGOUT_TIMEOUT_MS })
      );
      await logout.discard();
    } catch (error) {
      logger.debug('Logout failed:', getErrorMessage(error));
    }
  }
}

async function fetchV5(
  baseUrl: string,
  apiKey: string,
  context: IntegrationContext
): Promise<PiholeStats> {
  const params = new URLSearchParams({ summary: '' });
  if (apiKey) params.set('auth', apiKey);
  const summary = await requestJson(
    context.http,
    `${baseUrl}/admin/api.php?${params.toString()}`,
    requestOptions(context, { timeoutMs: REQUEST_TIMEOUT_MS })
  );
  return parseV5Summary(summary);
}

export function fetchPiholeStats(
  config: IntegrationConfig,
  context: IntegrationContext
): Promise<FetchResult<PiholeStats>> {
  return runIntegration('pihole', config, ['url'], async (baseUrl) => {
    const apiKey = config.api_key ?? '';
    try {
      const stats = await tryV6(baseUrl, apiKey, context);
      if (stats) return stats;
    } catch (error) {
      logger.debug('v6 API unavailable, trying v5:', getErrorMessage(error));
    }
    return fetchV5(baseUrl, apiKey, context);
  });
}
