/**
 * Shared plumbing for integration fetchers
 */

import { fetchFailed, fetchOk, type FetchResult, type IntegrationConfig } from '@homelab/types';
import { createLogger, getErrorMessage, isAbortError, isTransientError } from '@homelab/utils';
import type { HttpClient, HttpRequestOptions } from '../../lib/http-client.js';
import { trimBaseUrl } from '../../lib/http-client.js';

const logger = createLogger('Integrations');

export interface IntegrationContext {
  http: HttpClient;
  /** Verify upstream TLS certificates (VERIFY_SSL) */
  verifySsl: boolean;
}

export type IntegrationFetcher<T> = (
  config: IntegrationConfig,
  context: IntegrationContext
) => Promise<FetchResult<T>>;

/** Connection fields a fetcher can require */
export type RequiredField = 'url' | 'api_key' | 'user' | 'token_name' | 'token_secret';

/**
 * Request options honoring the TLS setting
 */
export function requestOptions(
  context: IntegrationContext,
  options: HttpRequestOptions = {}
): HttpRequestOptions {
  return { ...options, insecure: !context.verifySsl };
}

/**
 * Log label for a failed upstream call
 */
export function failureKind(error: unknown): 'timeout' | 'transient' | 'permanent' {
  if (isAbortError(error)) return 'timeout';
  return isTransientError(error) ? 'transient' : 'permanent';
}

/**
 * Run an integration call with the standard gating:
 * `disabled` unless enabled, `not_configured` while a required field is
 * empty, `upstream_error` when `call` throws.
 *
 * `call` receives the base URL without trailing slashes.
 */
export async function runIntegration<T>(
  name: string,
  config: IntegrationConfig,
  required: RequiredField[],
  call: (baseUrl: string) => Promise<T>
): Promise<FetchResult<T>> {
  if (!config.enabled) return fetchFailed('disabled');

  const missing = required.filter((field) => !(config[field] ?? '').trim());
  if (missing.length > 0) {
    return fetchFailed('not_configured', `Missing ${missing.join(', ')}`);
  }

  try {
    return fetchOk(await call(trimBaseUrl(config.url)));
  } catch (error) {
    const message = getErrorMessage(error);
    const kind = failureKind(error);
    logger.warn(`${name} request failed (${kind}):`, message);
    return fetchFailed('upstream_error', message);
  }
}
