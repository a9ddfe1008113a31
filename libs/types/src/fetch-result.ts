/**
 * FetchResult - Outcome of a widget or integration fetch
 *
 * Fetchers never throw to route handlers. A failure carries a reason so the
 * caller can tell "no data yet" apart from "integration misconfigured"
 * without reading logs.
 */

/**
 * Why a fetch produced no data
 *
 * - disabled: the integration or widget is switched off in settings
 * - not_configured: required connection fields (url, key, ...) are empty
 * - upstream_error: the upstream call failed (network, non-2xx, bad payload)
 * - unavailable: the cache had nothing to serve after a failed refresh
 */
export type FetchFailureReason = 'disabled' | 'not_configured' | 'upstream_error' | 'unavailable';

export type FetchResult<T> =
  | { ok: true; data: T }
  | { ok: false; reason: FetchFailureReason; error?: string };

export function fetchOk<T>(data: T): FetchResult<T> {
  return { ok: true, data };
}

export function fetchFailed<T>(reason: FetchFailureReason, error?: string): FetchResult<T> {
  return error === undefined ? { ok: false, reason } : { ok: false, reason, error };
}
