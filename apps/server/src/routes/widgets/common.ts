/**
 * Common utilities for widgets routes
 */

import type { Response } from 'express';
import type { FetchFailureReason, FetchResult } from '@homelab/types';
import { createLogger } from '@homelab/utils';
import { getErrorMessage as getErrorMessageShared, createLogError } from '../common.js';

const logger = createLogger('Widgets');

// Re-export shared utilities
export { getErrorMessageShared as getErrorMessage };
export const logError = createLogError(logger);

/** HTTP status for each way a fetch can come back empty */
const FAILURE_STATUS: Record<FetchFailureReason, number> = {
  disabled: 200,
  not_configured: 200,
  upstream_error: 502,
  unavailable: 503,
};

/**
 * Send a fetch result: `{ success: true, data }` or
 * `{ success: false, reason, error? }`. Switched-off and unconfigured
 * widgets are not errors and answer 200.
 */
export function sendFetchResult<T>(
  res: Response,
  result: FetchResult<T>,
  extra: Record<string, unknown> = {}
): void {
  if (result.ok) {
    res.json({ success: true, data: result.data, ...extra });
    return;
  }
  res.status(FAILURE_STATUS[result.reason]).json({
    success: false,
    reason: result.reason,
    ...(result.error === undefined ? {} : { error: result.error }),
    ...extra,
  });
}
