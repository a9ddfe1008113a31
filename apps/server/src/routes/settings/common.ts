/**
 * Common utilities for settings routes
 */

import { createLogger } from '@homelab/utils';
import type { EventEmitter } from '../../lib/events.js';
import { getErrorMessage as getErrorMessageShared, createLogError } from '../common.js';

const logger = createLogger('Settings');

// Re-export shared utilities
export { getErrorMessageShared as getErrorMessage };
export const logError = createLogError(logger);

/**
 * Tell dashboard clients that a setting changed
 */
export function emitSettingsChanged(events: EventEmitter | undefined, path: string): void {
  events?.emit('settings:changed', { path });
}
