/**
 * @homelab/utils
 * Shared utilities for the homelab dashboard
 */

// Logger
export {
  createLogger,
  getLogLevel,
  setLogLevel,
  parseLogLevel,
  LogLevel,
  type Logger,
} from './logger.js';

// Error handling
export { getErrorMessage, getErrorCode, isAbortError, HttpError } from './error-handler.js';

// Retry with backoff
export {
  isTransientError,
  calculateBackoffDelay,
  retryWithBackoff,
  type RetryOptions,
} from './retry.js';
