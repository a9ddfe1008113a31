/**
 * Retry utility with exponential backoff for transient errors
 *
 * The dashboard has no request-level retry policy (the next client poll is
 * the retry). This is used for local resource exhaustion (EMFILE/ENFILE in
 * secure-fs) and to classify upstream failures for logging.
 */

import { createLogger } from './logger.js';
import { getErrorCode } from './error-handler.js';

const logger = createLogger('Retry');

/**
 * Sleep for a given duration with optional abort signal support
 */
function delay_(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Retry aborted'));
      return;
    }

    let onAbort: (() => void) | undefined;

    const timer = setTimeout(() => {
      if (onAbort && signal) {
        signal.removeEventListener('abort', onAbort);
      }
      resolve();
    }, ms);

    if (signal) {
      onAbort = () => {
        clearTimeout(timer);
        reject(new Error('Retry aborted'));
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/**
 * Configuration options for retry behavior
 */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds before first retry (default: 1000) */
  baseDelay?: number;
  /** Maximum delay in milliseconds between retries (default: 30000) */
  maxDelay?: number;
  /** Custom function to determine if an error is retryable (overrides default) */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each retry with attempt info */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** AbortSignal to cancel retries */
  signal?: AbortSignal;
}

/** Network-level error codes that indicate transient failures */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/** HTTP status codes that indicate transient server errors */
const TRANSIENT_HTTP_STATUS_CODES = new Set([502, 503, 504, 429]);

/** Error message patterns that indicate transient failures */
const TRANSIENT_MESSAGE_PATTERNS: RegExp[] = [
  /bad gateway/i,
  /service unavailable/i,
  /temporarily unavailable/i,
  /connection.*(?:refused|reset|timed?\s*out|closed)/i,
  /(?:request|socket|connection).*timed?\s*out/i,
  /fetch failed/i,
];

function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Check if an error represents a transient failure that should be retried
 *
 * Detects transient errors by checking, in order:
 * 1. Error `code` property for known network error codes (including the
 *    `cause` of a `fetch failed` TypeError)
 * 2. Error `status`/`statusCode` for HTTP 502, 503, 504, 429
 * 3. Error message content for transient failure patterns
 *
 * Auth and client errors (400, 401, 403, 404, 422) and aborts are never transient.
 */
export function isTransientError(error: unknown): boolean {
  if (!error) return false;

  if (error instanceof Error && error.name === 'AbortError') {
    return false;
  }

  const errorCode = getErrorCode(error);
  if (errorCode && TRANSIENT_NETWORK_CODES.has(errorCode)) {
    return true;
  }

  if (error instanceof Error && error.cause !== undefined) {
    const causeCode = getErrorCode(error.cause);
    if (causeCode && TRANSIENT_NETWORK_CODES.has(causeCode)) {
      return true;
    }
  }

  const status = getErrorStatus(error);
  if (status !== undefined) {
    return TRANSIENT_HTTP_STATUS_CODES.has(status);
  }

  const message = error instanceof Error ? error.message : String(error);
  return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Calculate the delay for a retry attempt using exponential backoff with jitter
 *
 * Jitter keeps the delay between 50% and 100% of the capped exponential value.
 *
 * @param attempt - The retry attempt number (0-based)
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelay: number,
  maxDelay: number
): number {
  const exponentialDelay = baseDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

/**
 * Execute an async operation with automatic retry on retryable errors
 *
 * Non-retryable errors are thrown immediately; the last error is thrown once
 * retries are exhausted.
 *
 * @example
 * ```typescript
 * const data = await retryWithBackoff(() => fs.readFile(file, 'utf-8'), {
 *   shouldRetry: (err) => getErrorCode(err) === 'EMFILE',
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30_000,
    shouldRetry = isTransientError,
    onRetry,
    signal,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      throw new Error('Retry aborted');
    }

    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, baseDelay, maxDelay);
      onRetry?.(error, attempt + 1, delay);

      logger.debug(`Retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries})`, {
        error: error instanceof Error ? error.message : String(error),
      });

      await delay_(delay, signal);
    }
  }

  throw lastError;
}
