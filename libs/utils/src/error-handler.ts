/**
 * Error handling helpers shared by services and route handlers
 */

/**
 * Extract a user-facing message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Check whether an error came from an aborted or timed-out request
 *
 * fetch/undici reject with `AbortError` when a signal aborts and with
 * `TimeoutError` when `AbortSignal.timeout()` fires.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Error raised for a non-2xx response from an upstream HTTP API.
 * `status` lets isTransientError() classify it.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, statusText = '') {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} from ${url}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}

/**
 * Read the errno-style `code` of a Node.js system error, if any
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
