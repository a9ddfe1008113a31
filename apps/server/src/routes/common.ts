/**
 * Common utilities shared across all route modules
 */

import type { Request } from 'express';
import { getErrorMessage, type Logger } from '@homelab/utils';

export { getErrorMessage };

/**
 * Create a logError function bound to a module logger
 *
 * @example
 * const logError = createLogError(logger);
 * logError(error, 'Add app failed');
 */
export function createLogError(logger: Logger) {
  return (error: unknown, context: string): void => {
    logger.error(`${context}:`, error);
  };
}

/**
 * A single string query parameter; repeated or missing params yield `undefined`
 */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

/** A numeric query parameter, or `undefined` when absent or not a number */
export function queryNumber(req: Request, name: string): number | undefined {
  const value = queryString(req, name);
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** A route parameter, always a string under Express 4 and 5 */
export function routeParam(req: Request, name: string): string {
  const value: unknown = req.params[name];
  return typeof value === 'string' ? value : '';
}
