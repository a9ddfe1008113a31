/**
 * Request logging middleware: `METHOD path -> status (ms)` at debug level
 */

import type { NextFunction, Request, Response } from 'express';
import { createLogger } from '@homelab/utils';

const logger = createLogger('HTTP');

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const started = performance.now();
  res.on('finish', () => {
    const elapsed = Math.round(performance.now() - started);
    logger.debug(`${req.method} ${req.originalUrl} -> ${res.statusCode} (${elapsed}ms)`);
  });
  next();
}
