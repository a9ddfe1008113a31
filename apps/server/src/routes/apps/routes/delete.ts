/**
 * DELETE /:name endpoint - Remove one app
 */

import type { Request, Response } from 'express';
import type { AppStore } from '../../../services/app-store.js';
import type { EventEmitter } from '../../../lib/events.js';
import { routeParam } from '../../common.js';
import { getErrorMessage, logError } from '../common.js';

export function createDeleteHandler(store: AppStore, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const name = routeParam(req, 'name');
      if (!(await store.delete(name))) {
        res.status(404).json({ success: false, error: 'App not found' });
        return;
      }
      events?.emit('apps:changed', { action: 'deleted', name });
      res.json({ success: true });
    } catch (error) {
      logError(error, 'Delete app failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
