/**
 * GET /:name endpoint - One app's stored details (no status probe)
 */

import type { Request, Response } from 'express';
import type { AppStore } from '../../../services/app-store.js';
import { routeParam } from '../../common.js';
import { getErrorMessage, logError } from '../common.js';

export function createGetHandler(store: AppStore) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const app = await store.get(routeParam(req, 'name'));
      if (!app) {
        res.status(404).json({ success: false, error: 'App not found' });
        return;
      }
      res.json({ success: true, app });
    } catch (error) {
      logError(error, 'Get app failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
