/**
 * GET / endpoint - List bookmarked apps with live status
 *
 * Every app is probed on each call; the response keeps display order.
 */

import type { Request, Response } from 'express';
import type { AppStore } from '../../../services/app-store.js';
import { DEFAULT_ICON } from '../../../services/icon-service.js';
import { getErrorMessage, logError } from '../common.js';

export function createListHandler(store: AppStore) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const apps = await store.listWithStatus();
      res.json({ success: true, apps, default_icon: DEFAULT_ICON });
    } catch (error) {
      logError(error, 'List apps failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
