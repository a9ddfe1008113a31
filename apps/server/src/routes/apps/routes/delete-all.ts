/**
 * DELETE / endpoint - Remove every bookmarked app
 */

import type { Request, Response } from 'express';
import type { AppStore } from '../../../services/app-store.js';
import type { EventEmitter } from '../../../lib/events.js';
import { getErrorMessage, logError } from '../common.js';

export function createDeleteAllHandler(store: AppStore, events?: EventEmitter) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      await store.deleteAll();
      events?.emit('apps:changed', { action: 'cleared' });
      res.json({ success: true });
    } catch (error) {
      logError(error, 'Delete all apps failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
