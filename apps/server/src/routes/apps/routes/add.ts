/**
 * POST /add endpoint - Bookmark a new app
 *
 * Body: { name, url, icon? }. An existing app with the same name is
 * replaced. Without an icon the default dashboard icon is used.
 */

import type { Request, Response } from 'express';
import type { AppStore } from '../../../services/app-store.js';
import { DEFAULT_ICON } from '../../../services/icon-service.js';
import type { EventEmitter } from '../../../lib/events.js';
import { asObject, getString } from '../../../lib/json.js';
import { getErrorMessage, logError } from '../common.js';

export function createAddHandler(store: AppStore, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const body = asObject(req.body);
      const name = getString(body, 'name').trim();
      const url = getString(body, 'url').trim();
      const icon = getString(body, 'icon').trim() || DEFAULT_ICON;

      if (!name || !url) {
        res.status(400).json({ success: false, error: 'Name and URL/IP are required.' });
        return;
      }

      const app = await store.add(name, url, icon);
      events?.emit('apps:changed', { action: 'added', name });

      res.status(201).json({ success: true, app });
    } catch (error) {
      logError(error, 'Add app failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
