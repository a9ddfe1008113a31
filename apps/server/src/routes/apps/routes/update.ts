/**
 * PUT /:name endpoint - Edit an app in place
 *
 * Body: any of { name, url, icon }; empty values are ignored. Fails with
 * 400 when the app does not exist or the new name belongs to another app.
 */

import type { Request, Response } from 'express';
import type { BookmarkAppUpdate } from '@homelab/types';
import type { AppStore } from '../../../services/app-store.js';
import type { EventEmitter } from '../../../lib/events.js';
import { asObject, getString } from '../../../lib/json.js';
import { routeParam } from '../../common.js';
import { getErrorMessage, logError } from '../common.js';

export function createUpdateHandler(store: AppStore, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const name = routeParam(req, 'name');
      const body = asObject(req.body);
      const fields: BookmarkAppUpdate = {
        name: getString(body, 'name'),
        url: getString(body, 'url'),
        icon: getString(body, 'icon'),
      };

      if (!(await store.update(name, fields))) {
        res.status(400).json({ success: false, error: 'Update failed or name conflict' });
        return;
      }

      events?.emit('apps:changed', { action: 'updated', name });
      res.json({ success: true });
    } catch (error) {
      logError(error, 'Update app failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
