/**
 * Generic `section.key` endpoints
 *
 * - POST /:section/:key/toggle - Flip a boolean (missing counts as true)
 * - POST /:section/:key        - Body { value }; any JSON value is stored
 */

import type { Request, Response } from 'express';
import { isSafeSettingsPath, type SettingsService } from '../../../services/settings-service.js';
import type { EventEmitter } from '../../../lib/events.js';
import { asObject } from '../../../lib/json.js';
import { routeParam } from '../../common.js';
import { emitSettingsChanged, getErrorMessage, logError } from '../common.js';

const INVALID_PATH_ERROR = 'Invalid setting path';

export function createToggleSettingHandler(settings: SettingsService, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const section = routeParam(req, 'section');
      const key = routeParam(req, 'key');
      const path = `${section}.${key}`;
      if (!isSafeSettingsPath(path)) {
        res.status(400).json({ success: false, error: INVALID_PATH_ERROR });
        return;
      }
      const value = await settings.toggleSetting(section, key);
      emitSettingsChanged(events, path);
      res.json({ success: true, value });
    } catch (error) {
      logError(error, 'Toggle setting failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createUpdateSettingHandler(settings: SettingsService, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const path = `${routeParam(req, 'section')}.${routeParam(req, 'key')}`;
      if (!isSafeSettingsPath(path)) {
        res.status(400).json({ success: false, error: INVALID_PATH_ERROR });
        return;
      }

      const body = asObject(req.body);
      if (!Object.hasOwn(body, 'value')) {
        res.status(400).json({ success: false, error: 'value is required' });
        return;
      }

      await settings.set(path, body['value']);
      emitSettingsChanged(events, path);
      res.json({ success: true });
    } catch (error) {
      logError(error, 'Update setting failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
