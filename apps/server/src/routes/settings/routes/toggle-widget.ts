/**
 * POST /widget/:name/toggle endpoint - Show or hide a widget
 */

import type { Request, Response } from 'express';
import { isSafeSettingsKey, type SettingsService } from '../../../services/settings-service.js';
import type { EventEmitter } from '../../../lib/events.js';
import { routeParam } from '../../common.js';
import { emitSettingsChanged, getErrorMessage, logError } from '../common.js';

export function createToggleWidgetHandler(settings: SettingsService, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const name = routeParam(req, 'name');
      if (!isSafeSettingsKey(name)) {
        res.status(400).json({ success: false, error: 'Invalid widget name' });
        return;
      }
      const enabled = await settings.toggleWidget(name);
      emitSettingsChanged(events, `widgets.${name}.enabled`);
      res.json({ success: true, enabled });
    } catch (error) {
      logError(error, 'Toggle widget failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
