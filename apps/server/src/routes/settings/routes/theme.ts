/**
 * POST /theme endpoint - Select the dashboard theme
 *
 * Body: { theme }. Only names present in the theme catalog are accepted.
 */

import type { Request, Response } from 'express';
import type { SettingsService } from '../../../services/settings-service.js';
import type { ThemeCatalog } from '../../../lib/themes.js';
import type { EventEmitter } from '../../../lib/events.js';
import { asObject, getString } from '../../../lib/json.js';
import { emitSettingsChanged, getErrorMessage, logError } from '../common.js';

export function createSetThemeHandler(
  settings: SettingsService,
  catalog: ThemeCatalog,
  events?: EventEmitter
) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const theme = getString(asObject(req.body), 'theme').trim();
      if (!theme || !Object.hasOwn(catalog, theme)) {
        res.status(400).json({ success: false, error: 'Unknown theme' });
        return;
      }

      await settings.setTheme(theme);
      emitSettingsChanged(events, 'appearance.theme');

      res.json({ success: true, message: `Theme set to ${theme}` });
    } catch (error) {
      logError(error, 'Set theme failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
