/**
 * GET / endpoint - The whole settings document, merged onto defaults
 */

import type { Request, Response } from 'express';
import type { SettingsService } from '../../../services/settings-service.js';
import { getErrorMessage, logError } from '../common.js';

export function createGetSettingsHandler(settings: SettingsService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json({ success: true, settings: await settings.load() });
    } catch (error) {
      logError(error, 'Get settings failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
