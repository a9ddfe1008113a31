/**
 * GET /threats and GET /earthquakes endpoints
 */

import type { Request, Response } from 'express';
import type { WidgetService } from '../../../services/widgets/widget-service.js';
import { getErrorMessage, logError, sendFetchResult } from '../common.js';

export function createThreatsHandler(widgets: WidgetService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      sendFetchResult(res, await widgets.getThreatStatus());
    } catch (error) {
      logError(error, 'Threat widget failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createEarthquakesHandler(widgets: WidgetService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      sendFetchResult(res, await widgets.getEarthquakes());
    } catch (error) {
      logError(error, 'Earthquake widget failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
