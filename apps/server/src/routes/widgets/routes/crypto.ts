/**
 * GET /crypto and GET /crypto-bar endpoints - Coin prices in USD
 */

import type { Request, Response } from 'express';
import type { WidgetService } from '../../../services/widgets/widget-service.js';
import { getErrorMessage, logError, sendFetchResult } from '../common.js';

export function createCryptoHandler(widgets: WidgetService, coins?: string[]) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      sendFetchResult(res, await widgets.getCryptoPrices(coins));
    } catch (error) {
      logError(error, 'Crypto widget failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
