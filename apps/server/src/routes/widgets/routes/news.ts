/**
 * News endpoints
 *
 * - GET /news          - Top 5 Hacker News stories
 * - GET /news-detailed - Top 10 Hacker News stories
 * - GET /headlines     - World headlines from Reddit and Hacker News
 */

import type { Request, Response } from 'express';
import type { WidgetService } from '../../../services/widgets/widget-service.js';
import { getErrorMessage, logError, sendFetchResult } from '../common.js';

export function createHackerNewsHandler(widgets: WidgetService, limit: number) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      sendFetchResult(res, await widgets.getHackerNews(limit));
    } catch (error) {
      logError(error, 'News widget failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createHeadlinesHandler(widgets: WidgetService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      sendFetchResult(res, await widgets.getHeadlines(10));
    } catch (error) {
      logError(error, 'Headlines widget failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
