/**
 * GET /reddit and GET /reddit-detailed endpoints - Top posts of a subreddit
 *
 * Query: sub (default "technology"). A name Reddit would not accept falls
 * back to the default rather than reaching the upstream URL.
 */

import type { Request, Response } from 'express';
import type { WidgetService } from '../../../services/widgets/widget-service.js';
import { sanitizeSubreddit } from '../../../services/widgets/reddit.js';
import { queryString } from '../../common.js';
import { getErrorMessage, logError, sendFetchResult } from '../common.js';

export function createRedditHandler(widgets: WidgetService, limit: number) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const subreddit = sanitizeSubreddit(queryString(req, 'sub'));
      sendFetchResult(res, await widgets.getRedditTop(subreddit, limit), { subreddit });
    } catch (error) {
      logError(error, 'Reddit widget failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
