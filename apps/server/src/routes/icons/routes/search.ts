/**
 * GET /search endpoint - Find dashboard icons by name
 *
 * Query: q (substring, case-insensitive). When the icon index cannot be
 * fetched the list is empty rather than an error, so the picker still opens.
 */

import type { Request, Response } from 'express';
import type { IconService } from '../../../services/icon-service.js';
import { queryString } from '../../common.js';
import { getErrorMessage, logError } from '../common.js';

export function createSearchHandler(icons: IconService) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const query = (queryString(req, 'q') ?? '').trim();
      const result = await icons.search(query);

      res.json({ success: true, query, icons: result.ok ? result.data : [] });
    } catch (error) {
      logError(error, 'Icon search failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
