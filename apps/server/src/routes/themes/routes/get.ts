/**
 * GET /theme/:name endpoint - Colors of one theme
 *
 * An unknown name resolves to the fallback theme; 404 only when the
 * catalog has neither.
 */

import type { Request, Response } from 'express';
import { getThemeColors, type ThemeCatalog } from '../../../lib/themes.js';
import { routeParam } from '../../common.js';

export function createGetThemeHandler(catalog: ThemeCatalog) {
  return (req: Request, res: Response): void => {
    const colors = getThemeColors(catalog, routeParam(req, 'name'));
    if (!colors) {
      res.status(404).json({ success: false, error: 'Theme not found' });
      return;
    }
    res.json({ success: true, colors });
  };
}
