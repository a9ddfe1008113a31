/**
 * GET /themes endpoint - Every theme in the catalog
 */

import type { Request, Response } from 'express';
import type { ThemeCatalog } from '../../../lib/themes.js';

export function createListThemesHandler(catalog: ThemeCatalog) {
  return (_req: Request, res: Response): void => {
    res.json({ success: true, themes: catalog });
  };
}
