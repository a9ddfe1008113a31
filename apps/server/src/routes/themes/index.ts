/**
 * Theme routes - mounted at /api
 *
 * - GET /themes      - The whole catalog
 * - GET /theme/:name - One theme's colors
 */

import { Router } from 'express';
import type { ThemeCatalog } from '../../lib/themes.js';
import { createListThemesHandler } from './routes/list.js';
import { createGetThemeHandler } from './routes/get.js';

export function createThemeRoutes(catalog: ThemeCatalog): Router {
  const router = Router();

  router.get('/themes', createListThemesHandler(catalog));
  router.get('/theme/:name', createGetThemeHandler(catalog));

  return router;
}
