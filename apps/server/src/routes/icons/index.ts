/**
 * Icon routes - mounted at /api/icons
 */

import { Router } from 'express';
import type { IconService } from '../../services/icon-service.js';
import { createSearchHandler } from './routes/search.js';

export function createIconRoutes(icons: IconService): Router {
  const router = Router();

  router.get('/search', createSearchHandler(icons));

  return router;
}
