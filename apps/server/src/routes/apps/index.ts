/**
 * App routes - HTTP API for bookmarked apps
 *
 * Mounted at /api/apps in the main server. Every mutation is broadcast as
 * an `apps:changed` (or `apps:imported`) event.
 */

import { Router } from 'express';
import type { AppStore } from '../../services/app-store.js';
import type { DockerService } from '../../services/docker-service.js';
import type { EventEmitter } from '../../lib/events.js';
import { createListHandler } from './routes/list.js';
import { createAddHandler } from './routes/add.js';
import { createAutodiscoverHandler } from './routes/autodiscover.js';
import { createImportHandler } from './routes/import.js';
import { createReorderHandler } from './routes/reorder.js';
import { createDeleteAllHandler } from './routes/delete-all.js';
import { createGetHandler } from './routes/get.js';
import { createUpdateHandler } from './routes/update.js';
import { createDeleteHandler } from './routes/delete.js';

/**
 * Create apps router with all endpoints
 *
 * Endpoints:
 * - GET    /              - List apps with live status
 * - POST   /add           - Add (or replace) an app
 * - GET    /autodiscover  - Candidates from Docker containers
 * - POST   /import        - Merge candidates, skipping duplicates
 * - POST   /reorder       - Apply a full order or move one app
 * - DELETE /              - Remove all apps
 * - GET    /:name         - One app
 * - PUT    /:name         - Edit an app
 * - DELETE /:name         - Remove an app
 */
export function createAppsRoutes(
  store: AppStore,
  docker: DockerService,
  events?: EventEmitter
): Router {
  const router = Router();

  router.get('/', createListHandler(store));
  router.post('/add', createAddHandler(store, events));
  router.get('/autodiscover', createAutodiscoverHandler(docker));
  router.post('/import', createImportHandler(store, events));
  router.post('/reorder', createReorderHandler(store, events));
  router.delete('/', createDeleteAllHandler(store, events));

  // Parameterized routes last so they do not shadow the fixed paths above
  router.get('/:name', createGetHandler(store));
  router.put('/:name', createUpdateHandler(store, events));
  router.delete('/:name', createDeleteHandler(store, events));

  return router;
}
