/**
 * Stats routes - Host and Docker status
 */

import { Router } from 'express';
import type { DockerService } from '../../services/docker-service.js';
import type { SettingsService } from '../../services/settings-service.js';
import type { SystemStatsService } from '../../services/system-stats-service.js';
import { createStatsHandler } from './routes/stats.js';
import { createSystemInfoHandler } from './routes/system-info.js';

/**
 * Endpoints (mounted at /api):
 * - GET /stats       - Containers, host usage and widget layout
 * - GET /system-info - Hostname, platform, uptime, load and container counts
 */
export function createStatsRoutes(
  docker: DockerService,
  system: SystemStatsService,
  settings: SettingsService
): Router {
  const router = Router();

  router.get('/stats', createStatsHandler(docker, system, settings));
  router.get('/system-info', createSystemInfoHandler(docker, system));

  return router;
}
