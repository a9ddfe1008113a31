/**
 * GET /stats endpoint - Everything the dashboard header polls for
 *
 * Docker containers (or the reason they could not be listed), host CPU and
 * memory, and the widget layout from settings.
 */

import type { Request, Response } from 'express';
import type { DockerService } from '../../../services/docker-service.js';
import type { SettingsService } from '../../../services/settings-service.js';
import type { SystemStatsService } from '../../../services/system-stats-service.js';
import { DEFAULT_ICON } from '../../../services/icon-service.js';
import { getErrorMessage, logError } from '../common.js';

export function createStatsHandler(
  docker: DockerService,
  system: SystemStatsService,
  settings: SettingsService
) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const [listing, document] = await Promise.all([docker.listContainers(), settings.load()]);

      res.json({
        success: true,
        containers: listing.containers,
        docker_error: listing.error,
        stats: system.stats(),
        widgets: document.widgets,
        updated_at: new Date().toISOString(),
        default_icon: DEFAULT_ICON,
      });
    } catch (error) {
      logError(error, 'Get stats failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
