/**
 * GET /system-info endpoint - Host details plus container counts
 */

import type { Request, Response } from 'express';
import type { DockerService } from '../../../services/docker-service.js';
import type { SystemStatsService } from '../../../services/system-stats-service.js';
import { getErrorMessage, logError } from '../common.js';

export function createSystemInfoHandler(docker: DockerService, system: SystemStatsService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const { containers } = await docker.listContainers();

      res.json({
        success: true,
        ...system.systemInfo(),
        containers_total: containers.length,
        containers_running: containers.filter((c) => c.status === 'running').length,
      });
    } catch (error) {
      logError(error, 'Get system info failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
