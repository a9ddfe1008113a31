/**
 * GET /autodiscover endpoint - Suggest apps from running Docker containers
 */

import type { Request, Response } from 'express';
import type { DockerService } from '../../../services/docker-service.js';
import { getErrorMessage, logError } from '../common.js';

export function createAutodiscoverHandler(docker: DockerService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const apps = await docker.discoverApps();
      res.json({ success: true, apps });
    } catch (error) {
      logError(error, 'Autodiscover apps failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
