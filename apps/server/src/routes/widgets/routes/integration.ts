/**
 * Integration widget endpoints - one per configured homelab service
 */

import type { Request, Response } from 'express';
import type { IntegrationName } from '@homelab/types';
import type { IntegrationService } from '../../../services/integrations/index.js';
import { getErrorMessage, logError, sendFetchResult } from '../common.js';

export function createIntegrationWidgetHandler(
  integrations: IntegrationService,
  name: IntegrationName
) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      sendFetchResult(res, await integrations.fetch(name));
    } catch (error) {
      logError(error, `${name} widget failed`);
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
