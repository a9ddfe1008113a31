/**
 * Integration settings endpoints
 *
 * - POST /integration/:name/toggle - Flip `enabled`
 * - POST /integration/:name        - Save connection fields
 * - POST /integration/:name/test   - Try unsaved fields against the service
 *
 * Names outside the integration registry are rejected before any write.
 */

import type { Request, Response } from 'express';
import { INTEGRATION_FIELDS, type IntegrationConfig, type IntegrationName } from '@homelab/types';
import type { SettingsService } from '../../../services/settings-service.js';
import {
  isIntegrationName,
  type IntegrationService,
} from '../../../services/integrations/index.js';
import type { EventEmitter } from '../../../lib/events.js';
import { asObject, type JsonObject } from '../../../lib/json.js';
import { routeParam } from '../../common.js';
import { emitSettingsChanged, getErrorMessage, logError } from '../common.js';

function integrationParam(req: Request, res: Response): IntegrationName | null {
  const name = routeParam(req, 'name');
  if (isIntegrationName(name)) return name;
  res.status(404).json({ success: false, error: `Unknown integration: ${name}` });
  return null;
}

/**
 * Connection fields present in a form body, trimmed. `enabled` is taken
 * when sent as a boolean.
 */
export function parseIntegrationForm(body: JsonObject): Partial<IntegrationConfig> {
  const fields: Partial<IntegrationConfig> = {};
  for (const field of INTEGRATION_FIELDS) {
    const value = body[field];
    if (typeof value === 'string') fields[field] = value.trim();
  }
  const enabled = body['enabled'];
  if (typeof enabled === 'boolean') fields.enabled = enabled;
  return fields;
}

export function createToggleIntegrationHandler(
  settings: SettingsService,
  events?: EventEmitter
) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const name = integrationParam(req, res);
      if (!name) return;

      const enabled = await settings.toggleIntegration(name);
      emitSettingsChanged(events, `integrations.${name}.enabled`);
      res.json({ success: true, enabled });
    } catch (error) {
      logError(error, 'Toggle integration failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createSaveIntegrationHandler(settings: SettingsService, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const name = integrationParam(req, res);
      if (!name) return;

      await settings.updateIntegration(name, parseIntegrationForm(asObject(req.body)));
      emitSettingsChanged(events, `integrations.${name}`);
      res.json({ success: true, message: 'Integration saved' });
    } catch (error) {
      logError(error, 'Save integration failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createTestIntegrationHandler(integrations: IntegrationService) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const name = integrationParam(req, res);
      if (!name) return;

      const result = await integrations.test(name, asObject(req.body));
      if (!result.ok) {
        res.status(400).json({
          success: false,
          reason: result.reason,
          error: result.error ?? 'Connection failed',
        });
        return;
      }

      res.json({ success: true, message: 'Connection successful', data: result.data });
    } catch (error) {
      logError(error, 'Test integration failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
