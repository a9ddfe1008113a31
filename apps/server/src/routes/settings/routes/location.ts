/**
 * GET /location and POST /location endpoints - Weather location
 *
 * POST body: { city?, latitude?, longitude?, timezone?, use_auto?, units? }.
 * `use_auto` accepts a boolean or the form value "true"; fields that are
 * absent keep their saved value.
 */

import type { Request, Response } from 'express';
import type { LocationSettings } from '@homelab/types';
import type { SettingsService } from '../../../services/settings-service.js';
import type { EventEmitter } from '../../../lib/events.js';
import { asObject, type JsonObject } from '../../../lib/json.js';
import { emitSettingsChanged, getErrorMessage, logError } from '../common.js';

const TEXT_FIELDS = ['city', 'latitude', 'longitude', 'timezone'] as const;

/**
 * Location fields present in a request body
 *
 * @example
 * parseLocationForm({ city: ' Columbia ', use_auto: 'false', units: 'metric' })
 * // => { city: 'Columbia', use_auto: false, units: 'metric' }
 */
export function parseLocationForm(body: JsonObject): Partial<LocationSettings> {
  const fields: Partial<LocationSettings> = {};

  for (const key of TEXT_FIELDS) {
    const value = body[key];
    if (typeof value === 'string' || typeof value === 'number') {
      fields[key] = String(value).trim();
    }
  }

  const useAuto = body['use_auto'];
  if (typeof useAuto === 'boolean') {
    fields.use_auto = useAuto;
  } else if (typeof useAuto === 'string') {
    fields.use_auto = useAuto.toLowerCase() === 'true';
  }

  const units = body['units'];
  if (units === 'imperial' || units === 'metric') {
    fields.units = units;
  }

  return fields;
}

export function createGetLocationHandler(settings: SettingsService) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json({ success: true, location: await settings.getLocation() });
    } catch (error) {
      logError(error, 'Get location failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createSaveLocationHandler(settings: SettingsService, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const location = await settings.saveLocation(parseLocationForm(asObject(req.body)));
      emitSettingsChanged(events, 'location');
      res.json({ success: true, location });
    } catch (error) {
      logError(error, 'Save location failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
