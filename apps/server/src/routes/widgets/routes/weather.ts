/**
 * GET /weather and GET /weather-bar endpoints - Current conditions
 *
 * Query: city, lat, lon. With none of them, a manual location saved in
 * settings (use_auto off) is used; otherwise the default location.
 * The response carries the preferred units for display.
 */

import type { Request, Response } from 'express';
import type { LocationSettings } from '@homelab/types';
import type { SettingsService } from '../../../services/settings-service.js';
import type {
  WeatherQuery,
  WidgetService,
} from '../../../services/widgets/widget-service.js';
import { queryNumber, queryString } from '../../common.js';
import { getErrorMessage, logError, sendFetchResult } from '../common.js';

function parseCoordinate(value: string): number | undefined {
  if (value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Request parameters, falling back to the saved manual location
 *
 * @example
 * const saved = { ...location, use_auto: false, city: 'Oslo', latitude: '59.9', longitude: '10.7' };
 * resolveWeatherQuery({}, saved) // => { city: 'Oslo', lat: 59.9, lon: 10.7 }
 */
export function resolveWeatherQuery(
  query: WeatherQuery,
  location: LocationSettings
): WeatherQuery {
  const hasParams =
    query.city !== undefined || query.lat !== undefined || query.lon !== undefined;
  if (hasParams || location.use_auto) return query;

  const lat = parseCoordinate(location.latitude);
  const lon = parseCoordinate(location.longitude);
  const resolved: WeatherQuery = {};
  if (location.city) resolved.city = location.city;
  if (lat !== undefined && lon !== undefined) {
    resolved.lat = lat;
    resolved.lon = lon;
  }
  return resolved;
}

export function createWeatherHandler(widgets: WidgetService, settings: SettingsService) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const location = await settings.getLocation();
      const query = resolveWeatherQuery(
        {
          city: queryString(req, 'city'),
          lat: queryNumber(req, 'lat'),
          lon: queryNumber(req, 'lon'),
        },
        location
      );

      const result = await widgets.getWeather(query);
      sendFetchResult(res, result, { units: location.units });
    } catch (error) {
      logError(error, 'Weather widget failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
