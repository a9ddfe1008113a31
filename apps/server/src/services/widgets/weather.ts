/**
 * Weather from Open-Meteo (no API key)
 */

import type { WeatherReport } from '@homelab/types';
import { requestJson, type HttpClient } from '../../lib/http-client.js';
import { asObject, getNumber, getObject, roundTo } from '../../lib/json.js';

const OPEN_METEO_URL = 'https://api.open-meteo.com/v1/forecast';

/** Used when no coordinates are known */
export const DEFAULT_COORDINATES = { lat: 34.0, lon: -81.0 } as const;

/** WMO weather interpretation codes */
const CONDITIONS: Record<number, string> = {
  0: 'Clear',
  1: 'Mainly Clear',
  2: 'Partly Cloudy',
  3: 'Overcast',
  45: 'Fog',
  48: 'Depositing Rime Fog',
  51: 'Light Drizzle',
  53: 'Drizzle',
  55: 'Dense Drizzle',
  56: 'Freezing Drizzle',
  57: 'Dense Freezing Drizzle',
  61: 'Slight Rain',
  63: 'Rain',
  65: 'Heavy Rain',
  66: 'Freezing Rain',
  67: 'Heavy Freezing Rain',
  71: 'Slight Snow',
  73: 'Snow',
  75: 'Heavy Snow',
  77: 'Snow Grains',
  80: 'Rain Showers',
  81: 'Moderate Showers',
  82: 'Violent Showers',
  85: 'Snow Showers',
  86: 'Heavy Snow Showers',
  95: 'Thunderstorm',
  96: 'Thunderstorm w/ Hail',
  99: 'Severe Thunderstorm',
};

const CURRENT_FIELDS = [
  'temperature_2m',
  'relative_humidity_2m',
  'apparent_temperature',
  'weather_code',
  'wind_speed_10m',
  'wind_direction_10m',
];

const RAIN_CODES = new Set([51, 53, 55, 56, 57, 61, 63, 65, 66, 67, 80, 81, 82]);
const SNOW_CODES = new Set([71, 73, 75, 77, 85, 86]);
const STORM_CODES = new Set([95, 96, 99]);

const COMPASS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
];

export function weatherCondition(code: number): string {
  return CONDITIONS[code] ?? 'Unknown';
}

/** Font Awesome icon class for a WMO code */
export function weatherIcon(code: number): string {
  if (code === 0) return 'fa-sun';
  if (code === 1 || code === 2) return 'fa-cloud-sun';
  if (code === 45 || code === 48) return 'fa-smog';
  if (RAIN_CODES.has(code)) return 'fa-cloud-rain';
  if (SNOW_CODES.has(code)) return 'fa-snowflake';
  if (STORM_CODES.has(code)) return 'fa-cloud-bolt';
  return 'fa-cloud';
}

/**
 * 16-point compass direction
 *
 * @example
 * windDirection(350) // => 'N'
 * windDirection(200) // => 'SSW'
 */
export function windDirection(degrees: number): string {
  const index = Math.trunc((degrees + 11.25) / 22.5) % 16;
  return COMPASS[index] ?? 'N';
}

function fahrenheitToCelsius(fahrenheit: number): number {
  return ((fahrenheit - 32) * 5) / 9;
}

export function buildWeatherUrl(lat: number, lon: number): string {
  const params = new URLSearchParams({
    latitude: String(lat),
    longitude: String(lon),
    current: CURRENT_FIELDS.join(','),
    temperature_unit: 'fahrenheit',
    wind_speed_unit: 'mph',
    timezone: 'auto',
  });
  return `${OPEN_METEO_URL}?${params.toString()}`;
}

/**
 * Shape an Open-Meteo forecast response. Values are whole numbers, truncated.
 */
export function parseWeather(payload: unknown, label: string): WeatherReport {
  const current = getObject(asObject(payload), 'current');
  const tempF = getNumber(current, 'temperature_2m');
  const feelsLikeF = getNumber(current, 'apparent_temperature', tempF);
  const code = getNumber(current, 'weather_code');

  return {
    temp_c: Math.trunc(roundTo(fahrenheitToCelsius(tempF), 1)),
    temp_f: Math.trunc(tempF),
    feels_like_c: Math.trunc(fahrenheitToCelsius(feelsLikeF)),
    feels_like_f: Math.trunc(feelsLikeF),
    condition: weatherCondition(code),
    humidity: Math.trunc(getNumber(current, 'relative_humidity_2m')),
    wind_mph: Math.trunc(getNumber(current, 'wind_speed_10m')),
    wind_dir: windDirection(getNumber(current, 'wind_direction_10m')),
    city: label,
    icon: weatherIcon(code),
  };
}

export async function fetchWeather(
  http: HttpClient,
  lat: number,
  lon: number,
  label: string
): Promise<WeatherReport> {
  const payload = await requestJson(http, buildWeatherUrl(lat, lon), { timeoutMs: 10_000 });
  return parseWeather(payload, label);
}
