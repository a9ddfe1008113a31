/**
 * Earthquakes (USGS), disaster alerts (GDACS) and the aggregated threat level
 */

import { XMLParser } from 'fast-xml-parser';
import type {
  DisasterAlert,
  DisasterAlertLevel,
  Earthquake,
  QuakeAlert,
  ThreatLevel,
  ThreatStatus,
} from '@homelab/types';
import { requestJson, requestText, type HttpClient } from '../../lib/http-client.js';
import {
  asObject,
  getArray,
  getNumber,
  getObject,
  getString,
  objects,
  roundTo,
  toNumber,
} from '../../lib/json.js';

const USGS_FEED_URL = 'https://earthquake.usgs.gov/earthquakes/feed/v1.0/summary/4.5_day.geojson';
const GDACS_FEED_URL = 'https://www.gdacs.org/xml/rss.xml';

export const DEFAULT_MIN_MAGNITUDE = 4.5;

const MAX_QUAKES = 10;
const MAX_ALERTS = 10;
const DESCRIPTION_MAX_LENGTH = 200;

/** Entries of each kind carried on the threat status */
const THREAT_SAMPLE_SIZE = 5;

const QUAKE_ALERTS: ReadonlySet<string> = new Set(['green', 'yellow', 'orange', 'red']);

const EVENT_TYPES = ['earthquake', 'flood', 'cyclone', 'tsunami', 'volcano', 'drought'];

function isQuakeAlert(value: string): value is QuakeAlert {
  return QUAKE_ALERTS.has(value);
}

// ---------------------------------------------------------------------------
// USGS
// ---------------------------------------------------------------------------

/**
 * Quakes at or above `minMagnitude`, strongest first, at most ten
 */
export function parseEarthquakes(payload: unknown, minMagnitude: number): Earthquake[] {
  const features = objects(getArray(asObject(payload), 'features'));
  const quakes: Earthquake[] = [];

  for (const feature of features) {
    const props = getObject(feature, 'properties');
    const magnitude = getNumber(props, 'mag');
    if (!magnitude || magnitude < minMagnitude) continue;

    const coordinates = getArray(getObject(feature, 'geometry'), 'coordinates');
    const timestamp = getNumber(props, 'time');
    const iso = timestamp ? new Date(timestamp).toISOString() : '';
    const alert = getString(props, 'alert');

    quakes.push({
      magnitude: roundTo(magnitude, 1),
      place: getString(props, 'place', 'Unknown location'),
      time: iso ? `${iso.slice(11, 16)} UTC` : 'Unknown',
      date: iso ? iso.slice(0, 10) : 'Unknown',
      depth_km: coordinates.length > 2 ? roundTo(toNumber(coordinates[2]), 1) : 0,
      url: getString(props, 'url'),
      alert: isQuakeAlert(alert) ? alert : null,
      tsunami: getNumber(props, 'tsunami'),
      felt: getNumber(props, 'felt'),
    });
  }

  return quakes.sort((a, b) => b.magnitude - a.magnitude).slice(0, MAX_QUAKES);
}

export async function fetchEarthquakes(
  http: HttpClient,
  minMagnitude: number = DEFAULT_MIN_MAGNITUDE
): Promise<Earthquake[]> {
  const payload = await requestJson(http, USGS_FEED_URL, { timeoutMs: 10_000 });
  return parseEarthquakes(payload, minMagnitude);
}

// ---------------------------------------------------------------------------
// GDACS
// ---------------------------------------------------------------------------

const rssParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  htmlEntities: true,
  isArray: (_name, jpath) => jpath === 'rss.channel.item',
});

/**
 * Alert color from the feed's own level field, else from the wording
 */
export function classifyAlertLevel(
  title: string,
  description: string,
  declared = ''
): DisasterAlertLevel {
  const level = declared.trim().toLowerCase();
  if (level === 'red' || level === 'orange' || level === 'green') return level;

  const titleLower = title.toLowerCase();
  const descriptionLower = description.toLowerCase();
  if (titleLower.includes('red') || descriptionLower.includes('red alert')) return 'red';
  if (titleLower.includes('orange') || descriptionLower.includes('orange alert')) return 'orange';
  return 'green';
}

export function detectEventType(title: string, description: string): string {
  const text = `${title}\n${description}`.toLowerCase();
  return EVENT_TYPES.find((type) => text.includes(type)) ?? 'unknown';
}

export function stripHtml(html: string): string {
  return html.replace(/<[^>]+>/g, '');
}

export function parseDisasterAlerts(xml: string): DisasterAlert[] {
  const document = asObject(rssParser.parse(xml));
  const items = objects(getArray(getObject(getObject(document, 'rss'), 'channel'), 'item'));

  return items.slice(0, MAX_ALERTS).map((item) => {
    const title = getString(item, 'title');
    const description = getString(item, 'description');
    return {
      title,
      description: stripHtml(description).slice(0, DESCRIPTION_MAX_LENGTH),
      link: getString(item, 'link'),
      pub_date: getString(item, 'pubDate'),
      alert_level: classifyAlertLevel(title, description, getString(item, 'gdacs:alertlevel')),
      event_type: detectEventType(title, description),
    };
  });
}

export async function fetchDisasterAlerts(http: HttpClient): Promise<DisasterAlert[]> {
  const xml = await requestText(http, GDACS_FEED_URL, { timeoutMs: 10_000 });
  return parseDisasterAlerts(xml);
}

// ---------------------------------------------------------------------------
// Threat level
// ---------------------------------------------------------------------------

const THREAT_LEVELS: Record<ThreatLevel, { level: string; status: string; color: string }> = {
  5: { level: 'DEFCON 5', status: 'NOMINAL', color: 'green' },
  4: { level: 'DEFCON 4', status: 'ELEVATED', color: 'blue' },
  3: { level: 'DEFCON 3', status: 'INCREASED', color: 'yellow' },
  2: { level: 'DEFCON 2', status: 'HIGH', color: 'orange' },
  1: { level: 'DEFCON 1', status: 'MAXIMUM', color: 'red' },
};

function lowest(a: ThreatLevel, b: ThreatLevel): ThreatLevel {
  return a < b ? a : b;
}

/**
 * Combine quake and disaster data into a DEFCON-style level.
 * A magnitude 6+ quake or an orange alert raises it to 3; magnitude 7+ or
 * a red alert raises it to 2. Either list may be unavailable.
 */
export function buildThreatStatus(
  quakes: Earthquake[] | null,
  disasters: DisasterAlert[] | null
): ThreatStatus {
  let levelNum: ThreatLevel = 5;
  let alertsCount = 0;

  if (quakes) {
    const strongest = Math.max(0, ...quakes.map((quake) => quake.magnitude));
    if (strongest >= 7) levelNum = lowest(levelNum, 2);
    else if (strongest >= 6) levelNum = lowest(levelNum, 3);
  }

  if (disasters) {
    const red = disasters.filter((alert) => alert.alert_level === 'red').length;
    const orange = disasters.filter((alert) => alert.alert_level === 'orange').length;
    if (red > 0) levelNum = lowest(levelNum, 2);
    else if (orange > 0) levelNum = lowest(levelNum, 3);
    alertsCount = red + orange;
  }

  return {
    ...THREAT_LEVELS[levelNum],
    level_num: levelNum,
    earthquakes: (quakes ?? []).slice(0, THREAT_SAMPLE_SIZE),
    disasters: (disasters ?? []).slice(0, THREAT_SAMPLE_SIZE),
    alerts_count: alertsCount,
  };
}
