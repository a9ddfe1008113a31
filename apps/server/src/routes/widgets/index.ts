/**
 * Widget routes - Data for dashboard widgets
 *
 * Mounted at /api/widgets. Every endpoint answers
 * `{ success: true, data }` or `{ success: false, reason, error? }`;
 * upstream failures use 502 and an empty cache 503.
 */

import { Router } from 'express';
import type { IntegrationName } from '@homelab/types';
import type { SettingsService } from '../../services/settings-service.js';
import type { WidgetService } from '../../services/widgets/widget-service.js';
import type { IntegrationService } from '../../services/integrations/index.js';
import { BAR_COINS } from '../../services/widgets/crypto.js';
import { createWeatherHandler } from './routes/weather.js';
import { createHackerNewsHandler, createHeadlinesHandler } from './routes/news.js';
import { createRedditHandler } from './routes/reddit.js';
import { createCryptoHandler } from './routes/crypto.js';
import { createEarthquakesHandler, createThreatsHandler } from './routes/security.js';
import { createIntegrationWidgetHandler } from './routes/integration.js';

/** URL segment → integration */
const INTEGRATION_PATHS: ReadonlyArray<[string, IntegrationName]> = [
  ['pihole', 'pihole'],
  ['portainer', 'portainer'],
  ['proxmox', 'proxmox'],
  ['speedtest', 'speedtest'],
  ['uptime-kuma', 'uptime_kuma'],
  ['audiobookshelf', 'audiobookshelf'],
];

export interface WidgetRoutesDeps {
  widgets: WidgetService;
  integrations: IntegrationService;
  settings: SettingsService;
}

/**
 * Endpoints:
 * - GET /weather, /weather-bar            - Current weather (?city, ?lat, ?lon)
 * - GET /news, /news-detailed             - Hacker News, 5 or 10 stories
 * - GET /headlines                        - World headlines
 * - GET /reddit, /reddit-detailed         - Subreddit top posts (?sub), 5 or 10
 * - GET /crypto, /crypto-bar              - Coin prices
 * - GET /threats                          - Aggregate threat level
 * - GET /earthquakes                      - USGS quakes, M4.5+
 * - GET /pihole, /portainer, /proxmox, /speedtest, /uptime-kuma, /audiobookshelf
 */
export function createWidgetRoutes({ widgets, integrations, settings }: WidgetRoutesDeps): Router {
  const router = Router();

  const weather = createWeatherHandler(widgets, settings);
  router.get('/weather', weather);
  router.get('/weather-bar', weather);

  router.get('/news', createHackerNewsHandler(widgets, 5));
  router.get('/news-detailed', createHackerNewsHandler(widgets, 10));
  router.get('/headlines', createHeadlinesHandler(widgets));

  router.get('/reddit', createRedditHandler(widgets, 5));
  router.get('/reddit-detailed', createRedditHandler(widgets, 10));

  router.get('/crypto', createCryptoHandler(widgets));
  router.get('/crypto-bar', createCryptoHandler(widgets, BAR_COINS));

  router.get('/threats', createThreatsHandler(widgets));
  router.get('/earthquakes', createEarthquakesHandler(widgets));

  for (const [path, name] of INTEGRATION_PATHS) {
    router.get(`/${path}`, createIntegrationWidgetHandler(integrations, name));
  }

  return router;
}
