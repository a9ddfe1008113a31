/**
 * Settings routes - HTTP API for persisted dashboard settings
 *
 * Mounted at /api/settings. Every write emits `settings:changed` with the
 * dotted path that changed.
 */

import { Router } from 'express';
import type { SettingsService } from '../../services/settings-service.js';
import type { IntegrationService } from '../../services/integrations/index.js';
import type { ThemeCatalog } from '../../lib/themes.js';
import type { EventEmitter } from '../../lib/events.js';
import { createGetSettingsHandler } from './routes/get.js';
import { createSetThemeHandler } from './routes/theme.js';
import { createGetLocationHandler, createSaveLocationHandler } from './routes/location.js';
import { createToggleWidgetHandler } from './routes/toggle-widget.js';
import {
  createSaveIntegrationHandler,
  createTestIntegrationHandler,
  createToggleIntegrationHandler,
} from './routes/integration.js';
import { createToggleSettingHandler, createUpdateSettingHandler } from './routes/setting.js';

export interface SettingsRoutesDeps {
  settings: SettingsService;
  integrations: IntegrationService;
  themes: ThemeCatalog;
  events?: EventEmitter;
}

/**
 * Create settings router with all endpoints
 *
 * Endpoints:
 * - GET  /                          - Full settings document
 * - POST /theme                     - Select a theme from the catalog
 * - GET  /location                  - Saved weather location
 * - POST /location                  - Update weather location
 * - POST /widget/:name/toggle       - Show/hide a widget
 * - POST /integration/:name/toggle  - Enable/disable an integration
 * - POST /integration/:name         - Save integration connection fields
 * - POST /integration/:name/test    - Test connection fields without saving
 * - POST /:section/:key/toggle      - Flip any boolean setting
 * - POST /:section/:key             - Set any setting
 */
export function createSettingsRoutes({
  settings,
  integrations,
  themes,
  events,
}: SettingsRoutesDeps): Router {
  const router = Router();

  router.get('/', createGetSettingsHandler(settings));
  router.post('/theme', createSetThemeHandler(settings, themes, events));
  router.get('/location', createGetLocationHandler(settings));
  router.post('/location', createSaveLocationHandler(settings, events));
  router.post('/widget/:name/toggle', createToggleWidgetHandler(settings, events));
  router.post('/integration/:name/toggle', createToggleIntegrationHandler(settings, events));
  router.post('/integration/:name/test', createTestIntegrationHandler(integrations));
  router.post('/integration/:name', createSaveIntegrationHandler(settings, events));

  // Generic paths last
  router.post('/:section/:key/toggle', createToggleSettingHandler(settings, events));
  router.post('/:section/:key', createUpdateSettingHandler(settings, events));

  return router;
}
