/**
 * Express application: JSON middleware and every /api router
 *
 * Kept apart from the entry point so tests can drive it with supertest
 * against in-process services.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createLogger, getErrorMessage } from '@homelab/utils';
import type { AppStore } from './services/app-store.js';
import type { DockerService } from './services/docker-service.js';
import type { IconService } from './services/icon-service.js';
import type { IntegrationService } from './services/integrations/index.js';
import type { SettingsService } from './services/settings-service.js';
import type { SystemStatsService } from './services/system-stats-service.js';
import type { WidgetService } from './services/widgets/widget-service.js';
import type { EventEmitter } from './lib/events.js';
import type { ThemeCatalog } from './lib/themes.js';
import { requestLogger } from './lib/request-logger.js';
import { createAppsRoutes } from './routes/apps/index.js';
import { createHealthRoutes } from './routes/health/index.js';
import { createIconRoutes } from './routes/icons/index.js';
import { createSettingsRoutes } from './routes/settings/index.js';
import { createStatsRoutes } from './routes/stats/index.js';
import { createThemeRoutes } from './routes/themes/index.js';
import { createWidgetRoutes } from './routes/widgets/index.js';

const logger = createLogger('Server');

export interface AppDeps {
  apps: AppStore;
  settings: SettingsService;
  docker: DockerService;
  system: SystemStatsService;
  icons: IconService;
  widgets: WidgetService;
  integrations: IntegrationService;
  themes: ThemeCatalog;
  events?: EventEmitter;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(requestLogger);
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use('/api/health', createHealthRoutes());
  app.use('/api/apps', createAppsRoutes(deps.apps, deps.docker, deps.events));
  app.use('/api', createStatsRoutes(deps.docker, deps.system, deps.settings));
  app.use('/api/icons', createIconRoutes(deps.icons));
  app.use('/api', createThemeRoutes(deps.themes));
  app.use(
    '/api/settings',
    createSettingsRoutes({
      settings: deps.settings,
      integrations: deps.integrations,
      themes: deps.themes,
      events: deps.events,
    })
  );
  app.use(
    '/api/widgets',
    createWidgetRoutes({
      widgets: deps.widgets,
      integrations: deps.integrations,
      settings: deps.settings,
    })
  );

  app.use('/api', (_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // Malformed JSON bodies and anything a handler let through
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = isClientError(error) ? 400 : 500;
    if (status === 500) logger.error('Unhandled request error:', error);
    res.status(status).json({ success: false, error: getErrorMessage(error) });
  });

  return app;
}

function isClientError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('status' in error)) return false;
  return error.status === 400;
}
