/**
 * Homelab dashboard server entry point
 *
 * Wires the services, serves the HTTP API and routes WebSocket upgrades to
 * the terminal bridge (/terminal) and the event socket (/api/events).
 */

import { createServer } from 'http';
import { createLogger, parseLogLevel, setLogLevel } from '@homelab/utils';
import { ensureDataDir } from '@homelab/platform';
import { loadConfig } from './lib/config.js';
import { createEventEmitter } from './lib/events.js';
import { loadThemes } from './lib/themes.js';
import { undiciClient } from './lib/http-client.js';
import { createApp } from './app.js';
import { AppStore } from './services/app-store.js';
import { DockerService } from './services/docker-service.js';
import { EventSocketService, EVENTS_PATH } from './services/event-socket.js';
import { IconService } from './services/icon-service.js';
import { IntegrationService } from './services/integrations/index.js';
import { LivenessProber } from './services/liveness-prober.js';
import { SettingsService } from './services/settings-service.js';
import { SystemStatsService } from './services/system-stats-service.js';
import { TERMINAL_PATH, TerminalService } from './services/terminal/terminal-service.js';
import { createWidgetCache } from './services/widgets/widget-cache.js';
import { WidgetService } from './services/widgets/widget-service.js';

setLogLevel(parseLogLevel(process.env.LOG_LEVEL));

const logger = createLogger('Server');

async function main(): Promise<void> {
  const config = loadConfig();
  const dataDir = await ensureDataDir(config.dataDir);
  const themes = await loadThemes();

  const events = createEventEmitter();
  const settings = new SettingsService(dataDir, { cacheTtlMs: config.settingsCacheTtlMs });
  const apps = new AppStore(dataDir, new LivenessProber());
  const docker = new DockerService({
    socketPath: config.dockerSocket,
    discoveryHost: config.discoveryHost,
  });
  const cache = createWidgetCache(config.cacheMaxEntries);
  const widgets = new WidgetService({ cache, http: undiciClient });
  const icons = new IconService(cache, undiciClient);
  const integrations = new IntegrationService(settings, {
    http: undiciClient,
    verifySsl: config.verifySsl,
  });

  const app = createApp({
    apps,
    settings,
    docker,
    system: new SystemStatsService(),
    icons,
    widgets,
    integrations,
    themes,
    events,
  });

  const server = createServer(app);
  const eventSocket = new EventSocketService(events);
  const terminal = config.terminalEnabled ? new TerminalService({ events }) : null;

  server.on('upgrade', (req, socket, head) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    if (pathname === TERMINAL_PATH && terminal) {
      terminal.handleUpgrade(req, socket, head);
    } else if (pathname === EVENTS_PATH) {
      eventSocket.handleUpgrade(req, socket, head);
    } else {
      socket.destroy();
    }
  });

  server.listen(config.port, config.host, () => {
    logger.info(`Listening on http://${config.host}:${config.port} (data: ${dataDir})`);
    if (!terminal) logger.info('Terminal disabled');
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down`);

    await Promise.all([terminal?.shutdown(), eventSocket.shutdown()]);
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Server stopped');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed:', error);
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
