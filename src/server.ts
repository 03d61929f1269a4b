/**
 * Process entry point: load settings, wire services, start listening
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './api/index.js';
import { buildDependencies } from './bootstrap.js';
import { ConfigError, loadSettings, type Settings } from './config/index.js';
import { createLogger } from './logger/index.js';

function main(): void {
  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (error) {
    if (error instanceof ConfigError) {
      createLogger('server').error(error.message, { issues: error.issues });
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger('server', settings.logLevel);
  const app = createApp(buildDependencies(settings, logger));

  const server = serve({ fetch: app.fetch, port: settings.port }, (info) => {
    logger.info(`${settings.projectName} listening`, { port: info.port, apiPrefix: settings.apiPrefix });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
