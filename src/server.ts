/**
 * Relay server bootstrap: builds the client from config, creates the Hono
 * application and starts the HTTP server.
 */

import { serve } from '@hono/node-server';
import { createApp } from './api/app.js';
import { createClient } from './client.js';
import type { Config } from './config/types.js';
import { logger } from './shared/logger.js';
import { VERSION } from './shared/version.js';

export function startServer(config: Config, port: number = config.settings.port) {
  logger.info(`wattstream v${VERSION} starting...`);

  const client = createClient(config);
  const app = createApp(client, config.settings);

  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info({ port: info.port }, `wattstream relay listening on port ${info.port}`);
    logger.info(
      {
        providers: client.registry.size,
        models: client.catalog.all().length,
        defaultModel: config.settings.defaultModel ?? null,
        auth: config.settings.apiKeys.length > 0,
      },
      'Ready',
    );
  });

  const shutdown = () => {
    logger.info('Shutting down...');
    server.close(() => {
      logger.info('Server closed');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });

  return server;
}
