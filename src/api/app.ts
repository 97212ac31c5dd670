/**
 * Hono application for the relay: health, model listing and chat completions.
 */

import { Hono } from 'hono';
import type { WattClient } from '../client.js';
import type { Settings } from '../config/types.js';
import { VERSION } from '../shared/version.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { createChatRoutes } from './routes/chat.js';
import { createHealthRoutes } from './routes/health.js';
import { createModelsRoutes } from './routes/models.js';

export function createApp(client: WattClient, settings: Pick<Settings, 'apiKeys'>) {
  const app = new Hono();

  app.onError(errorHandler);

  // Health route (no auth required)
  app.route('/health', createHealthRoutes(client, VERSION));

  const v1 = new Hono();
  v1.use('*', createAuthMiddleware(settings.apiKeys));
  v1.route('/', createChatRoutes(client));
  v1.route('/', createModelsRoutes(client.catalog));

  app.route('/v1', v1);

  return app;
}
