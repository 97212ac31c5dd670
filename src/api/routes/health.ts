/**
 * GET /health handler. No authentication required.
 */

import { Hono } from 'hono';
import type { WattClient } from '../../client.js';

export function createHealthRoutes(client: WattClient, version: string) {
  const app = new Hono();

  app.get('/', (c) => {
    return c.json({
      status: 'ok',
      version,
      uptime: process.uptime(),
      providers: client.registry.size,
      models: client.catalog.all().length,
    });
  });

  return app;
}
