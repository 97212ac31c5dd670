/**
 * GET /v1/models handler.
 * Lists catalog models and their aliases in OpenAI list format.
 */

import { Hono } from 'hono';
import type { ModelCatalog } from '../../models/catalog.js';
import type { ModelsResponse } from '../../shared/types.js';

export function createModelsRoutes(catalog: ModelCatalog) {
  const app = new Hono();

  app.get('/models', (c) => {
    const body: ModelsResponse = {
      object: 'list',
      data: catalog.toModelInfos(Math.floor(Date.now() / 1000)),
    };
    return c.json(body);
  });

  return app;
}
