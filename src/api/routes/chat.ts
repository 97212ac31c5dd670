/**
 * POST /v1/chat/completions handler.
 * Runs the completion and relays it: live `delta` events while streaming,
 * then one `result` event carrying the merged result (with energy), then
 * `[DONE]`. Without `stream`, responds with the merged result as JSON.
 */

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import type { WattClient } from '../../client.js';
import { InvalidRequestError, TransportError } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import { collectCompletion } from '../../streaming/driver.js';
import { ChatRequestSchema } from '../schema.js';

export function createChatRoutes(client: WattClient) {
  const app = new Hono();

  app.post('/chat/completions', async (c) => {
    let json: unknown;
    try {
      json = await c.req.json();
    } catch {
      throw new InvalidRequestError('Request body must be valid JSON');
    }

    const parsed = ChatRequestSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidRequestError(z.prettifyError(parsed.error));
    }

    const { model, messages, stream, ...options } = parsed.data;

    if (!stream) {
      const completion = await client.complete(messages, model, { ...options, stream: false });
      const { result } = await collectCompletion(completion);
      return c.json(result);
    }

    // Aborted when the client disconnects; tears down the upstream fetch
    const abortController = new AbortController();

    // Opened before streamSSE() so pre-stream failures become JSON errors
    const completion = await client.complete(messages, model, {
      ...options,
      stream: true,
      signal: abortController.signal,
    });

    return streamSSE(c, async (sse) => {
      sse.onAbort(() => {
        logger.debug({ model }, 'Client disconnected, aborting upstream stream');
        abortController.abort();
      });

      try {
        for await (const fragment of completion) {
          await sse.writeSSE({ event: 'delta', data: JSON.stringify({ content: fragment }) });
        }
        await sse.writeSSE({ event: 'result', data: JSON.stringify(completion.finalize()) });
        await sse.writeSSE({ data: '[DONE]' });
      } catch (error: unknown) {
        if (abortController.signal.aborted) {
          logger.debug({ model }, 'Upstream stream aborted (client disconnect)');
          return;
        }

        const transportError = TransportError.from(error);
        logger.error(
          { model, reason: transportError.reason, error: transportError.message },
          'Mid-stream failure, closing relay stream',
        );
        await sse.writeSSE({
          event: 'error',
          data: JSON.stringify(transportError.toOpenAIError()),
        });
      }
    });
  });

  return app;
}
