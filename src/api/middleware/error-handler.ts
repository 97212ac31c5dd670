/**
 * Global error handler returning OpenAI-format errors.
 *
 * Error mapping:
 * - InvalidRequestError, SystemPromptUnsupportedError -> 400
 * - ModelNotFoundError -> 404
 * - ProviderRateLimitError -> 429
 * - ProviderError -> 502
 * - TransportError -> 502 (504 on timeout)
 * - ConfigError -> 500 (no internal details exposed)
 * - Unknown -> 500
 */

import type { ErrorHandler } from 'hono';
import {
  ConfigError,
  InvalidRequestError,
  ModelNotFoundError,
  ProviderError,
  ProviderRateLimitError,
  SystemPromptUnsupportedError,
  TransportError,
} from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';

export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof InvalidRequestError || err instanceof SystemPromptUnsupportedError) {
    logger.info({ error: err.message }, 'Rejected invalid request');
    return c.json(err.toOpenAIError(), 400);
  }

  if (err instanceof ModelNotFoundError) {
    logger.info({ model: err.requested }, 'Unknown model requested');
    return c.json(err.toOpenAIError(), 404);
  }

  if (err instanceof ProviderRateLimitError) {
    logger.warn({ provider: err.providerId, model: err.model }, 'Provider rate limited');
    return c.json(err.toOpenAIError(), 429);
  }

  if (err instanceof ProviderError) {
    logger.warn(
      { provider: err.providerId, model: err.model, status: err.statusCode },
      'Provider request failed',
    );
    return c.json(err.toOpenAIError(), 502);
  }

  if (err instanceof TransportError) {
    logger.warn({ reason: err.reason, error: err.message }, 'Upstream transport failed');
    return c.json(err.toOpenAIError(), err.reason === 'timeout' ? 504 : 502);
  }

  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json(
      {
        error: {
          message: 'Internal configuration error',
          type: 'server_error',
          param: null,
          code: 'config_error',
        },
      },
      500,
    );
  }

  logger.error({ err }, 'Unhandled error');
  return c.json(
    {
      error: {
        message: 'Internal server error',
        type: 'server_error',
        param: null,
        code: null,
      },
    },
    500,
  );
};
