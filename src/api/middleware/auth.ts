/**
 * API key validation middleware for Hono.
 * Validates the Bearer token in the Authorization header against the
 * configured relay keys. With no keys configured, every request passes.
 */

import { createMiddleware } from 'hono/factory';

function unauthorized(message: string) {
  return {
    error: {
      message,
      type: 'invalid_request_error',
      param: null,
      code: 'invalid_api_key',
    },
  };
}

/**
 * Create an auth middleware that validates API keys from the Authorization header.
 * @param apiKeys - Valid relay keys from config; empty disables the check.
 */
export function createAuthMiddleware(apiKeys: string[]) {
  const keySet = new Set(apiKeys);

  return createMiddleware(async (c, next) => {
    if (keySet.size === 0) {
      await next();
      return;
    }

    const authorization = c.req.header('authorization');
    if (!authorization || !authorization.startsWith('Bearer ')) {
      return c.json(
        unauthorized('Missing API key. Send it in the Authorization header as Bearer <key>.'),
        401,
      );
    }

    if (!keySet.has(authorization.slice('Bearer '.length))) {
      return c.json(unauthorized('Invalid API key provided.'), 401);
    }

    await next();
  });
}
