/**
 * Custom error classes for wattstream.
 * Errors that can reach an HTTP client produce OpenAI-compatible error bodies.
 */

import type { OpenAIErrorResponse } from './types.js';

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Non-2xx response from a provider, raised before any stream is read. */
export class ProviderError extends Error {
  public readonly providerId: string;
  public readonly model: string;
  public readonly statusCode: number;
  public readonly responseBody: string;

  constructor(providerId: string, model: string, statusCode: number, responseBody: string) {
    super(`Provider ${providerId} returned ${statusCode} for model ${model}`);
    this.name = 'ProviderError';
    this.providerId = providerId;
    this.model = model;
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }

  toOpenAIError(): OpenAIErrorResponse {
    return {
      error: {
        message: this.message,
        type: 'upstream_error',
        param: null,
        code: `upstream_${this.statusCode}`,
      },
    };
  }
}

/** Specifically a 429 rate limit error from a provider. */
export class ProviderRateLimitError extends ProviderError {
  constructor(providerId: string, model: string, responseBody: string = '') {
    super(providerId, model, 429, responseBody);
    this.name = 'ProviderRateLimitError';
  }

  override toOpenAIError(): OpenAIErrorResponse {
    return {
      error: {
        message: `Rate limited by provider ${this.providerId} for model ${this.model}.`,
        type: 'tokens_exceeded',
        param: null,
        code: 'rate_limit_exceeded',
      },
    };
  }
}

/** The connection to a provider failed: refused, reset or timed out. */
export class TransportError extends Error {
  public readonly reason: 'timeout' | 'network';

  constructor(reason: 'timeout' | 'network', message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.reason = reason;
  }

  /**
   * Wrap whatever fetch or a byte source threw into a TransportError.
   * `stage` prefixes the message, e.g. "Request timed out: ...".
   */
  static from(error: unknown, stage: string = 'Stream'): TransportError {
    if (error instanceof TransportError) return error;
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof Error && error.name === 'TimeoutError') {
      return new TransportError('timeout', `${stage} timed out: ${message}`, { cause: error });
    }
    return new TransportError('network', `${stage} failed: ${message}`, { cause: error });
  }

  toOpenAIError(): OpenAIErrorResponse {
    return {
      error: {
        message: this.message,
        type: 'server_error',
        param: null,
        code: this.reason === 'timeout' ? 'stream_timeout' : 'stream_error',
      },
    };
  }
}

/** A completion stream was used out of order (re-iterated, finalized early). */
export class StreamStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamStateError';
  }
}

/** The prompt has a system message but the target model rejects them. */
export class SystemPromptUnsupportedError extends Error {
  public readonly modelId: string;

  constructor(modelId: string) {
    super(`Model ${modelId} does not support system prompts`);
    this.name = 'SystemPromptUnsupportedError';
    this.modelId = modelId;
  }

  toOpenAIError(): OpenAIErrorResponse {
    return {
      error: {
        message: this.message,
        type: 'invalid_request_error',
        param: 'messages',
        code: 'system_prompt_unsupported',
      },
    };
  }
}

/** No model id or alias matched. */
export class ModelNotFoundError extends Error {
  public readonly requested: string;

  constructor(requested: string, available: string[]) {
    super(`Unknown model '${requested}'. Available: ${available.join(', ')}`);
    this.name = 'ModelNotFoundError';
    this.requested = requested;
  }

  toOpenAIError(): OpenAIErrorResponse {
    return {
      error: {
        message: this.message,
        type: 'invalid_request_error',
        param: 'model',
        code: 'model_not_found',
      },
    };
  }
}

/** The incoming relay request body failed validation. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }

  toOpenAIError(): OpenAIErrorResponse {
    return {
      error: {
        message: this.message,
        type: 'invalid_request_error',
        param: null,
        code: 'invalid_request',
      },
    };
  }
}
