/**
 * Abstract base adapter with shared HTTP request logic.
 * Concrete adapters extend this and override body preparation where their
 * endpoint needs it.
 */

import { z } from 'zod';
import { ChatCompletionResponseSchema } from '../completion/schema.js';
import { ProviderError, ProviderRateLimitError, TransportError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ChatCompletionRequest } from '../shared/types.js';
import type { ProviderAdapter, ProviderResponse } from './types.js';

export abstract class BaseAdapter implements ProviderAdapter {
  public readonly id: string;
  public readonly providerType: string;
  public readonly name: string;
  public readonly baseUrl: string;
  protected readonly apiKey: string;
  public readonly timeout?: number;

  constructor(
    id: string,
    providerType: string,
    name: string,
    apiKey: string,
    baseUrl: string,
    timeout?: number,
  ) {
    this.id = id;
    this.providerType = providerType;
    this.name = name;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeout = timeout;
  }

  /**
   * Send a non-streaming chat completion request to the provider.
   * Handles URL construction, headers, latency measurement, and error detection.
   */
  async chatCompletion(
    model: string,
    body: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<ProviderResponse> {
    const requestBody = this.prepareRequestBody(model, { ...body, stream: false });

    logger.debug({ provider: this.id, model }, 'Sending chat completion request');

    const start = performance.now();
    const response = await this.post(requestBody, 'application/json', signal);
    const latencyMs = Math.round(performance.now() - start);

    await this.assertOk(response, model, latencyMs);

    const parsed = ChatCompletionResponseSchema.safeParse(
      await this.readJson(response, model, latencyMs),
    );
    if (!parsed.success) {
      logger.error({ provider: this.id, model, latencyMs }, 'Provider returned an invalid body');
      throw new ProviderError(this.id, model, response.status, z.prettifyError(parsed.error));
    }

    logger.debug(
      { provider: this.id, model, status: response.status, latencyMs },
      'Chat completion succeeded',
    );

    return {
      status: response.status,
      body: parsed.data,
      headers: response.headers,
      latencyMs,
    };
  }

  /**
   * Send a streaming chat completion request to the provider.
   * Returns the raw Response with its ReadableStream body unread.
   */
  async chatCompletionStream(
    model: string,
    body: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<Response> {
    // include_usage makes the server send token counts on the last chunk
    const requestBody = this.prepareRequestBody(model, {
      ...body,
      stream: true,
      stream_options: { include_usage: true },
    });

    logger.debug({ provider: this.id, model }, 'Starting streaming request');

    const start = performance.now();
    const response = await this.post(requestBody, 'text/event-stream', signal);
    const latencyMs = Math.round(performance.now() - start);

    await this.assertOk(response, model, latencyMs);

    if (!response.body) {
      throw new ProviderError(this.id, model, response.status, 'Streaming response has no body');
    }

    logger.debug({ provider: this.id, model, latencyMs }, 'Stream opened');
    return response;
  }

  /**
   * Prepare the request body for the provider.
   * Default: replace the model with the wire model name.
   */
  protected prepareRequestBody(
    model: string,
    body: ChatCompletionRequest,
  ): Record<string, unknown> {
    const { model: _originalModel, ...rest } = body;
    return { ...rest, model };
  }

  private async post(
    requestBody: Record<string, unknown>,
    accept: string,
    signal?: AbortSignal,
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': accept,
      'Authorization': `Bearer ${this.apiKey}`,
    };

    try {
      return await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify(requestBody),
        signal: this.withTimeout(signal),
      });
    } catch (error) {
      // No response at all: refused, DNS, or timed out before headers
      const transportError = TransportError.from(error, 'Request');
      logger.warn(
        { provider: this.id, reason: transportError.reason, error: transportError.message },
        'Provider request failed',
      );
      throw transportError;
    }
  }

  private async readJson(response: Response, model: string, latencyMs: number): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw TransportError.from(error, 'Response');
      }
      logger.error({ provider: this.id, model, latencyMs }, 'Provider returned a non-JSON body');
      throw new ProviderError(this.id, model, response.status, 'Response body is not valid JSON');
    }
  }

  /** Combine the caller's signal with this provider's timeout, if any. */
  private withTimeout(signal?: AbortSignal): AbortSignal | undefined {
    if (this.timeout === undefined) return signal;
    const timeoutSignal = AbortSignal.timeout(this.timeout);
    return signal ? AbortSignal.any([timeoutSignal, signal]) : timeoutSignal;
  }

  private async assertOk(response: Response, model: string, latencyMs: number): Promise<void> {
    if (response.status === 429) {
      const responseBody = await response.text();
      logger.warn({ provider: this.id, model, latencyMs }, 'Provider returned 429 rate limit');
      throw new ProviderRateLimitError(this.id, model, responseBody);
    }

    if (!response.ok) {
      const errorText = await response.text();
      logger.error(
        { provider: this.id, model, status: response.status, latencyMs },
        'Provider returned error',
      );
      throw new ProviderError(this.id, model, response.status, errorText);
    }
  }
}
