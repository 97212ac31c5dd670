/**
 * Core provider adapter types.
 * Defines the uniform interface that all provider adapters implement.
 */

import type { ParsedCompletionResponse } from '../completion/schema.js';
import type { ChatCompletionRequest } from '../shared/types.js';

/** Normalized response from a provider's non-streaming endpoint. */
export interface ProviderResponse {
  /** HTTP status code from the provider. */
  status: number;
  /** Validated chat completion response body. */
  body: ParsedCompletionResponse;
  /** Raw response headers. */
  headers: Headers;
  /** Time taken for the request in milliseconds. */
  latencyMs: number;
}

/**
 * Uniform interface for all provider adapters.
 * The executor and registry work exclusively through this interface.
 */
export interface ProviderAdapter {
  /** Unique provider instance ID from config. */
  readonly id: string;
  /** Provider type discriminator (e.g., 'neuralwatt', 'generic-openai'). */
  readonly providerType: string;
  /** Human-readable display name. */
  readonly name: string;
  /** API base URL for this provider. */
  readonly baseUrl: string;
  /** Request timeout in milliseconds, covering the whole stream. */
  readonly timeout?: number;

  /**
   * Send a non-streaming chat completion request.
   * @param model - Wire model name.
   * @param body - The request body (model field is overridden).
   * @param signal - Optional AbortSignal for request cancellation.
   * @throws ProviderRateLimitError on 429 responses.
   * @throws ProviderError on other non-OK responses or an invalid body.
   */
  chatCompletion(
    model: string,
    body: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<ProviderResponse>;

  /**
   * Send a streaming chat completion request.
   * Returns the raw fetch Response so the caller can read the SSE body.
   * @throws ProviderRateLimitError on 429 responses (before the stream starts).
   * @throws ProviderError on other non-OK responses or a missing body.
   */
  chatCompletionStream(
    model: string,
    body: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<Response>;
}

/** Registry of provider adapters, keyed by provider instance ID. */
export interface ProviderRegistry {
  /**
   * Get a provider adapter by its instance ID.
   * @throws ConfigError if the provider ID is not registered.
   */
  get(providerId: string): ProviderAdapter;

  has(providerId: string): boolean;

  getAll(): ProviderAdapter[];

  readonly size: number;
}
