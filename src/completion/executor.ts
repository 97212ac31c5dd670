/**
 * Runs one chat completion against a provider and hands back a Completion:
 * live fragments first, the merged result once they are drained.
 */

import type { ModelEntry } from '../models/catalog.js';
import type { ProviderAdapter } from '../providers/types.js';
import { ProviderError, SystemPromptUnsupportedError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ChatCompletionRequest, ChatMessage, CompletionOptions } from '../shared/types.js';
import { CompletionStream } from '../streaming/driver.js';
import type { Completion } from '../streaming/driver.js';
import { readableBytes } from '../streaming/sources.js';
import { ResolvedCompletion } from './response.js';

export interface ExecuteOptions extends CompletionOptions {
  /** Stream the response (default true). */
  stream?: boolean;
  /** Aborts the request, including a stream in progress. */
  signal?: AbortSignal;
}

/**
 * Fail before any network call when the prompt carries a system message the
 * model cannot take.
 */
export function assertSystemPromptSupported(model: ModelEntry, messages: ChatMessage[]): void {
  if (!model.supportsSystemPrompt && messages.some((m) => m.role === 'system')) {
    throw new SystemPromptUnsupportedError(model.id);
  }
}

export async function executeCompletion(
  adapter: ProviderAdapter,
  model: ModelEntry,
  messages: ChatMessage[],
  options: ExecuteOptions = {},
): Promise<Completion> {
  assertSystemPromptSupported(model, messages);

  const { stream = true, signal, ...generation } = options;
  const request: ChatCompletionRequest = {
    ...generation,
    model: model.modelName,
    messages,
  };

  logger.info(
    { provider: adapter.id, model: model.id, messages: messages.length, stream },
    `Chat completion request (model="${model.id}"${stream ? ', streaming' : ''})`,
  );

  if (!stream) {
    const response = await adapter.chatCompletion(model.modelName, request, signal);
    return ResolvedCompletion.fromResponse(response.body);
  }

  const response = await adapter.chatCompletionStream(model.modelName, request, signal);
  if (!response.body) {
    throw new ProviderError(adapter.id, model.modelName, response.status, 'Streaming response has no body');
  }

  return new CompletionStream(
    readableBytes(response.body),
    { provider: adapter.id, model: model.id },
    signal,
  );
}
