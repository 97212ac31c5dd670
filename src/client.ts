/**
 * High-level client: config in, completions out.
 */

import { executeCompletion } from './completion/executor.js';
import type { ExecuteOptions } from './completion/executor.js';
import type { Config } from './config/types.js';
import { buildCatalog } from './models/catalog.js';
import type { ModelCatalog, ModelEntry } from './models/catalog.js';
import { buildRegistry } from './providers/registry.js';
import type { ProviderRegistry } from './providers/types.js';
import { ModelNotFoundError } from './shared/errors.js';
import type { ChatMessage } from './shared/types.js';
import { BlockingCompletionStream } from './streaming/driver.js';
import type { Completion } from './streaming/driver.js';
import { fileBytes } from './streaming/sources.js';

export class WattClient {
  constructor(
    public readonly registry: ProviderRegistry,
    public readonly catalog: ModelCatalog,
    public readonly defaultModel?: string,
  ) {}

  /**
   * Resolve a model id or alias, falling back to the configured default.
   * @throws ModelNotFoundError when nothing matches or no default exists.
   */
  resolveModel(idOrAlias?: string): ModelEntry {
    const wanted = idOrAlias ?? this.defaultModel;
    if (wanted === undefined) {
      throw new ModelNotFoundError('(none)', this.catalog.all().map((m) => m.id));
    }
    return this.catalog.resolve(wanted);
  }

  async complete(
    messages: ChatMessage[],
    model?: string,
    options: ExecuteOptions = {},
  ): Promise<Completion> {
    const entry = this.resolveModel(model);
    const adapter = this.registry.get(entry.providerId);
    return executeCompletion(adapter, entry, messages, options);
  }
}

export function createClient(config: Config, env: NodeJS.ProcessEnv = process.env): WattClient {
  return new WattClient(
    buildRegistry(config.providers, config.settings.requestTimeoutMs, env),
    buildCatalog(config),
    config.settings.defaultModel,
  );
}

/** Interpret a captured SSE body from disk with the blocking driver. */
export function replayCapture(path: string): BlockingCompletionStream {
  return new BlockingCompletionStream(fileBytes(path), { provider: 'replay', model: path });
}

/** Build the message list for a single prompt. */
export function buildMessages(prompt: string, system?: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (system) messages.push({ role: 'system', content: system });
  messages.push({ role: 'user', content: prompt });
  return messages;
}
