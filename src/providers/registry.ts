/**
 * Provider registry: maps provider IDs to adapter instances.
 * Built once at startup from validated config.
 */

import type { ProviderConfig } from '../config/types.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { GenericOpenAIAdapter } from './adapters/generic-openai.js';
import { NeuralWattAdapter } from './adapters/neuralwatt.js';
import type { ProviderAdapter, ProviderRegistry as IProviderRegistry } from './types.js';

/** Registry of provider adapters, keyed by provider ID. */
export class ProviderRegistry implements IProviderRegistry {
  private readonly adapters: Map<string, ProviderAdapter>;

  constructor(adapters: Map<string, ProviderAdapter>) {
    this.adapters = adapters;
  }

  /**
   * Get a provider adapter by ID.
   * @throws ConfigError if the provider ID is not registered.
   */
  get(providerId: string): ProviderAdapter {
    const adapter = this.adapters.get(providerId);
    if (!adapter) {
      const available = Array.from(this.adapters.keys()).join(', ');
      throw new ConfigError(
        `Provider '${providerId}' not found in registry. Available: ${available}`,
      );
    }
    return adapter;
  }

  has(providerId: string): boolean {
    return this.adapters.has(providerId);
  }

  getAll(): ProviderAdapter[] {
    return Array.from(this.adapters.values());
  }

  get size(): number {
    return this.adapters.size;
  }
}

/**
 * Resolve a provider's bearer token: the config value, else its env variable.
 * @throws ConfigError when neither is set.
 */
export function resolveApiKey(
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (config.apiKey) return config.apiKey;

  const fromEnv = env[config.apiKeyEnv];
  if (fromEnv) return fromEnv;

  throw new ConfigError(
    `Provider '${config.id}' has no apiKey; set it in the config or export ${config.apiKeyEnv}`,
  );
}

/**
 * Build a provider registry from validated config.
 *
 * @param providers - Validated provider configurations.
 * @param defaultTimeoutMs - Timeout for providers that do not set their own.
 * @param env - Where apiKeyEnv variables are looked up.
 * @throws ConfigError if a key cannot be resolved.
 */
export function buildRegistry(
  providers: ProviderConfig[],
  defaultTimeoutMs?: number,
  env: NodeJS.ProcessEnv = process.env,
): ProviderRegistry {
  const adapters = new Map<string, ProviderAdapter>();

  for (const config of providers) {
    const adapter = createAdapter(config, resolveApiKey(config, env), defaultTimeoutMs);
    adapters.set(config.id, adapter);

    logger.debug(
      { provider: adapter.id, type: adapter.providerType, baseUrl: adapter.baseUrl },
      `Registered provider: ${adapter.name} (${adapter.providerType}) at ${adapter.baseUrl}`,
    );
  }

  return new ProviderRegistry(adapters);
}

function createAdapter(
  config: ProviderConfig,
  apiKey: string,
  defaultTimeoutMs?: number,
): ProviderAdapter {
  const timeout = config.timeout ?? defaultTimeoutMs;

  switch (config.type) {
    case 'neuralwatt':
      return new NeuralWattAdapter(config.id, config.name, apiKey, config.baseUrl, timeout);
    case 'generic-openai':
      if (!config.baseUrl) {
        throw new ConfigError(`Provider '${config.id}' (generic-openai) requires a baseUrl`);
      }
      return new GenericOpenAIAdapter(
        config.id,
        config.name,
        apiKey,
        config.baseUrl,
        timeout,
        config.dropParams,
      );
  }
}
