/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

/** Schema for a single provider definition. */
export const ProviderSchema = z.object({
  id: z.string().min(1, { message: 'Provider id must not be empty' }),
  name: z.string().min(1, { message: 'Provider name must not be empty' }),
  type: z.enum(['neuralwatt', 'generic-openai']),
  apiKey: z.string().min(1, { message: 'Provider apiKey must not be empty' }).optional(),
  apiKeyEnv: z.string().min(1).default('NEURALWATT_API_KEY'),
  baseUrl: z.url({ message: 'Provider baseUrl must be a valid URL' }).optional(),
  timeout: z.number().int().min(1000).optional(),
  dropParams: z.array(z.string().min(1)).default([]),
});

/** Schema for a model exposed under an id and any number of aliases. */
export const ModelSchema = z.object({
  id: z.string().min(1, { message: 'Model id must not be empty' }),
  provider: z.string().min(1, { message: 'Model provider must not be empty' }),
  modelName: z.string().min(1).optional(),
  aliases: z.array(z.string().min(1)).default([]),
  supportsSystemPrompt: z.boolean().default(true),
});

/** Schema for client and relay settings. */
export const SettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3790),
  apiKeys: z.array(z.string().min(1, { message: 'API key must not be empty' })).default([]),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  requestTimeoutMs: z.number().int().min(1000).default(60000),
  defaultModel: z.string().min(1).optional(),
});

/** Top-level config schema with cross-reference validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema.prefault({}),
    providers: z
      .array(ProviderSchema)
      .min(1, { message: 'At least one provider is required' }),
    models: z
      .array(ModelSchema)
      .min(1, { message: 'At least one model is required' }),
  })
  .refine(
    (config) => {
      const providerIds = new Set(config.providers.map((p) => p.id));
      return config.models.every((model) => providerIds.has(model.provider));
    },
    {
      message: 'A model references a provider id that does not exist in the providers list',
    },
  )
  .refine(
    (config) => {
      const names = config.models.flatMap((m) => [m.id, ...m.aliases]);
      return new Set(names).size === names.length;
    },
    {
      message: 'Model ids and aliases must be unique across all models',
    },
  )
  .refine(
    (config) => {
      const wanted = config.settings.defaultModel;
      if (wanted === undefined) return true;
      return config.models.some((m) => m.id === wanted || m.aliases.includes(wanted));
    },
    {
      message: 'settings.defaultModel must reference an existing model id or alias',
    },
  )
  .refine(
    (config) =>
      config.providers.every((p) => p.type !== 'generic-openai' || p.baseUrl !== undefined),
    {
      message: 'generic-openai providers require a baseUrl',
    },
  );
