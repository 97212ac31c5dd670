/**
 * TypeScript types inferred from Zod schemas.
 */

import { z } from 'zod';
import { ConfigSchema, ModelSchema, ProviderSchema, SettingsSchema } from './schema.js';

/** Fully validated configuration. */
export type Config = z.infer<typeof ConfigSchema>;

/** A single provider configuration. */
export type ProviderConfig = z.infer<typeof ProviderSchema>;

/** A single model configuration. */
export type ModelConfig = z.infer<typeof ModelSchema>;

/** Client and relay settings. */
export type Settings = z.infer<typeof SettingsSchema>;

export { ConfigSchema, ModelSchema, ProviderSchema, SettingsSchema } from './schema.js';
