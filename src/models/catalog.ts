/**
 * Model catalog: resolves a model id or alias to its provider and wire name.
 */

import type { Config, ModelConfig } from '../config/types.js';
import { ModelNotFoundError } from '../shared/errors.js';
import type { ModelInfo } from '../shared/types.js';

/** A model ready to be requested. */
export interface ModelEntry {
  /** Catalog id, e.g. `neuralwatt/gpt-oss-20b`. */
  id: string;
  /** Provider instance ID. */
  providerId: string;
  /** Name sent on the wire. */
  modelName: string;
  aliases: string[];
  supportsSystemPrompt: boolean;
}

export class ModelCatalog {
  private readonly byName = new Map<string, ModelEntry>();
  private readonly entries: ModelEntry[];

  constructor(models: ModelConfig[]) {
    this.entries = models.map((m) => ({
      id: m.id,
      providerId: m.provider,
      modelName: m.modelName ?? m.id,
      aliases: [...m.aliases],
      supportsSystemPrompt: m.supportsSystemPrompt,
    }));

    for (const entry of this.entries) {
      this.byName.set(entry.id, entry);
    }
    // Ids take precedence over aliases
    for (const entry of this.entries) {
      for (const alias of entry.aliases) {
        if (!this.byName.has(alias)) this.byName.set(alias, entry);
      }
    }
  }

  /**
   * Look up a model by id, then by alias.
   * @throws ModelNotFoundError listing the known ids.
   */
  resolve(idOrAlias: string): ModelEntry {
    const entry = this.byName.get(idOrAlias);
    if (!entry) {
      throw new ModelNotFoundError(idOrAlias, this.entries.map((e) => e.id));
    }
    return entry;
  }

  all(): ModelEntry[] {
    return [...this.entries];
  }

  /** OpenAI-style listing; aliases are listed as models of their own. */
  toModelInfos(created: number = 0): ModelInfo[] {
    return this.entries.flatMap((entry) =>
      [entry.id, ...entry.aliases].map((id) => ({
        id,
        object: 'model' as const,
        created,
        owned_by: entry.providerId,
      })),
    );
  }
}

export function buildCatalog(config: Config): ModelCatalog {
  return new ModelCatalog(config.models);
}
