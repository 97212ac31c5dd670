import { describe, it, expect } from 'vitest';
import { ModelCatalog } from '../catalog.js';
import { ModelNotFoundError } from '../../shared/errors.js';

const catalog = new ModelCatalog([
  {
    id: 'neuralwatt/gpt-oss-20b',
    provider: 'neuralwatt',
    modelName: 'openai/gpt-oss-20b',
    aliases: ['neuralwatt-gpt-oss', 'gpt'],
    supportsSystemPrompt: true,
  },
  {
    id: 'local/llama',
    provider: 'local',
    aliases: [],
    supportsSystemPrompt: false,
  },
]);

describe('ModelCatalog', () => {
  it('resolves a model by id', () => {
    expect(catalog.resolve('local/llama')).toEqual({
      id: 'local/llama',
      providerId: 'local',
      modelName: 'local/llama',
      aliases: [],
      supportsSystemPrompt: false,
    });
  });

  it('resolves an alias to the same entry as its id', () => {
    expect(catalog.resolve('gpt')).toBe(catalog.resolve('neuralwatt/gpt-oss-20b'));
    expect(catalog.resolve('neuralwatt-gpt-oss').modelName).toBe('openai/gpt-oss-20b');
  });

  it('prefers an id over an alias with the same name', () => {
    const shadowed = new ModelCatalog([
      { id: 'a', provider: 'p', aliases: ['b'], supportsSystemPrompt: true },
      { id: 'b', provider: 'q', aliases: [], supportsSystemPrompt: true },
    ]);
    expect(shadowed.resolve('b').providerId).toBe('q');
  });

  it('throws ModelNotFoundError listing the known ids', () => {
    expect(() => catalog.resolve('nope')).toThrow(ModelNotFoundError);
    expect(() => catalog.resolve('nope')).toThrow(
      "Unknown model 'nope'. Available: neuralwatt/gpt-oss-20b, local/llama",
    );
  });

  it('lists ids and aliases as OpenAI models', () => {
    expect(catalog.toModelInfos(1700000000)).toEqual([
      { id: 'neuralwatt/gpt-oss-20b', object: 'model', created: 1700000000, owned_by: 'neuralwatt' },
      { id: 'neuralwatt-gpt-oss', object: 'model', created: 1700000000, owned_by: 'neuralwatt' },
      { id: 'gpt', object: 'model', created: 1700000000, owned_by: 'neuralwatt' },
      { id: 'local/llama', object: 'model', created: 1700000000, owned_by: 'local' },
    ]);
  });

  it('returns a copy of its entries', () => {
    const entries = catalog.all();
    entries.pop();
    expect(catalog.all()).toHaveLength(2);
  });
});
