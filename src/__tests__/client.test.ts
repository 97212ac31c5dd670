import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { buildMessages, createClient, replayCapture } from '../client.js';
import { parseConfig } from '../config/loader.js';
import { ConfigError, ModelNotFoundError } from '../shared/errors.js';

const DOCUMENT = {
  version: 1,
  providers: [{ id: 'neuralwatt', name: 'NeuralWatt', type: 'neuralwatt' }],
  models: [
    {
      id: 'neuralwatt/gpt-oss-20b',
      provider: 'neuralwatt',
      modelName: 'openai/gpt-oss-20b',
      aliases: ['neuralwatt-gpt-oss'],
    },
  ],
};

describe('createClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reads the provider key from the environment', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValue(new Response('data: [DONE]\n', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const client = createClient(parseConfig(DOCUMENT), { NEURALWATT_API_KEY: 'test-secret' });

    await client.complete(buildMessages('hi'), 'neuralwatt-gpt-oss');

    const headers = new Headers(fetchMock.mock.lastCall?.[1]?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-secret');
  });

  it('fails when no key can be found', () => {
    expect(() => createClient(parseConfig(DOCUMENT), {})).toThrow(ConfigError);
  });

  it('resolves the default model when none is given', () => {
    const client = createClient(
      parseConfig({ ...DOCUMENT, settings: { defaultModel: 'neuralwatt-gpt-oss' } }),
      { NEURALWATT_API_KEY: 'test-secret' },
    );
    expect(client.resolveModel().id).toBe('neuralwatt/gpt-oss-20b');
  });

  it('requires a model when no default is configured', () => {
    const client = createClient(parseConfig(DOCUMENT), { NEURALWATT_API_KEY: 'test-secret' });
    expect(() => client.resolveModel()).toThrow(ModelNotFoundError);
    expect(() => client.resolveModel()).toThrow("Unknown model '(none)'");
  });
});

describe('replayCapture', () => {
  it('interprets a capture file with the blocking driver', () => {
    const dir = mkdtempSync(join(tmpdir(), 'wattstream-replay-'));
    try {
      const path = join(dir, 'capture.sse');
      writeFileSync(
        path,
        'data: {"id":"t","choices":[{"delta":{"role":"assistant","content":"Hi"}}]}\n\n' +
          ': energy {"energy_joules": 60.0}\n\n' +
          'data: [DONE]\n\n',
      );

      expect(replayCapture(path).collect()).toStrictEqual({
        fragments: ['Hi'],
        result: { content: 'Hi', role: 'assistant', id: 't', energy: { energy_joules: 60 } },
      });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('buildMessages', () => {
  it('puts the system prompt first', () => {
    expect(buildMessages('hi', 'Be brief')).toEqual([
      { role: 'system', content: 'Be brief' },
      { role: 'user', content: 'hi' },
    ]);
    expect(buildMessages('hi')).toEqual([{ role: 'user', content: 'hi' }]);
  });
});
