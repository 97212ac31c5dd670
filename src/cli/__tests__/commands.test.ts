import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { formatSummary, HELP_TEXT, runCli } from '../commands.js';
import type { CliIO } from '../commands.js';
import { SystemPromptUnsupportedError } from '../../shared/errors.js';
import { VERSION } from '../../shared/version.js';

const CONFIG = `
version: 1
settings:
  logLevel: error
  defaultModel: neuralwatt-gpt-oss
providers:
  - id: neuralwatt
    name: NeuralWatt
    type: neuralwatt
    apiKey: test-secret
models:
  - id: neuralwatt/gpt-oss-20b
    provider: neuralwatt
    modelName: openai/gpt-oss-20b
    aliases: [neuralwatt-gpt-oss]
  - id: neuralwatt/raw
    provider: neuralwatt
    supportsSystemPrompt: false
`;

const SSE =
  'data: {"id":"t","choices":[{"delta":{"role":"assistant","content":"H"}}]}\n\n' +
  'data: {"choices":[{"delta":{"content":"i"}}]}\n\n' +
  ': energy {"energy_joules": 25.0}\n\n' +
  'data: [DONE]\n\n';

function captureIO(): { io: CliIO; stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    io: {
      stdout: (text) => {
        stdout.push(text);
      },
      stderr: (text) => {
        stderr.push(text);
      },
    },
    stdout,
    stderr,
  };
}

describe('runCli', () => {
  let dir: string;
  let configPath: string;
  let fetchMock: Mock<typeof fetch>;

  function sentBody(): unknown {
    return JSON.parse(String(fetchMock.mock.lastCall?.[1]?.body));
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'wattstream-cli-'));
    configPath = join(dir, 'config.yaml');
    writeFileSync(configPath, CONFIG, 'utf-8');
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('--help and --version', () => {
    it('prints usage text', async () => {
      const { io, stdout } = captureIO();
      expect(await runCli(['--help'], io)).toBe(0);
      expect(stdout).toEqual([HELP_TEXT]);
    });

    it('prints the version', async () => {
      const { io, stdout } = captureIO();
      expect(await runCli(['-v'], io)).toBe(0);
      expect(stdout).toEqual([`${VERSION}\n`]);
    });
  });

  describe('argument errors', () => {
    it('fails without a command', async () => {
      const { io, stderr } = captureIO();
      expect(await runCli([], io)).toBe(1);
      expect(stderr[0]).toBe('Error: missing command\n');
    });

    it('fails on an unknown command', async () => {
      const { io, stderr } = captureIO();
      expect(await runCli(['frobnicate'], io)).toBe(1);
      expect(stderr[0]).toBe("Error: unknown command 'frobnicate'\n");
    });

    it('requires prompt text', async () => {
      const { io, stderr } = captureIO();
      expect(await runCli(['prompt', '-c', configPath], io)).toBe(1);
      expect(stderr).toEqual(['Error: prompt requires text\n']);
    });

    it('rejects a non-numeric temperature', async () => {
      const { io, stderr } = captureIO();
      expect(await runCli(['prompt', 'hi', '-t', 'hot', '-c', configPath], io)).toBe(1);
      expect(stderr).toEqual(["Error: invalid temperature 'hot'\n"]);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('rejects an out-of-range port', async () => {
      const { io, stderr } = captureIO();
      expect(await runCli(['serve', '-p', '70000', '-c', configPath], io)).toBe(1);
      expect(stderr).toEqual(["Error: invalid port '70000'\n"]);
    });
  });

  describe('prompt', () => {
    it('streams fragments to stdout and the summary to stderr', async () => {
      fetchMock.mockResolvedValue(new Response(SSE, { status: 200 }));
      const { io, stdout, stderr } = captureIO();

      expect(await runCli(['prompt', 'say', 'hi', '-c', configPath], io)).toBe(0);

      expect(stdout).toEqual(['H', 'i', '\n']);
      expect(stderr).toEqual(['[energy: energy_joules=25]\n']);
      expect(sentBody()).toEqual({
        model: 'openai/gpt-oss-20b',
        messages: [{ role: 'user', content: 'say hi' }],
        stream: true,
        stream_options: { include_usage: true },
      });
    });

    it('prints the merged result as JSON with --json', async () => {
      fetchMock.mockResolvedValue(new Response(SSE, { status: 200 }));
      const { io, stdout, stderr } = captureIO();

      await runCli(['prompt', 'hi', '--json', '-c', configPath], io);

      const output = stdout.join('');
      expect(output.startsWith('Hi\n')).toBe(true);
      expect(JSON.parse(output.slice('Hi\n'.length))).toEqual({
        content: 'Hi',
        role: 'assistant',
        id: 't',
        energy: { energy_joules: 25 },
      });
      expect(stderr).toEqual([]);
    });

    it('sends options and a system prompt to the chosen model', async () => {
      fetchMock.mockResolvedValue(
        new Response(
          JSON.stringify({ choices: [{ message: { role: 'assistant', content: 'ok' }, finish_reason: 'stop' }] }),
          { status: 200 },
        ),
      );
      const { io, stdout, stderr } = captureIO();

      await runCli(
        ['prompt', 'hi', '-m', 'neuralwatt/gpt-oss-20b', '-s', 'Be brief', '-t', '0.2', '--no-stream', '-c', configPath],
        io,
      );

      expect(sentBody()).toEqual({
        model: 'openai/gpt-oss-20b',
        messages: [
          { role: 'system', content: 'Be brief' },
          { role: 'user', content: 'hi' },
        ],
        temperature: 0.2,
        stream: false,
      });
      expect(stdout).toEqual(['ok', '\n']);
      expect(stderr).toEqual(['[finish: stop | energy: not reported]\n']);
    });

    it('refuses a system prompt for a model that cannot take one', async () => {
      const { io } = captureIO();

      await expect(
        runCli(['prompt', 'hi', '-m', 'neuralwatt/raw', '-s', 'Be brief', '-c', configPath], io),
      ).rejects.toThrow(SystemPromptUnsupportedError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('replay', () => {
    it('interprets a captured SSE body relative to the working directory', async () => {
      writeFileSync(join(dir, 'capture.sse'), SSE, 'utf-8');
      const { io, stdout, stderr } = captureIO();

      expect(await runCli(['replay', 'capture.sse'], io, dir)).toBe(0);

      expect(stdout.join('')).toBe('Hi\n');
      expect(stderr).toEqual(['[energy: energy_joules=25]\n']);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('reports tool calls whose arguments did not parse', async () => {
      writeFileSync(
        join(dir, 'tools.sse'),
        'data: {"choices":[{"delta":{"tool_calls":[{"index":0,"function":{"name":"add","arguments":"{\\"a\\""}}]}}]}\n' +
          'data: [DONE]\n',
        'utf-8',
      );
      const { io, stderr } = captureIO();

      await runCli(['replay', 'tools.sse'], io, dir);

      expect(stderr).toEqual([
        '[energy: not reported]\n',
        'tool call 0 (add): Tool call 0 arguments are not a valid JSON object\n',
      ]);
    });

    it('requires a file path', async () => {
      const { io, stderr } = captureIO();
      expect(await runCli(['replay'], io, dir)).toBe(1);
      expect(stderr).toEqual(['Error: replay requires a file path\n']);
    });
  });

  describe('models', () => {
    it('lists models with aliases and provider wire names', async () => {
      const { io, stdout } = captureIO();

      expect(await runCli(['models', '-c', configPath], io)).toBe(0);

      expect(stdout).toEqual([
        'neuralwatt/gpt-oss-20b (aliases: neuralwatt-gpt-oss) -> neuralwatt/openai/gpt-oss-20b\n',
        'neuralwatt/raw -> neuralwatt/neuralwatt/raw [no system prompt]\n',
      ]);
    });
  });

  describe('--init', () => {
    it('creates config/config.yaml from the example', async () => {
      const { io, stdout } = captureIO();
      const target = join(dir, 'config', 'config.yaml');

      expect(await runCli(['--init'], io, dir)).toBe(0);

      expect(existsSync(target)).toBe(true);
      expect(readFileSync(target, 'utf-8')).toContain('apiKeyEnv: NEURALWATT_API_KEY');
      expect(stdout[0]).toBe(`Created config file: ${target}\n`);
    });

    it('refuses to overwrite an existing config', async () => {
      await runCli(['--init'], captureIO().io, dir);
      const { io, stderr } = captureIO();

      expect(await runCli(['--init'], io, dir)).toBe(1);
      expect(stderr).toEqual([
        `Error: Config file already exists at ${join(dir, 'config', 'config.yaml')}\n`,
      ]);
    });
  });
});

describe('formatSummary', () => {
  it('lists finish reason, tokens and every energy field', () => {
    expect(
      formatSummary({
        content: '',
        finish_reason: 'stop',
        usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
        energy: { energy_joules: 12.5, energy_kwh: 0.0000035 },
      }),
    ).toBe('[finish: stop | tokens: 3 in / 2 out | energy: energy_joules=12.5 energy_kwh=0.0000035]\n');
  });

  it('marks missing token counts and energy', () => {
    expect(formatSummary({ content: '', usage: { total_tokens: 5 } })).toBe(
      '[tokens: ? in / ? out | energy: not reported]\n',
    );
  });
});
