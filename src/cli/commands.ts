/**
 * CLI command implementations. Kept apart from the entry point so they can
 * run in-process with injected output streams.
 */

import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { buildMessages, createClient, replayCapture } from '../client.js';
import { DEFAULT_CONFIG_PATH, loadConfig, resolveConfigPath } from '../config/loader.js';
import type { Config } from '../config/types.js';
import { buildCatalog } from '../models/catalog.js';
import { logger } from '../shared/logger.js';
import type { FinalResult } from '../shared/types.js';
import { VERSION } from '../shared/version.js';

/** Where command output goes; process streams by default. */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const EXAMPLE_CONFIG_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'config.example.yaml',
);

export const HELP_TEXT = `
wattstream - streaming chat completions with energy metering

Usage:
  wattstream <command> [options]

Commands:
  prompt <text>         Send a prompt and stream the reply
  replay <file>         Interpret a captured SSE response body
  models                List configured models and aliases
  serve                 Start the relay server

Options:
  -c, --config <path>   Path to config file (default: ./config/config.yaml)
  -m, --model <id>      Model id or alias (default: settings.defaultModel)
  -s, --system <text>   System prompt
  -t, --temperature <n> Sampling temperature
  -p, --port <port>     Relay port (overrides config)
  --no-stream           Request a single non-streaming response
  --json                Print the merged result as JSON on stdout
  --init                Create config/config.yaml from the example
  -h, --help            Show this help message
  -v, --version         Show version

Examples:
  wattstream prompt "Explain SSE in one line" -m neuralwatt-gpt-oss
  wattstream replay capture.sse --json
  wattstream serve --port 3790
`;

/** Config for commands that need one; the bundled example stands in for a missing default file. */
function loadCliConfig(explicit?: string): Config {
  const path = resolveConfigPath(explicit);
  if (path === DEFAULT_CONFIG_PATH && !existsSync(path)) {
    logger.debug({ configPath: EXAMPLE_CONFIG_PATH }, 'No config file, using bundled defaults');
    return loadConfig(EXAMPLE_CONFIG_PATH);
  }
  return loadConfig(path);
}

/** One line summarising usage and energy, for stderr. */
export function formatSummary(result: FinalResult): string {
  const parts: string[] = [];
  if (result.finish_reason) parts.push(`finish: ${result.finish_reason}`);
  if (result.usage) {
    parts.push(
      `tokens: ${result.usage.prompt_tokens ?? '?'} in / ${result.usage.completion_tokens ?? '?'} out`,
    );
  }
  if (result.energy) {
    const fields = Object.entries(result.energy).map(([k, v]) => `${k}=${JSON.stringify(v)}`);
    parts.push(`energy: ${fields.join(' ')}`);
  } else {
    parts.push('energy: not reported');
  }
  return `[${parts.join(' | ')}]\n`;
}

function writeResult(io: CliIO, result: FinalResult, json: boolean): void {
  io.stdout('\n');
  if (json) {
    io.stdout(`${JSON.stringify(result, null, 2)}\n`);
  } else {
    io.stderr(formatSummary(result));
  }
  for (const call of result.tool_calls ?? []) {
    if ('error' in call) {
      io.stderr(`tool call ${call.index} (${call.name ?? 'unnamed'}): ${call.error}\n`);
    }
  }
}

function initConfig(io: CliIO, cwd: string): number {
  const targetPath = resolve(cwd, 'config', 'config.yaml');

  if (existsSync(targetPath)) {
    io.stderr(`Error: Config file already exists at ${targetPath}\n`);
    return 1;
  }
  if (!existsSync(EXAMPLE_CONFIG_PATH)) {
    io.stderr('Error: Example config not found (package may be corrupted)\n');
    return 1;
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  copyFileSync(EXAMPLE_CONFIG_PATH, targetPath);

  io.stdout(`Created config file: ${targetPath}\n`);
  io.stdout('Next: export NEURALWATT_API_KEY (or set apiKey in the file), then run wattstream prompt "hi"\n');
  return 0;
}

/**
 * Run the CLI with the given arguments (without the node/script prefix).
 * Resolves to the process exit code. Errors propagate to the caller.
 */
export async function runCli(
  argv: string[],
  io: CliIO = processIO,
  cwd: string = process.cwd(),
): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      model: { type: 'string', short: 'm' },
      system: { type: 'string', short: 's' },
      temperature: { type: 'string', short: 't' },
      port: { type: 'string', short: 'p' },
      'no-stream': { type: 'boolean' },
      json: { type: 'boolean' },
      init: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    io.stdout(HELP_TEXT);
    return 0;
  }
  if (values.version) {
    io.stdout(`${VERSION}\n`);
    return 0;
  }
  if (values.init) {
    return initConfig(io, cwd);
  }

  const [command, ...rest] = positionals;
  const json = values.json ?? false;

  switch (command) {
    case 'prompt': {
      const text = rest.join(' ').trim();
      if (!text) {
        io.stderr('Error: prompt requires text\n');
        return 1;
      }
      let temperature: number | undefined;
      if (values.temperature !== undefined) {
        temperature = Number(values.temperature);
        if (Number.isNaN(temperature)) {
          io.stderr(`Error: invalid temperature '${values.temperature}'\n`);
          return 1;
        }
      }

      const config = loadCliConfig(values.config);
      logger.level = config.settings.logLevel;
      const client = createClient(config);
      const completion = await client.complete(buildMessages(text, values.system), values.model, {
        stream: !values['no-stream'],
        ...(temperature !== undefined && { temperature }),
      });

      for await (const fragment of completion) {
        io.stdout(fragment);
      }
      writeResult(io, completion.finalize(), json);
      return 0;
    }

    case 'replay': {
      const file = rest[0];
      if (!file) {
        io.stderr('Error: replay requires a file path\n');
        return 1;
      }
      const stream = replayCapture(resolve(cwd, file));
      for (const fragment of stream) {
        io.stdout(fragment);
      }
      writeResult(io, stream.finalize(), json);
      return 0;
    }

    case 'models': {
      const config = loadCliConfig(values.config);
      for (const model of buildCatalog(config).all()) {
        const aliases = model.aliases.length > 0 ? ` (aliases: ${model.aliases.join(', ')})` : '';
        const system = model.supportsSystemPrompt ? '' : ' [no system prompt]';
        io.stdout(`${model.id}${aliases} -> ${model.providerId}/${model.modelName}${system}\n`);
      }
      return 0;
    }

    case 'serve': {
      const config = loadCliConfig(values.config);
      logger.level = config.settings.logLevel;
      const port = values.port !== undefined ? Number(values.port) : undefined;
      if (port !== undefined && (!Number.isInteger(port) || port < 1 || port > 65535)) {
        io.stderr(`Error: invalid port '${values.port}'\n`);
        return 1;
      }
      const { startServer } = await import('../server.js');
      startServer(config, port);
      return 0;
    }

    default:
      io.stderr(command ? `Error: unknown command '${command}'\n` : 'Error: missing command\n');
      io.stderr(HELP_TEXT);
      return 1;
  }
}
