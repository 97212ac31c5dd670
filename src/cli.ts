#!/usr/bin/env node
/**
 * CLI entry point for wattstream.
 */

import { runCli } from './cli/commands.js';
import { ConfigError } from './shared/errors.js';

try {
  const code = await runCli(process.argv.slice(2));
  if (code !== 0) process.exitCode = code;
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  const label = error instanceof ConfigError ? 'Config error' : 'Error';
  process.stderr.write(`\n${label}: ${message}\n`);
  process.exitCode = 1;
}
