/**
 * YAML config loading and Zod validation.
 * Reads a YAML file, validates it against the config schema,
 * and returns a fully typed Config object or throws a ConfigError.
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { ConfigSchema } from './schema.js';
import type { Config } from './types.js';

export const DEFAULT_CONFIG_PATH = './config/config.yaml';

/**
 * Validate an already-parsed config document.
 * @throws ConfigError listing every validation issue
 */
export function parseConfig(document: unknown, source: string = 'config'): Config {
  const result = ConfigSchema.safeParse(document);

  if (!result.success) {
    const prettyError = z.prettifyError(result.error);
    logger.error({ configPath: source }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${source}":\n${prettyError}`);
  }

  return result.data;
}

/**
 * Load and validate a YAML config file.
 *
 * @param path - Absolute or relative path to the YAML config file
 * @throws ConfigError if the file is missing, unreadable or invalid
 */
export function loadConfig(path: string): Config {
  if (!existsSync(path)) {
    throw new ConfigError(
      `Config file not found: ${path}\n` +
        'Create one with `wattstream --init` or pass --config <path>.',
    );
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config file at "${path}": ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in config file "${path}": ${message}`);
  }

  const config = parseConfig(parsed, path);

  logger.info(
    { configPath: path, providers: config.providers.length, models: config.models.length },
    'Config loaded successfully',
  );

  return config;
}

/**
 * Resolve the config file path.
 *
 * Priority:
 * 1. explicit path (the CLI's --config)
 * 2. CONFIG_PATH environment variable
 * 3. ./config/config.yaml
 */
export function resolveConfigPath(explicit?: string): string {
  if (explicit) {
    return explicit;
  }

  const envPath = process.env['CONFIG_PATH'];
  if (envPath) {
    return envPath;
  }

  return DEFAULT_CONFIG_PATH;
}
