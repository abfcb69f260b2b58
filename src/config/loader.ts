/**
 * YAML config loading and Zod validation.
 * Reads a YAML file, validates it against the config schema,
 * and returns a fully typed Config object or throws a ConfigError.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from './types.js';

/** Path used when neither --config nor CONFIG_PATH is given. */
export const DEFAULT_CONFIG_PATH = './config/config.yaml';

/**
 * Load and validate a YAML config file.
 *
 * @param path - Absolute or relative path to the YAML config file
 * @returns A fully validated Config object
 * @throws ConfigError if the file is missing, unreadable or invalid
 */
export function loadConfig(path: string): Config {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
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

  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    const prettyError = z.prettifyError(result.error);
    logger.error({ configPath: path }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${path}":\n${prettyError}`);
  }

  logger.info(
    {
      configPath: path,
      upstream: result.data.upstream.id,
      threshold: result.data.quota.threshold,
      windowMs: result.data.quota.windowMs,
      cache: result.data.cache.driver,
    },
    'Config loaded successfully',
  );

  return result.data;
}

/**
 * Resolve the config file path from CLI args, env var, or default.
 *
 * Priority:
 * 1. --config / -c CLI argument
 * 2. CONFIG_PATH environment variable
 * 3. ./config/config.yaml (default)
 */
export function resolveConfigPath(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): string {
  for (const flag of ['--config', '-c']) {
    const index = argv.indexOf(flag);
    const value = index === -1 ? undefined : argv[index + 1];
    if (value !== undefined) {
      return value;
    }
  }

  const envPath = env['CONFIG_PATH'];
  if (envPath) {
    return envPath;
  }

  return DEFAULT_CONFIG_PATH;
}
