import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config, DriveConfig, LeaseConfig } from './schema.js';
export { ConfigSchema } from './schema.js';

const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'config.json');

/**
 * Resolve which config file to read: explicit path, then REPODRIVE_CONFIG,
 * then ./config/config.json.
 */
export function resolveConfigPath(explicitPath?: string): string {
  if (explicitPath) return resolve(explicitPath);
  const fromEnv = process.env.REPODRIVE_CONFIG;
  if (fromEnv) return resolve(fromEnv);
  return DEFAULT_CONFIG_PATH;
}

export function loadConfig(configPath: string = resolveConfigPath()): Config {
  // Check file exists
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  // Read and parse JSON
  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  return parseConfig(rawConfig);
}

/** Validate an already-parsed config object (defaults applied). */
export function parseConfig(rawConfig: unknown): Config {
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
