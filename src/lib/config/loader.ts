import { ConfigSchema, type UserConfig } from './schema.js';
import { loadEnvVariables } from './env.js';
import { ConfigError, formatIssues } from '../errors.js';
import { getConfigDir } from '../paths.js';
import { log } from '../log.js';
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

export function getDefaultConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

export type LoadConfigOptions = {
  /** Resolved from the working directory */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, typically the CLI flags that were set */
  overrides?: Partial<UserConfig>;
};

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read config file ${path}: ${reason}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return { ...parsed };
}

/**
 * Resolve configuration: schema defaults < config file < environment < overrides.
 * A missing config file is not an error.
 */
export function loadConfig(options: LoadConfigOptions = {}): UserConfig {
  const path = options.configPath
    ? resolve(process.cwd(), options.configPath)
    : getDefaultConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    rawConfig = readConfigFile(path);
    log('config', 'Loaded config file', { path });
  } else if (options.configPath) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  const envConfig = loadEnvVariables(options.env ?? process.env);
  rawConfig = { ...rawConfig, ...envConfig, ...options.overrides };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error.issues));
  }

  return result.data;
}
