import { join, resolve } from 'path';
import type { DotkeeperConfig, UndefinedVariablePolicy } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsoncFile } from '../utils/fs.js';
import { expandTilde, getHomeDirectory } from '../utils/home-directory.js';
import type { Environment } from '../utils/env-expansion.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration for the dotkeeper CLI.
 *
 * Sources, highest precedence first: command-line flags, environment
 * variables, ~/.dotkeeper/config.jsonc (or config.json), built-in defaults.
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

export interface ConfigFlags {
  repository?: string;
}

export interface ConfigSources {
  flags?: ConfigFlags;
  env?: Environment;
  homeDir?: string;
}

interface FileConfig {
  repository?: string;
  undefinedVariables?: UndefinedVariablePolicy;
}

export function getConfigDirectory(homeDir: string = getHomeDirectory()): string {
  return join(homeDir, DIR_PATTERNS.CONFIG);
}

/**
 * Staging area for atomic replaces; only ever holds short-lived directories
 */
export function getScratchDirectory(config: DotkeeperConfig): string {
  return join(config.repository, DIR_PATTERNS.SCRATCH);
}

async function findConfigFile(configDir: string): Promise<string | null> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const path = join(configDir, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

function parseFileConfig(raw: unknown, path: string): FileConfig {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Invalid configuration in ${path}: expected an object`, { path });
  }

  const result: FileConfig = {};
  if ('repository' in raw && raw.repository !== undefined) {
    if (typeof raw.repository !== 'string' || !raw.repository) {
      throw new ConfigError(`Invalid configuration in ${path}: 'repository' must be a non-empty string`, { path });
    }
    result.repository = raw.repository;
  }
  if ('undefinedVariables' in raw && raw.undefinedVariables !== undefined) {
    const policy = raw.undefinedVariables;
    if (policy !== 'empty' && policy !== 'error') {
      throw new ConfigError(
        `Invalid configuration in ${path}: 'undefinedVariables' must be "empty" or "error"`,
        { path, undefinedVariables: policy }
      );
    }
    result.undefinedVariables = policy;
  }
  return result;
}

async function loadFileConfig(homeDir: string): Promise<FileConfig> {
  const path = await findConfigFile(getConfigDirectory(homeDir));
  if (!path) {
    logger.debug('Config file not found, using defaults');
    return {};
  }
  logger.debug(`Loading config from: ${path}`);
  try {
    return parseFileConfig(await readJsoncFile(path), path);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load configuration: ${reason}`, { path });
  }
}

export async function loadConfig(sources: ConfigSources = {}): Promise<DotkeeperConfig> {
  const env = sources.env ?? process.env;
  const homeDir = sources.homeDir ?? getHomeDirectory();
  const fileConfig = await loadFileConfig(homeDir);

  const repository =
    sources.flags?.repository ||
    env[ENV_VARS.REPOSITORY] ||
    fileConfig.repository ||
    join(homeDir, DIR_PATTERNS.REPOSITORY);

  const undefinedVariables: UndefinedVariablePolicy =
    env[ENV_VARS.STRICT_ENV] === '1' ? 'error' : fileConfig.undefinedVariables ?? 'empty';

  const config: DotkeeperConfig = {
    repository: resolve(expandTilde(repository, homeDir)),
    undefinedVariables
  };
  logger.debug('Configuration resolved', config);
  return config;
}
