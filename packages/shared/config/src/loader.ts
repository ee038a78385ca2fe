/**
 * TOML Configuration Loader
 *
 * Loads and parses parley.toml configuration files
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import type { RawConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'parley.toml';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigLoadError';
    this.cause = cause;
  }
}

/**
 * Search paths for parley.toml in order of precedence
 */
export function getConfigSearchPaths(): string[] {
  const paths: string[] = [];

  if (process.env.PARLEY_CONFIG) {
    paths.push(path.resolve(process.env.PARLEY_CONFIG));
  }

  paths.push(path.join(process.cwd(), CONFIG_FILE_NAME));

  const homeDir = process.env.HOME || process.env.USERPROFILE;
  if (homeDir) {
    paths.push(path.join(homeDir, '.parley', CONFIG_FILE_NAME));
  }

  return paths;
}

export function findConfigFile(searchPaths?: string[]): string | null {
  const paths = searchPaths ?? getConfigSearchPaths();

  for (const configPath of paths) {
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

export function loadTomlFile(filePath: string): RawConfig {
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    return parseToml(content);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw new ConfigLoadError(`Failed to load config from ${filePath}: ${error.message}`, error.cause);
    }
    if (error instanceof Error) {
      throw new ConfigLoadError(`Failed to load config from ${filePath}: ${error.message}`, error);
    }
    throw new ConfigLoadError(`Failed to load config from ${filePath}`);
  }
}

export function parseToml(content: string): RawConfig {
  try {
    return TOML.parse(content);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigLoadError(`Failed to parse TOML: ${error.message}`, error);
    }
    throw new ConfigLoadError('Failed to parse TOML');
  }
}

/**
 * Load configuration from default locations
 *
 * @throws ConfigLoadError if no config file is found or parsing fails
 */
export function loadConfig(customPath?: string): RawConfig {
  let configPath: string | null;

  if (customPath) {
    if (!fs.existsSync(customPath)) {
      throw new ConfigLoadError(`Configuration file not found: ${customPath}`);
    }
    configPath = customPath;
  } else {
    configPath = findConfigFile();
    if (!configPath) {
      throw new ConfigLoadError(`No ${CONFIG_FILE_NAME} file found in search paths`);
    }
  }

  return loadTomlFile(configPath);
}
