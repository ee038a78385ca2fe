/**
 * Locate parley.toml for commands that read it
 */

import * as path from 'node:path';
import { findConfigFile, getConfigSearchPaths } from '@parley/config';
import { ConfigNotFoundError } from './errors.js';

/**
 * Resolve an explicit --config path, else search the default locations
 *
 * @throws ConfigNotFoundError if no config file is found
 */
export function findConfigFileOrThrow(explicitPath?: string): string {
  const searchPaths = explicitPath ? [path.resolve(explicitPath)] : getConfigSearchPaths();
  const configPath = findConfigFile(searchPaths);

  if (!configPath) {
    throw new ConfigNotFoundError(searchPaths);
  }

  return path.resolve(configPath);
}
