/**
 * Main Configuration Loading
 *
 * Combines loading, env overlay and validation
 */

import type { ParleyConfig } from './schema.js';
import { loadConfig } from './loader.js';
import { applyEnvOverlay } from './env.js';
import { validateConfigOrThrow } from './validation.js';

export interface LoadConfigOptions {
  /** Custom path to parley.toml */
  configPath?: string;
  /** Whether to apply environment variable overlays (default: true) */
  applyEnv?: boolean;
}

/**
 * Load, overlay and validate configuration in one call
 *
 * @throws ConfigLoadError if loading fails
 * @throws ConfigValidationError if validation fails
 */
export function loadAndValidateConfig(options: LoadConfigOptions = {}): ParleyConfig {
  const { configPath, applyEnv = true } = options;

  let raw = loadConfig(configPath);

  if (applyEnv) {
    raw = applyEnvOverlay(raw);
  }

  return validateConfigOrThrow(raw);
}
