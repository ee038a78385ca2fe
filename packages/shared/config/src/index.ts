/**
 * @parley/config - Configuration System
 *
 * TOML parsing, environment variable overlays and validation for
 * parley.toml.
 */

export {
  ParleyConfigSchema,
  CONFIG_DEFAULTS,
  type ParleyConfig,
  type RawConfig,
  type ParleySection,
  type ProviderName,
  type ProviderTierConfig,
  type LLMConfig,
  type LLMCooldownConfig,
  type AssistantConfig,
  type ToolsConfig,
  type EchoToolConfig,
  type InfraToolConfig,
  type ConfirmationConfig,
  type StateConfig,
  type TracingConfig,
  type RuntimeConfig,
} from './schema.js';

export {
  loadConfig,
  loadTomlFile,
  parseToml,
  findConfigFile,
  getConfigSearchPaths,
  ConfigLoadError,
  CONFIG_FILE_NAME,
} from './loader.js';

export { createEnvOverlay, applyEnvOverlay, deepMerge } from './env.js';

export {
  validateConfig,
  validateConfigOrThrow,
  ConfigValidationError,
  type ValidationResult,
} from './validation.js';

export { loadAndValidateConfig, type LoadConfigOptions } from './main.js';
