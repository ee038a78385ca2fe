/**
 * Environment Variable Overlay
 *
 * Allows environment variables to override TOML configuration values
 */

import type { RawConfig } from './schema.js';

/**
 * Mapping of environment variables to configuration paths
 */
const ENV_VAR_MAPPINGS: Record<string, string> = {
  PARLEY_NAME: 'parley.name',

  // Provider cascade
  LLM_PRIMARY_PROVIDER: 'llm.primary.provider',
  LLM_PRIMARY_MODEL: 'llm.primary.model',
  LLM_SECONDARY_PROVIDER: 'llm.secondary.provider',
  LLM_SECONDARY_MODEL: 'llm.secondary.model',
  LLM_TERTIARY_PROVIDER: 'llm.tertiary.provider',
  LLM_TERTIARY_MODEL: 'llm.tertiary.model',
  LLM_TERTIARY_BASE_URL: 'llm.tertiary.base_url',
  LLM_MAX_TOKENS: 'llm.max_tokens',
  LLM_TEMPERATURE: 'llm.temperature',

  // Assistant
  ASSISTANT_NAME: 'assistant.name',
  ASSISTANT_SYSTEM_PROMPT: 'assistant.system_prompt',
  ASSISTANT_ADMIN_USERS: 'assistant.admin_users',
  ASSISTANT_HISTORY_TURNS: 'assistant.history_turns',

  // Tools
  TOOL_ECHO_ENABLED: 'tools.echo.enabled',
  TOOL_INFRA_ENABLED: 'tools.infra.enabled',
  TOOL_INFRA_ENDPOINT: 'tools.infra.endpoint',
  TOOL_INFRA_TIMEOUT: 'tools.infra.timeout_seconds',

  // Stores
  CONFIRMATION_TTL_SECONDS: 'confirmation.ttl_seconds',
  STATE_DEFAULT_TTL_SECONDS: 'state.default_ttl_seconds',
  STATE_HISTORY_LIMIT: 'state.history_limit',
  TRACING_MAX_TRACES: 'tracing.max_traces',
  TRACING_TTL_HOURS: 'tracing.ttl_hours',

  // Runtime
  RUNTIME_LOG_LEVEL: 'runtime.log_level',
  RUNTIME_STATUS_PORT: 'runtime.status_port',
};

const NUMERIC_SUFFIXES = ['_seconds', '_hours', '_limit', '_port', '_traces', '_turns', 'max_tokens'];

function parseEnvValue(value: string, path: string): string | number | boolean | string[] {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_SUFFIXES.some((suffix) => path.endsWith(suffix))) {
    const num = Number(value);
    if (!isNaN(num)) return num;
  }

  if (path.endsWith('temperature')) {
    const num = parseFloat(value);
    if (!isNaN(num)) return num;
  }

  // Comma-separated lists
  if (path.endsWith('admin_users')) {
    return value
      .split(',')
      .map((v) => v.trim())
      .filter((v) => v.length > 0);
  }

  return value;
}

/**
 * Check if a key is safe to use (not a prototype pollution vector)
 */
function isSafeKey(key: string): boolean {
  return key !== '__proto__' && key !== 'constructor' && key !== 'prototype';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested property in an object using dot notation
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    if (!part || !isSafeKey(part)) continue;
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  const lastPart = parts[parts.length - 1];
  if (lastPart && isSafeKey(lastPart)) {
    current[lastPart] = value;
  }
}

/**
 * Create configuration overlay from environment variables
 */
export function createEnvOverlay(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const overlay: RawConfig = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(overlay, configPath, parseEnvValue(value, configPath));
    }
  }

  return overlay;
}

/**
 * Deep merge two objects, with source taking precedence
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const key of Object.keys(source)) {
    if (!isSafeKey(key)) {
      continue;
    }

    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) continue;

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

export function applyEnvOverlay(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  return deepMerge(config, createEnvOverlay(env));
}
