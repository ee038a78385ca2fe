/**
 * Configuration Validation
 *
 * Structural validation against the TypeBox schema, followed by range and
 * consistency checks that produce errors and warnings.
 */

import { Value } from '@sinclair/typebox/value';
import {
  ParleyConfigSchema,
  type ParleyConfig,
  type ProviderTierConfig,
} from './schema.js';

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** Typed configuration, present when valid */
  config?: ParleyConfig;
}

const DEFAULT_KEY_ENV: Record<string, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

function toDotted(pointer: string): string {
  return pointer.split('/').filter(Boolean).join('.');
}

function structuralErrors(raw: unknown): string[] {
  return [...Value.Errors(ParleyConfigSchema, raw)].map(
    (e) => `${toDotted(e.path) || '(root)'}: ${e.message}`
  );
}

function validateParleySection(config: ParleyConfig, errors: string[]): void {
  if (config.parley.name.trim() === '') {
    errors.push('parley.name is required and cannot be empty');
  }
  if (config.parley.version.trim() === '') {
    errors.push('parley.version is required and cannot be empty');
  }
}

function validateTier(
  label: string,
  tier: ProviderTierConfig,
  errors: string[],
  warnings: string[],
  env: NodeJS.ProcessEnv
): void {
  if (tier.model.trim() === '') {
    errors.push(`llm.${label}.model is required and cannot be empty`);
  }

  if (tier.max_tokens !== undefined && (tier.max_tokens < 1 || tier.max_tokens > 1_000_000)) {
    errors.push(`llm.${label}.max_tokens must be between 1 and 1,000,000`);
  }

  if (tier.temperature !== undefined && (tier.temperature < 0 || tier.temperature > 2)) {
    errors.push(`llm.${label}.temperature must be between 0 and 2`);
  }

  if (tier.provider === 'ollama') {
    if (!tier.base_url) {
      warnings.push(`llm.${label}.base_url should be specified for the ollama provider`);
    }
    return;
  }

  const keyEnv = tier.api_key_env ?? DEFAULT_KEY_ENV[tier.provider];
  if (keyEnv && !env[keyEnv]) {
    warnings.push(`llm.${label}: ${keyEnv} is not set, this tier will fail with an auth error`);
  }
}

function validateLLMConfig(
  config: ParleyConfig,
  errors: string[],
  warnings: string[],
  env: NodeJS.ProcessEnv
): void {
  const { llm } = config;
  validateTier('primary', llm.primary, errors, warnings, env);
  if (llm.secondary) {
    validateTier('secondary', llm.secondary, errors, warnings, env);
  }
  if (llm.tertiary) {
    validateTier('tertiary', llm.tertiary, errors, warnings, env);
  } else {
    warnings.push('llm.tertiary is not configured; there is no degraded fallback tier');
  }

  if (llm.max_tokens !== undefined && (llm.max_tokens < 1 || llm.max_tokens > 1_000_000)) {
    errors.push('llm.max_tokens must be between 1 and 1,000,000');
  }
  if (llm.temperature !== undefined && (llm.temperature < 0 || llm.temperature > 2)) {
    errors.push('llm.temperature must be between 0 and 2');
  }

  const tiers = [llm.primary, llm.secondary, llm.tertiary].filter(
    (tier): tier is ProviderTierConfig => tier !== undefined
  );
  const seen = new Set<string>();
  for (const tier of tiers) {
    const key = `${tier.provider}:${tier.model}`;
    if (seen.has(key)) {
      warnings.push(`llm: ${key} appears in more than one tier`);
    }
    seen.add(key);
  }
}

function requirePositive(value: number | undefined, name: string, errors: string[]): void {
  if (value !== undefined && value <= 0) {
    errors.push(`${name} must be greater than 0`);
  }
}

function validateStores(config: ParleyConfig, errors: string[], warnings: string[]): void {
  requirePositive(config.confirmation?.ttl_seconds, 'confirmation.ttl_seconds', errors);
  requirePositive(config.state?.default_ttl_seconds, 'state.default_ttl_seconds', errors);
  requirePositive(config.state?.history_limit, 'state.history_limit', errors);

  const ttls = config.state?.ttl_seconds;
  if (ttls) {
    for (const [kind, seconds] of Object.entries(ttls)) {
      requirePositive(seconds, `state.ttl_seconds.${kind}`, errors);
    }
  }

  const confirmationTtl = config.confirmation?.ttl_seconds;
  const confirmationStateTtl = ttls?.confirmation;
  if (
    confirmationTtl !== undefined &&
    confirmationStateTtl !== undefined &&
    confirmationStateTtl < confirmationTtl
  ) {
    warnings.push(
      'state.ttl_seconds.confirmation is shorter than confirmation.ttl_seconds; answers may arrive after the state expired'
    );
  }

  requirePositive(config.tracing?.max_traces, 'tracing.max_traces', errors);
  requirePositive(config.tracing?.ttl_hours, 'tracing.ttl_hours', errors);
  requirePositive(
    config.tracing?.active_timeout_seconds,
    'tracing.active_timeout_seconds',
    errors
  );
}

function validateRuntimeAndTools(config: ParleyConfig, errors: string[], warnings: string[]): void {
  const port = config.runtime?.status_port;
  if (port !== undefined && (!Number.isInteger(port) || port < 0 || port > 65535)) {
    errors.push('runtime.status_port must be an integer between 0 and 65535');
  }

  const infra = config.tools?.infra;
  if (infra?.enabled && !infra.endpoint) {
    warnings.push('tools.infra.endpoint is not set; infrastructure commands will be emulated');
  }
  requirePositive(infra?.timeout_seconds, 'tools.infra.timeout_seconds', errors);

  const history = config.assistant?.history_turns;
  if (history !== undefined && (!Number.isInteger(history) || history < 0)) {
    errors.push('assistant.history_turns must be a non-negative integer');
  }
}

/**
 * Validate raw configuration
 */
export function validateConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env
): ValidationResult {
  if (!Value.Check(ParleyConfigSchema, raw)) {
    return { valid: false, errors: structuralErrors(raw), warnings: [] };
  }

  const errors: string[] = [];
  const warnings: string[] = [];

  validateParleySection(raw, errors);
  validateLLMConfig(raw, errors, warnings, env);
  validateStores(raw, errors, warnings);
  validateRuntimeAndTools(raw, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config: errors.length === 0 ? raw : undefined,
  };
}

/**
 * Validate configuration and throw if invalid
 */
export function validateConfigOrThrow(raw: unknown): ParleyConfig {
  const result = validateConfig(raw);

  if (!result.valid || !result.config) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${result.errors.join('\n')}`,
      result.errors
    );
  }

  if (result.warnings.length > 0) {
    console.warn('Configuration warnings:');
    for (const warning of result.warnings) {
      console.warn(`  - ${warning}`);
    }
  }

  return result.config;
}
