/**
 * Configuration Schema for Parley
 *
 * TypeBox schema matching the parley.toml structure. Keys stay snake_case
 * as written in the TOML file.
 */

import { Type, type Static } from '@sinclair/typebox';

// ============================================================================
// Core
// ============================================================================

export const ParleySectionSchema = Type.Object({
  name: Type.String(),
  version: Type.String(),
});

// ============================================================================
// LLM
// ============================================================================

export const ProviderNameSchema = Type.Union([
  Type.Literal('openai'),
  Type.Literal('anthropic'),
  Type.Literal('ollama'),
]);

/**
 * One tier of the provider cascade
 */
export const ProviderTierSchema = Type.Object({
  provider: ProviderNameSchema,
  model: Type.String(),
  /** Env var holding the API key; defaults per provider */
  api_key_env: Type.Optional(Type.String()),
  base_url: Type.Optional(Type.String()),
  max_tokens: Type.Optional(Type.Number()),
  temperature: Type.Optional(Type.Number()),
});

export const LLMCooldownSchema = Type.Object({
  initial_seconds: Type.Optional(Type.Number()),
  multiplier: Type.Optional(Type.Number()),
  max_seconds: Type.Optional(Type.Number()),
  billing_initial_hours: Type.Optional(Type.Number()),
  billing_max_hours: Type.Optional(Type.Number()),
});

export const LLMConfigSchema = Type.Object({
  primary: ProviderTierSchema,
  secondary: Type.Optional(ProviderTierSchema),
  /** Degraded text-only tier, sees only the latest user utterance */
  tertiary: Type.Optional(ProviderTierSchema),
  max_tokens: Type.Optional(Type.Number()),
  temperature: Type.Optional(Type.Number()),
  cooldowns: Type.Optional(LLMCooldownSchema),
});

// ============================================================================
// Assistant
// ============================================================================

export const AssistantConfigSchema = Type.Object({
  name: Type.Optional(Type.String()),
  system_prompt: Type.Optional(Type.String()),
  /** Sender ids treated as admins by the bundled transports */
  admin_users: Type.Optional(Type.Array(Type.String())),
  /** Prior turns kept per user and replayed to tool-capable tiers */
  history_turns: Type.Optional(Type.Number()),
});

// ============================================================================
// Tools
// ============================================================================

export const EchoToolConfigSchema = Type.Object({
  enabled: Type.Boolean(),
});

export const InfraToolConfigSchema = Type.Object({
  enabled: Type.Boolean(),
  /** Command service URL; commands are emulated when unset */
  endpoint: Type.Optional(Type.String()),
  timeout_seconds: Type.Optional(Type.Number()),
});

export const ToolsConfigSchema = Type.Object({
  echo: Type.Optional(EchoToolConfigSchema),
  infra: Type.Optional(InfraToolConfigSchema),
});

// ============================================================================
// Conversation state, confirmation and tracing
// ============================================================================

export const ConfirmationConfigSchema = Type.Object({
  ttl_seconds: Type.Optional(Type.Number()),
});

export const StateTtlConfigSchema = Type.Object({
  normal: Type.Optional(Type.Number()),
  confirmation: Type.Optional(Type.Number()),
  clarification: Type.Optional(Type.Number()),
  multi_step: Type.Optional(Type.Number()),
});

export const StateConfigSchema = Type.Object({
  default_ttl_seconds: Type.Optional(Type.Number()),
  history_limit: Type.Optional(Type.Number()),
  ttl_seconds: Type.Optional(StateTtlConfigSchema),
});

export const TracingConfigSchema = Type.Object({
  max_traces: Type.Optional(Type.Number()),
  ttl_hours: Type.Optional(Type.Number()),
  active_timeout_seconds: Type.Optional(Type.Number()),
});

// ============================================================================
// Runtime
// ============================================================================

export const LogLevelSchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
]);

export const RuntimeConfigSchema = Type.Object({
  log_level: Type.Optional(LogLevelSchema),
  status_port: Type.Optional(Type.Number()),
});

// ============================================================================
// Root
// ============================================================================

export const ParleyConfigSchema = Type.Object(
  {
    parley: ParleySectionSchema,
    llm: LLMConfigSchema,
    assistant: Type.Optional(AssistantConfigSchema),
    tools: Type.Optional(ToolsConfigSchema),
    confirmation: Type.Optional(ConfirmationConfigSchema),
    state: Type.Optional(StateConfigSchema),
    tracing: Type.Optional(TracingConfigSchema),
    runtime: Type.Optional(RuntimeConfigSchema),
  },
  { $id: 'ParleyConfig' }
);

export type ParleySection = Static<typeof ParleySectionSchema>;
export type ProviderName = Static<typeof ProviderNameSchema>;
export type ProviderTierConfig = Static<typeof ProviderTierSchema>;
export type LLMCooldownConfig = Static<typeof LLMCooldownSchema>;
export type LLMConfig = Static<typeof LLMConfigSchema>;
export type AssistantConfig = Static<typeof AssistantConfigSchema>;
export type EchoToolConfig = Static<typeof EchoToolConfigSchema>;
export type InfraToolConfig = Static<typeof InfraToolConfigSchema>;
export type ToolsConfig = Static<typeof ToolsConfigSchema>;
export type ConfirmationConfig = Static<typeof ConfirmationConfigSchema>;
export type StateConfig = Static<typeof StateConfigSchema>;
export type TracingConfig = Static<typeof TracingConfigSchema>;
export type RuntimeConfig = Static<typeof RuntimeConfigSchema>;
export type ParleyConfig = Static<typeof ParleyConfigSchema>;

/**
 * Unvalidated configuration as parsed from TOML and overlaid from env
 */
export type RawConfig = Record<string, unknown>;

// ============================================================================
// Defaults
// ============================================================================

export const CONFIG_DEFAULTS = {
  confirmationTtlSeconds: 300,
  stateDefaultTtlSeconds: 3600,
  stateHistoryLimit: 10,
  stateTtlSeconds: {
    normal: 60,
    confirmation: 300,
    clarification: 180,
    multi_step: 600,
  },
  tracingMaxTraces: 1000,
  tracingTtlHours: 24,
  tracingActiveTimeoutSeconds: 300,
  historyTurns: 10,
  statusPort: 8081,
  systemPrompt:
    'You are Parley, an operations assistant. Answer briefly. Use the provided tools when the user asks about infrastructure.',
} as const;
