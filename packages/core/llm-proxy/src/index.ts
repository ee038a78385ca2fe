export {
  ProviderError,
  mapProviderError,
  parseToolArguments,
  type AdapterSendOptions,
  type LLMProviderAdapter,
  type ProviderErrorKind,
  type ProviderRequest,
  type ProviderType,
} from './adapters/types.js';
export {
  OpenAIAdapter,
  normalizeOpenAIResponse,
  type OpenAIAdapterOptions,
  type OpenAICompletionLike,
} from './adapters/openai.js';
export {
  AnthropicAdapter,
  normalizeAnthropicResponse,
  type AnthropicAdapterOptions,
  type AnthropicMessageLike,
} from './adapters/anthropic.js';
export { OllamaAdapter, DEFAULT_OLLAMA_URL, normalizeTextOnly } from './adapters/ollama.js';
export {
  TIER_ORDER,
  createAdapter,
  createProviderChain,
  type ProviderTier,
  type TierLabel,
} from './adapters/registry.js';
export { CooldownManager, type CooldownReason, type CooldownState } from './cooldowns.js';
export {
  ProviderFallbackExecutor,
  degradeRequest,
  type CompleteOptions,
  type ProviderAttempt,
  type ProviderFallbackOptions,
  type TierStatus,
} from './fallback.js';
