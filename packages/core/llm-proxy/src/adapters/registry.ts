import type { LLMConfig, ProviderTierConfig } from '@parley/config';
import { AnthropicAdapter } from './anthropic.js';
import { OpenAIAdapter } from './openai.js';
import { OllamaAdapter } from './ollama.js';
import type { LLMProviderAdapter } from './types.js';

export type TierLabel = 'primary' | 'secondary' | 'tertiary';

export const TIER_ORDER: readonly TierLabel[] = ['primary', 'secondary', 'tertiary'];

/**
 * One configured position in the provider cascade
 */
export interface ProviderTier {
  label: TierLabel;
  adapter: LLMProviderAdapter;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

export function createAdapter(config: ProviderTierConfig): LLMProviderAdapter {
  switch (config.provider) {
    case 'openai':
      return new OpenAIAdapter({ baseUrl: config.base_url, apiKeyEnv: config.api_key_env });
    case 'anthropic':
      return new AnthropicAdapter({ baseUrl: config.base_url, apiKeyEnv: config.api_key_env });
    case 'ollama':
      return new OllamaAdapter(config.base_url);
  }
}

/**
 * Build the ordered cascade from the [llm] section. Tiers left out of the
 * config are simply absent.
 */
export function createProviderChain(config: LLMConfig): ProviderTier[] {
  const tiers: ProviderTier[] = [];

  for (const label of TIER_ORDER) {
    const tierConfig = config[label];
    if (!tierConfig) continue;

    tiers.push({
      label,
      adapter: createAdapter(tierConfig),
      model: tierConfig.model,
      maxTokens: tierConfig.max_tokens ?? config.max_tokens,
      temperature: tierConfig.temperature ?? config.temperature,
    });
  }

  return tiers;
}
