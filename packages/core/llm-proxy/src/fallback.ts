import {
  createProviderUnavailableError,
  type LLMMessage,
  type LLMToolDefinition,
  type NormalizedReply,
  type TraceEventOptions,
  type TraceSink,
} from '@parley/types';
import { noopLogger, type Logger } from '@parley/utils';
import { normalizeTextOnly } from './adapters/ollama.js';
import { TIER_ORDER, type ProviderTier, type TierLabel } from './adapters/registry.js';
import { mapProviderError, type ProviderErrorKind, type ProviderRequest } from './adapters/types.js';
import { CooldownManager } from './cooldowns.js';

export interface CompleteOptions {
  tools?: LLMToolDefinition[];
  traceId?: string;
}

export interface ProviderAttempt {
  tier: TierLabel;
  provider: string;
  model: string;
  kind: ProviderErrorKind;
  error: string;
}

export interface ProviderFallbackOptions {
  tiers: ProviderTier[];
  cooldowns?: CooldownManager;
  tracer?: TraceSink;
  logger?: Logger;
  now?: () => number;
}

export interface TierStatus {
  tier: TierLabel;
  provider: string;
  model: string;
  coolingDown: boolean;
  cooldownRemainingMs: number;
}

/**
 * Reduce a conversation to what the degraded tier gets: the system prompt
 * and the most recent user utterance. Tool results that answer that
 * utterance are folded into its text, since the degraded tier takes no
 * tool turns.
 */
export function degradeRequest(turns: LLMMessage[]): LLMMessage[] {
  const system = turns.find((turn) => turn.role === 'system');
  let latestUserIndex = -1;
  for (let i = turns.length - 1; i >= 0; i--) {
    if (turns[i]?.role === 'user') {
      latestUserIndex = i;
      break;
    }
  }

  const result: LLMMessage[] = [];
  if (system) result.push({ role: 'system', content: system.content });

  const latestUser = turns[latestUserIndex];
  if (latestUser) {
    const toolResults = turns
      .slice(latestUserIndex + 1)
      .filter((turn) => turn.role === 'tool')
      .map((turn) => `Result of tool '${turn.name ?? 'unknown'}': ${turn.content}`);
    const content = [latestUser.content, ...toolResults].join('\n\n');
    result.push({ role: 'user', content });
  }
  return result;
}

function cooldownKey(tier: ProviderTier): string {
  return `${tier.adapter.name}:${tier.model}`;
}

/**
 * Walks the provider tiers in order until one answers. Each tier is called
 * at most once per completion; failures are classified, traced and skipped.
 */
export class ProviderFallbackExecutor {
  private readonly tiers: ProviderTier[];
  private readonly cooldowns: CooldownManager;
  private readonly tracer?: TraceSink;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ProviderFallbackOptions) {
    this.tiers = options.tiers;
    this.cooldowns = options.cooldowns ?? new CooldownManager();
    this.tracer = options.tracer;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  async complete(turns: LLMMessage[], options: CompleteOptions = {}): Promise<NormalizedReply> {
    const attempts: ProviderAttempt[] = [];

    for (const label of TIER_ORDER) {
      const tier = this.tiers.find((candidate) => candidate.label === label);
      if (!tier) {
        attempts.push(this.recordMissing(label, options.traceId));
        continue;
      }

      const key = cooldownKey(tier);

      if (this.cooldowns.isCooling(key)) {
        const error = `in cooldown for ${this.cooldowns.remainingMs(key)}ms`;
        attempts.push(this.recordFailure(tier, 'unavailable', error, 0, options.traceId));
        continue;
      }

      const degraded = tier.label === 'tertiary';
      const request: ProviderRequest = degraded
        ? { messages: degradeRequest(turns) }
        : { messages: turns, tools: tier.adapter.supportsTools ? options.tools : undefined };

      const startedAt = this.now();
      try {
        const reply = await tier.adapter.send(request, {
          model: tier.model,
          maxTokens: tier.maxTokens,
          temperature: tier.temperature,
        });
        const durationMs = this.now() - startedAt;
        const normalized = degraded ? normalizeTextOnly(reply) : reply;

        this.cooldowns.clear(key);
        this.trace(options.traceId, {
          durationMs,
          detail: {
            tier: tier.label,
            provider: normalized.provider,
            model: normalized.model,
            kind: normalized.kind,
            degraded,
          },
        });
        this.logger.debug(`${tier.label} tier answered via ${normalized.provider} in ${durationMs}ms`);
        return normalized;
      } catch (error) {
        const providerError = mapProviderError(error, tier.adapter.name);
        if (providerError.kind === 'rate_limit' || providerError.kind === 'billing') {
          this.cooldowns.markFailure(key, providerError.kind);
        }
        attempts.push(
          this.recordFailure(
            tier,
            providerError.kind,
            providerError.message,
            this.now() - startedAt,
            options.traceId
          )
        );
      }
    }

    throw createProviderUnavailableError(
      `All provider tiers failed: ${attempts.map((a) => `${a.tier}=${a.kind}`).join(', ')}`,
      {
        component: 'llm-proxy',
        correlationId: options.traceId,
        details: { attempts },
      }
    );
  }

  getStatus(): TierStatus[] {
    return this.tiers.map((tier) => {
      const key = cooldownKey(tier);
      return {
        tier: tier.label,
        provider: tier.adapter.name,
        model: tier.model,
        coolingDown: this.cooldowns.isCooling(key),
        cooldownRemainingMs: this.cooldowns.remainingMs(key),
      };
    });
  }

  private trace(traceId: string | undefined, options: TraceEventOptions): void {
    if (traceId) {
      this.tracer?.event(traceId, 'provider', 'provider_call', options);
    }
  }

  private recordMissing(label: TierLabel, traceId: string | undefined): ProviderAttempt {
    this.logger.debug(`${label} tier is not configured`);
    this.trace(traceId, {
      success: false,
      error: 'unavailable: not configured',
      durationMs: 0,
      detail: { tier: label, kind: 'unavailable' },
    });
    return { tier: label, provider: 'none', model: 'none', kind: 'unavailable', error: 'not configured' };
  }

  private recordFailure(
    tier: ProviderTier,
    kind: ProviderErrorKind,
    error: string,
    durationMs: number,
    traceId: string | undefined
  ): ProviderAttempt {
    this.logger.warn(`${tier.label} tier (${tier.adapter.name}:${tier.model}) failed: ${kind}: ${error}`);
    this.trace(traceId, {
      success: false,
      error: `${kind}: ${error}`,
      durationMs,
      detail: { tier: tier.label, provider: tier.adapter.name, model: tier.model, kind },
    });
    return { tier: tier.label, provider: tier.adapter.name, model: tier.model, kind, error };
  }
}
