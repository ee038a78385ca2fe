import type { LLMCooldownConfig } from '@parley/config';

export interface CooldownState {
  count: number;
  until: number;
  reason: CooldownReason;
}

export type CooldownReason = 'rate_limit' | 'billing';

/**
 * Backs off a provider after quota failures. Rate limits grow geometrically
 * from seconds; billing failures back off in hours.
 */
export class CooldownManager {
  private readonly states = new Map<string, CooldownState>();

  constructor(
    private readonly baseSeconds = 60,
    private readonly multiplier = 5,
    private readonly maxSeconds = 3600,
    private readonly billingBaseHours = 5,
    private readonly billingMaxHours = 24,
    private readonly now: () => number = Date.now
  ) {}

  static fromConfig(config: LLMCooldownConfig = {}, now?: () => number): CooldownManager {
    return new CooldownManager(
      config.initial_seconds,
      config.multiplier,
      config.max_seconds,
      config.billing_initial_hours,
      config.billing_max_hours,
      now
    );
  }

  isCooling(key: string): boolean {
    return this.remainingMs(key) > 0;
  }

  remainingMs(key: string): number {
    const state = this.states.get(key);
    if (!state) return 0;
    return Math.max(0, state.until - this.now());
  }

  markFailure(key: string, reason: CooldownReason): void {
    const state = this.states.get(key) ?? { count: 0, until: 0, reason };
    state.count += 1;
    state.reason = reason;

    if (reason === 'billing') {
      const hours = Math.min(this.billingBaseHours * Math.pow(2, state.count - 1), this.billingMaxHours);
      state.until = this.now() + hours * 60 * 60 * 1000;
    } else {
      const seconds = Math.min(this.baseSeconds * Math.pow(this.multiplier, state.count - 1), this.maxSeconds);
      state.until = this.now() + seconds * 1000;
    }

    this.states.set(key, state);
  }

  clear(key: string): void {
    this.states.delete(key);
  }

  snapshot(): Record<string, { reason: CooldownReason; remainingMs: number; failures: number }> {
    const result: Record<string, { reason: CooldownReason; remainingMs: number; failures: number }> = {};
    for (const [key, state] of this.states) {
      result[key] = { reason: state.reason, remainingMs: this.remainingMs(key), failures: state.count };
    }
    return result;
  }
}
