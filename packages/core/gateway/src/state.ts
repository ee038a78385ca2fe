/**
 * Conversation state store
 *
 * At most one active state per user, kept in memory with a TTL. Replaced,
 * cleared and expired states are archived into a bounded per-user history.
 * Expiry is checked lazily on read; `cleanupExpired` exists for memory bounds.
 */

import { Type, type Static } from '@sinclair/typebox';
import { formatValidationErrors, validate } from '@parley/types';
import { createLogger, type Logger } from '@parley/utils';

export type StateKind = 'normal' | 'confirmation' | 'clarification' | 'multi_step';

export interface ConversationState {
  userId: string;
  kind: StateKind;
  originalMessage: string;
  toolName?: string;
  parameters: Record<string, unknown>;
  createdAt: Date;
  expiresAt: Date;
}

export interface SetStateOptions {
  toolName?: string;
  parameters?: Record<string, unknown>;
  ttlMs?: number;
}

export type StatePatch = Partial<Pick<ConversationState, 'originalMessage' | 'toolName' | 'parameters' | 'expiresAt'>>;

export interface StateStoreStats {
  activeStates: number;
  byKind: Partial<Record<StateKind, number>>;
  usersWithHistory: number;
  totalHistoryRecords: number;
}

/**
 * Flat record used to move a state across process boundaries
 */
export const ExportedStateSchema = Type.Object({
  user_id: Type.String({ minLength: 1 }),
  state_type: Type.Union([
    Type.Literal('normal'),
    Type.Literal('confirmation'),
    Type.Literal('clarification'),
    Type.Literal('multi_step'),
  ]),
  original_message: Type.String(),
  tool_to_execute: Type.Union([Type.String(), Type.Null()]),
  parameters: Type.Record(Type.String(), Type.Unknown()),
  created_at: Type.String(),
  expires_at: Type.String(),
});

export type ExportedState = Static<typeof ExportedStateSchema>;

export const DEFAULT_KIND_TTL_MS: Readonly<Record<StateKind, number>> = {
  normal: 60_000,
  confirmation: 300_000,
  clarification: 180_000,
  multi_step: 600_000,
};

export interface ConversationStateStoreOptions {
  /** Used when neither the call nor the kind table gives a TTL */
  defaultTtlMs?: number;
  kindTtlMs?: Partial<Record<StateKind, number>>;
  historyLimit?: number;
  logger?: Logger;
  now?: () => number;
}

/** Parameter key linking a confirmation state to its session */
export const CONFIRMATION_SESSION_KEY = 'confirmation_session_id';

export class ConversationStateStore {
  private readonly states = new Map<string, ConversationState>();
  private readonly history = new Map<string, ConversationState[]>();
  private readonly defaultTtlMs: number;
  private readonly kindTtlMs: Partial<Record<StateKind, number>>;
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ConversationStateStoreOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? 3_600_000;
    this.kindTtlMs = { ...DEFAULT_KIND_TTL_MS, ...options.kindTtlMs };
    this.historyLimit = options.historyLimit ?? 10;
    this.logger = options.logger ?? createLogger('state');
    this.now = options.now ?? Date.now;
  }

  set(userId: string, kind: StateKind, originalMessage: string, options: SetStateOptions = {}): ConversationState {
    const previous = this.states.get(userId);
    if (previous) {
      this.archive(previous);
    }

    const createdAt = this.now();
    const ttlMs = options.ttlMs ?? this.kindTtlMs[kind] ?? this.defaultTtlMs;
    const state: ConversationState = {
      userId,
      kind,
      originalMessage,
      toolName: options.toolName,
      parameters: { ...options.parameters },
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + ttlMs),
    };

    this.states.set(userId, state);
    this.logger.debug(`Set ${kind} state for user ${userId} (ttl ${ttlMs}ms)`);
    return state;
  }

  get(userId: string): ConversationState | null {
    const state = this.states.get(userId);
    if (!state) return null;

    if (this.now() > state.expiresAt.getTime()) {
      this.states.delete(userId);
      this.archive(state);
      this.logger.debug(`State for user ${userId} expired`);
      return null;
    }
    return state;
  }

  update(userId: string, patch: StatePatch): ConversationState | null {
    const state = this.get(userId);
    if (!state) return null;

    Object.assign(state, patch);
    return state;
  }

  clear(userId: string): boolean {
    const state = this.states.get(userId);
    if (!state) return false;

    this.states.delete(userId);
    this.archive(state);
    this.logger.debug(`Cleared state for user ${userId}`);
    return true;
  }

  setNormalState(userId: string): ConversationState {
    return this.set(userId, 'normal', '');
  }

  setConfirmationState(
    userId: string,
    originalMessage: string,
    toolName: string,
    parameters: Record<string, unknown>,
    sessionId: string
  ): ConversationState {
    return this.set(userId, 'confirmation', originalMessage, {
      toolName,
      parameters: { ...parameters, [CONFIRMATION_SESSION_KEY]: sessionId },
    });
  }

  setClarificationState(
    userId: string,
    originalMessage: string,
    question: { toolName?: string; field?: string; options?: unknown[] } = {}
  ): ConversationState {
    return this.set(userId, 'clarification', originalMessage, {
      toolName: question.toolName,
      parameters: { field: question.field, options: question.options ?? [] },
    });
  }

  setMultiStepState(
    userId: string,
    originalMessage: string,
    currentStep: number,
    totalSteps: number,
    stepData: Record<string, unknown> = {}
  ): ConversationState {
    return this.set(userId, 'multi_step', originalMessage, {
      parameters: { current_step: currentStep, total_steps: totalSteps, step_data: stepData },
    });
  }

  /** Oldest first, at most `limit` entries */
  getHistory(userId: string, limit = 5): ConversationState[] {
    const history = this.history.get(userId) ?? [];
    return limit > 0 ? history.slice(-limit) : [];
  }

  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [userId, state] of [...this.states]) {
      if (now > state.expiresAt.getTime()) {
        this.clear(userId);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.info(`Removed ${removed} expired conversation states`);
    }
    return removed;
  }

  getStats(): StateStoreStats {
    const byKind: Partial<Record<StateKind, number>> = {};
    for (const state of this.states.values()) {
      byKind[state.kind] = (byKind[state.kind] ?? 0) + 1;
    }

    let totalHistoryRecords = 0;
    for (const entries of this.history.values()) {
      totalHistoryRecords += entries.length;
    }

    return {
      activeStates: this.states.size,
      byKind,
      usersWithHistory: this.history.size,
      totalHistoryRecords,
    };
  }

  exportState(userId: string): ExportedState | null {
    const state = this.get(userId);
    if (!state) return null;

    return {
      user_id: state.userId,
      state_type: state.kind,
      original_message: state.originalMessage,
      tool_to_execute: state.toolName ?? null,
      parameters: { ...state.parameters },
      created_at: state.createdAt.toISOString(),
      expires_at: state.expiresAt.toISOString(),
    };
  }

  /**
   * Restore an exported record. Replaces the user's current state without
   * archiving it. Returns null when the record is malformed.
   */
  importState(record: unknown): ConversationState | null {
    const result = validate(ExportedStateSchema, record);
    if (!result.success) {
      this.logger.error(`Rejected state import: ${formatValidationErrors(result.errors)}`);
      return null;
    }

    const data = result.data;
    const createdAt = Date.parse(data.created_at);
    const expiresAt = Date.parse(data.expires_at);
    if (Number.isNaN(createdAt) || Number.isNaN(expiresAt)) {
      this.logger.error('Rejected state import: unparseable timestamp');
      return null;
    }

    const state: ConversationState = {
      userId: data.user_id,
      kind: data.state_type,
      originalMessage: data.original_message,
      toolName: data.tool_to_execute ?? undefined,
      parameters: { ...data.parameters },
      createdAt: new Date(createdAt),
      expiresAt: new Date(expiresAt),
    };
    this.states.set(state.userId, state);
    return state;
  }

  private archive(state: ConversationState): void {
    const entries = this.history.get(state.userId) ?? [];
    entries.push(state);
    while (entries.length > this.historyLimit) {
      entries.shift();
    }
    this.history.set(state.userId, entries);
  }
}
