import { describe, it, expect, beforeEach } from 'vitest';
import { noopLogger } from '@parley/utils';
import { ConversationStateStore, CONFIRMATION_SESSION_KEY } from './state.js';

describe('ConversationStateStore', () => {
  let current: number;
  let store: ConversationStateStore;

  beforeEach(() => {
    current = Date.parse('2024-03-01T12:00:00.000Z');
    store = new ConversationStateStore({ logger: noopLogger, now: () => current });
  });

  it('should return the state that was set', () => {
    const state = store.set('u1', 'confirmation', 'delete app x', {
      toolName: 'mcp',
      parameters: { command: 'delete app x' },
    });

    expect(store.get('u1')).toBe(state);
    expect(state.kind).toBe('confirmation');
    expect(state.toolName).toBe('mcp');
    expect(state.parameters).toEqual({ command: 'delete app x' });
  });

  it('should apply per-kind default TTLs', () => {
    expect(store.set('u1', 'normal', '').expiresAt.getTime() - current).toBe(60_000);
    expect(store.set('u1', 'confirmation', '').expiresAt.getTime() - current).toBe(300_000);
    expect(store.set('u1', 'clarification', '').expiresAt.getTime() - current).toBe(180_000);
    expect(store.set('u1', 'multi_step', '').expiresAt.getTime() - current).toBe(600_000);
    expect(store.set('u1', 'normal', '', { ttlMs: 5 }).expiresAt.getTime() - current).toBe(5);
  });

  it('should fall back to the store-wide TTL for kinds without one', () => {
    const custom = new ConversationStateStore({
      defaultTtlMs: 42_000,
      kindTtlMs: { normal: undefined },
      logger: noopLogger,
      now: () => current,
    });

    expect(custom.set('u1', 'normal', '').expiresAt.getTime() - current).toBe(42_000);
  });

  it('should expire lazily into history', () => {
    const state = store.set('u1', 'normal', 'hello', { ttlMs: 1_000 });

    current += 1_000;
    expect(store.get('u1')).toBe(state);

    current += 1;
    expect(store.get('u1')).toBeNull();
    expect(store.getHistory('u1')).toEqual([state]);
  });

  it('should archive the previous state on set and bound the history', () => {
    const bounded = new ConversationStateStore({ historyLimit: 3, logger: noopLogger, now: () => current });
    for (let i = 1; i <= 5; i++) {
      bounded.set('u1', 'normal', `message ${i}`);
    }

    const history = bounded.getHistory('u1', 10);
    expect(history.map((s) => s.originalMessage)).toEqual(['message 2', 'message 3', 'message 4']);
    expect(bounded.get('u1')?.originalMessage).toBe('message 5');
    expect(bounded.getHistory('u1', 1).map((s) => s.originalMessage)).toEqual(['message 4']);
  });

  it('should clear into history', () => {
    store.set('u1', 'clarification', 'restart');

    expect(store.clear('u1')).toBe(true);
    expect(store.clear('u1')).toBe(false);
    expect(store.get('u1')).toBeNull();
    expect(store.getHistory('u1')).toHaveLength(1);
  });

  it('should update live states only', () => {
    store.set('u1', 'normal', 'hi');

    expect(store.update('u1', { toolName: 'echo' })?.toolName).toBe('echo');
    expect(store.update('u2', { toolName: 'echo' })).toBeNull();
  });

  it('should record the confirmation session in the parameters', () => {
    const state = store.setConfirmationState('u1', 'delete app x', 'mcp', { command: 'delete app x' }, 's-1');

    expect(state.parameters).toEqual({ command: 'delete app x', [CONFIRMATION_SESSION_KEY]: 's-1' });
  });

  it('should describe multi-step and clarification progress', () => {
    expect(store.setMultiStepState('u1', 'deploy', 2, 4, { app: 'api' }).parameters).toEqual({
      current_step: 2,
      total_steps: 4,
      step_data: { app: 'api' },
    });
    expect(
      store.setClarificationState('u1', 'run it', { toolName: 'mcp', field: 'command' }).parameters
    ).toEqual({ field: 'command', options: [] });
  });

  it('should sweep expired states', () => {
    store.set('u1', 'normal', 'a');
    store.set('u2', 'multi_step', 'b');

    current += 120_000;
    expect(store.cleanupExpired()).toBe(1);
    expect(store.getStats()).toEqual({
      activeStates: 1,
      byKind: { multi_step: 1 },
      usersWithHistory: 1,
      totalHistoryRecords: 1,
    });
  });

  it('should round-trip a state through export and import', () => {
    const original = store.set('u1', 'confirmation', 'delete app x', {
      toolName: 'mcp',
      parameters: { command: 'delete app x', [CONFIRMATION_SESSION_KEY]: 's-1' },
    });

    const exported = store.exportState('u1');
    expect(exported).toEqual({
      user_id: 'u1',
      state_type: 'confirmation',
      original_message: 'delete app x',
      tool_to_execute: 'mcp',
      parameters: { command: 'delete app x', [CONFIRMATION_SESSION_KEY]: 's-1' },
      created_at: '2024-03-01T12:00:00.000Z',
      expires_at: '2024-03-01T12:05:00.000Z',
    });

    const other = new ConversationStateStore({ logger: noopLogger, now: () => current });
    const restored = other.importState(JSON.parse(JSON.stringify(exported)));

    expect(restored).toEqual(original);
    expect(other.get('u1')).toEqual(original);
  });

  it('should reject malformed imports', () => {
    expect(store.importState({ user_id: 'u1', state_type: 'bogus' })).toBeNull();
    expect(
      store.importState({
        user_id: 'u1',
        state_type: 'normal',
        original_message: '',
        tool_to_execute: null,
        parameters: {},
        created_at: 'yesterday',
        expires_at: 'tomorrow',
      })
    ).toBeNull();
    expect(store.get('u1')).toBeNull();
  });

  it('should export nothing for users without a live state', () => {
    expect(store.exportState('nobody')).toBeNull();
  });
});
