import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { CompleteOptions } from '@parley/llm-proxy';
import { EchoTool } from '@parley/tool-echo';
import { InfraCommandTool } from '@parley/tool-infra';
import type { InboundMessage, LLMMessage, NormalizedReply, ToolCallRequest } from '@parley/types';
import { noopLogger } from '@parley/utils';
import { CONFIRMATION_SESSION_KEY, ConversationStateStore } from './state.js';
import { ConfirmationManager } from './tools/confirmation-manager.js';
import { ToolRegistry } from './tools/registry.js';
import {
  TurnLoop,
  clarificationQuestion,
  formatToolResult,
  type CompletionExecutor,
} from './turn-loop.js';

class ScriptedExecutor implements CompletionExecutor {
  public readonly calls: Array<{ turns: LLMMessage[]; options: CompleteOptions }> = [];

  constructor(private readonly replies: NormalizedReply[]) {}

  async complete(turns: LLMMessage[], options: CompleteOptions = {}): Promise<NormalizedReply> {
    this.calls.push({ turns: [...turns], options });
    const next = this.replies.shift();
    if (!next) throw new Error('no scripted reply left');
    return next;
  }
}

function textReply(text: string): NormalizedReply {
  return { kind: 'text', provider: 'fake', model: 'fake-1', text };
}

function toolReply(call: ToolCallRequest): NormalizedReply {
  return { kind: 'tool_call', provider: 'fake', model: 'fake-1', text: '', toolCall: call };
}

function createMessage(text: string): InboundMessage {
  return {
    id: 'msg-1',
    text,
    sender: { id: 'admin-1', role: 'admin' },
    conversationId: 'conv-1',
    timestamp: '2024-03-01T12:00:00.000Z',
  };
}

describe('TurnLoop', () => {
  let registry: ToolRegistry;
  let confirmations: ConfirmationManager;
  let states: ConversationStateStore;
  let runCommand: ReturnType<typeof vi.fn>;

  function createLoop(executor: CompletionExecutor, historyTurns = 10): TurnLoop {
    return new TurnLoop({
      executor,
      registry,
      confirmations,
      states,
      systemPrompt: 'You are a test assistant.',
      historyTurns,
      logger: noopLogger,
    });
  }

  beforeEach(() => {
    runCommand = vi.fn(async () => ({ success: true, response: 'done' }));
    registry = new ToolRegistry({ logger: noopLogger });
    registry.register(new EchoTool({ logger: noopLogger }));
    registry.register(new InfraCommandTool({ executor: { execute: runCommand }, logger: noopLogger }));
    confirmations = new ConfirmationManager({ registry, logger: noopLogger });
    states = new ConversationStateStore({ logger: noopLogger });
  });

  it('should return a plain reply and remember the exchange', async () => {
    const executor = new ScriptedExecutor([textReply('Hello!'), textReply('Still here.')]);
    const loop = createLoop(executor);

    const first = await loop.run(createMessage('hi'), { traceId: 't1', allowTools: false });
    await loop.run(createMessage('are you there?'), { traceId: 't2', allowTools: false });

    expect(first).toEqual({ text: 'Hello!', outcome: 'reply', provider: 'fake' });
    expect(executor.calls[0]?.options).toEqual({ tools: undefined, traceId: 't1' });
    expect(executor.calls[1]?.turns).toEqual([
      { role: 'system', content: 'You are a test assistant.' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello!' },
      { role: 'user', content: 'are you there?' },
    ]);
  });

  it('should cap remembered history', async () => {
    const executor = new ScriptedExecutor([textReply('a'), textReply('b'), textReply('c')]);
    const loop = createLoop(executor, 1);

    await loop.run(createMessage('one'), { traceId: 't1', allowTools: false });
    await loop.run(createMessage('two'), { traceId: 't2', allowTools: false });

    expect(loop.getHistory('admin-1')).toEqual([
      { role: 'user', content: 'two' },
      { role: 'assistant', content: 'b' },
    ]);
    loop.clearHistory('admin-1');
    expect(loop.getHistory('admin-1')).toEqual([]);
  });

  it('should forget the history of idle users', async () => {
    let current = Date.parse('2024-03-01T12:00:00.000Z');
    const executor = new ScriptedExecutor([textReply('a'), textReply('b')]);
    const loop = new TurnLoop({
      executor,
      registry,
      confirmations,
      states,
      systemPrompt: 'You are a test assistant.',
      historyIdleMs: 60_000,
      logger: noopLogger,
      now: () => current,
    });

    await loop.run(createMessage('one'), { traceId: 't1', allowTools: false });
    current += 30_000;
    expect(loop.pruneHistory()).toBe(0);
    await loop.run(createMessage('two'), { traceId: 't2', allowTools: false });

    current += 59_000;
    expect(loop.pruneHistory()).toBe(0);
    expect(loop.getHistory('admin-1')).toHaveLength(4);

    current += 2_000;
    expect(loop.pruneHistory()).toBe(1);
    expect(loop.getHistory('admin-1')).toEqual([]);
  });

  it('should offer the enabled tool catalog when tools are allowed', async () => {
    registry.disable('mcp');
    const executor = new ScriptedExecutor([textReply('ok')]);

    await createLoop(executor).run(createMessage('hi'), { traceId: 't1', allowTools: true });

    expect(executor.calls[0]?.options.tools?.map((tool) => tool.name)).toEqual(['echo']);
  });

  it('should run a tool and phrase the result with a second completion', async () => {
    const call = { id: 'call-1', name: 'echo', arguments: { message: 'ping' } };
    const executor = new ScriptedExecutor([toolReply(call), textReply('The echo says ping.')]);

    const result = await createLoop(executor).run(createMessage('echo ping'), {
      traceId: 't1',
      allowTools: true,
    });

    expect(result.outcome).toBe('tool_result');
    expect(result.text).toBe('The echo says ping.');
    expect(result.toolName).toBe('echo');
    expect(result.toolResult?.data).toEqual({ echo: 'ping', original: 'ping', uppercase: false });

    const followUp = executor.calls[1]?.turns ?? [];
    expect(followUp.slice(-2)).toEqual([
      { role: 'assistant', content: '', toolCalls: [call] },
      {
        role: 'tool',
        content: JSON.stringify({
          success: true,
          data: { echo: 'ping', original: 'ping', uppercase: false },
        }),
        toolCallId: 'call-1',
        name: 'echo',
      },
    ]);
    expect(executor.calls[1]?.options.tools).toBeUndefined();
  });

  it('should fall back to the formatted result when the phrasing is empty', async () => {
    const executor = new ScriptedExecutor([
      toolReply({ id: 'call-1', name: 'missing', arguments: {} }),
      textReply('   '),
    ]);

    const result = await createLoop(executor).run(createMessage('do it'), { traceId: 't1', allowTools: true });

    expect(result.text).toBe("The missing tool failed: Tool 'missing' not found");
  });

  it('should open a confirmation instead of running a gated tool', async () => {
    const executor = new ScriptedExecutor([
      toolReply({ id: 'call-1', name: 'mcp', arguments: { command: 'delete app web' } }),
    ]);

    const result = await createLoop(executor).run(createMessage('delete app web'), {
      traceId: 't1',
      allowTools: true,
    });

    expect(result.outcome).toBe('confirmation');
    expect(result.text).toContain('Command: /mcp delete app web');
    expect(runCommand).not.toHaveBeenCalled();
    expect(executor.calls).toHaveLength(1);

    const state = states.get('admin-1');
    expect(state?.kind).toBe('confirmation');
    expect(state?.toolName).toBe('mcp');
    expect(state?.parameters).toEqual({ command: 'delete app web', [CONFIRMATION_SESSION_KEY]: result.sessionId });
    expect(confirmations.getPendingSessions('admin-1').map((s) => s.sessionId)).toEqual([result.sessionId]);
  });

  it('should ask for clarification when tool parameters are invalid', async () => {
    const executor = new ScriptedExecutor([toolReply({ id: 'call-1', name: 'echo', arguments: {} })]);

    const result = await createLoop(executor).run(createMessage('echo something'), {
      traceId: 't1',
      allowTools: true,
    });

    expect(result.outcome).toBe('clarification');
    expect(result.text.startsWith("I need 'message' to run echo.")).toBe(true);
    const state = states.get('admin-1');
    expect(state?.kind).toBe('clarification');
    expect(state?.originalMessage).toBe('echo something');
    expect(state?.parameters).toEqual({ field: 'message', options: [] });
  });

  it('should validate a gated tool before opening a session', async () => {
    const executor = new ScriptedExecutor([toolReply({ id: 'call-1', name: 'mcp', arguments: { command: '' } })]);

    const result = await createLoop(executor).run(createMessage('run something'), {
      traceId: 't1',
      allowTools: true,
    });

    expect(result.outcome).toBe('clarification');
    expect(confirmations.getStats().totalSessions).toBe(0);
    expect(states.get('admin-1')?.toolName).toBe('mcp');
  });
});

describe('formatToolResult', () => {
  it('should prefer the response text of a successful result', () => {
    expect(
      formatToolResult('mcp', { success: true, data: { response: 'All good' }, metadata: { toolName: 'mcp' } })
    ).toBe('All good');
  });

  it('should dump data without a response', () => {
    expect(formatToolResult('echo', { success: true, data: { echo: 'x' }, metadata: { toolName: 'echo' } })).toBe(
      'The echo tool completed.\n{\n  "echo": "x"\n}'
    );
  });
});

describe('clarificationQuestion', () => {
  it('should name the missing field', () => {
    expect(clarificationQuestion('echo', 'message', 'It is required.')).toBe(
      "I need 'message' to run echo. It is required.\nPlease reply with the missing information."
    );
    expect(clarificationQuestion('echo', '(root)', 'x')).toBe(
      'I need a few more details to run echo. x\nPlease reply with the missing information.'
    );
  });
});
