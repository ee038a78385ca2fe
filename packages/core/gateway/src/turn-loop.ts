/**
 * Turn loop
 *
 * One user turn: build the conversation, ask the provider cascade, and act on
 * a tool directive. Confirmation-gated tools open a confirmation session
 * instead of running; invalid tool parameters switch the user into a
 * clarification state; anything else runs and is phrased by a second
 * completion.
 */

import type { CompleteOptions } from '@parley/llm-proxy';
import {
  ParleyErrorCodes,
  type InboundMessage,
  type LLMMessage,
  type NormalizedReply,
  type ToolCallRequest,
  type ToolResult,
  type TraceSink,
} from '@parley/types';
import { createLogger, type Logger } from '@parley/utils';
import type { ConversationStateStore } from './state.js';
import type { ConfirmationManager } from './tools/confirmation-manager.js';
import type { ToolRegistry } from './tools/registry.js';

/**
 * Anything that can complete a conversation; the provider cascade in
 * production, fakes in tests
 */
export interface CompletionExecutor {
  complete(turns: LLMMessage[], options?: CompleteOptions): Promise<NormalizedReply>;
}

export type TurnOutcome = 'reply' | 'confirmation' | 'clarification' | 'tool_result';

export interface TurnResult {
  text: string;
  outcome: TurnOutcome;
  provider?: string;
  toolName?: string;
  sessionId?: string;
  toolResult?: ToolResult;
}

export interface TurnOptions {
  traceId: string;
  allowTools: boolean;
}

export interface TurnLoopOptions {
  executor: CompletionExecutor;
  registry: ToolRegistry;
  confirmations: ConfirmationManager;
  states: ConversationStateStore;
  systemPrompt: string;
  /** Prior exchanges replayed per user */
  historyTurns?: number;
  /** Idle time after which a user's history is dropped by pruneHistory() */
  historyIdleMs?: number;
  tracer?: TraceSink;
  logger?: Logger;
  now?: () => number;
}

interface UserHistory {
  turns: LLMMessage[];
  lastActiveAt: number;
}

/**
 * Render a tool result for the user when no model phrases it
 */
export function formatToolResult(toolName: string, result: ToolResult): string {
  if (!result.success) {
    return `The ${toolName} tool failed: ${result.error?.message ?? 'unknown error'}`;
  }

  const response = result.data?.response;
  if (typeof response === 'string' && response.length > 0) {
    return response;
  }
  return `The ${toolName} tool completed.\n${JSON.stringify(result.data ?? {}, null, 2)}`;
}

export function clarificationQuestion(toolName: string, field: string | undefined, detail: string): string {
  const subject = field && field !== '(root)' ? `'${field}'` : 'a few more details';
  return `I need ${subject} to run ${toolName}. ${detail}\nPlease reply with the missing information.`;
}

export class TurnLoop {
  private readonly executor: CompletionExecutor;
  private readonly registry: ToolRegistry;
  private readonly confirmations: ConfirmationManager;
  private readonly states: ConversationStateStore;
  private readonly systemPrompt: string;
  private readonly historyTurns: number;
  private readonly tracer?: TraceSink;
  private readonly historyIdleMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly history = new Map<string, UserHistory>();

  constructor(options: TurnLoopOptions) {
    this.executor = options.executor;
    this.registry = options.registry;
    this.confirmations = options.confirmations;
    this.states = options.states;
    this.systemPrompt = options.systemPrompt;
    this.historyTurns = options.historyTurns ?? 10;
    this.historyIdleMs = options.historyIdleMs ?? 3_600_000;
    this.tracer = options.tracer;
    this.logger = options.logger ?? createLogger('turn-loop');
    this.now = options.now ?? Date.now;
  }

  async run(message: InboundMessage, options: TurnOptions): Promise<TurnResult> {
    const userId = message.sender.id;
    const turns: LLMMessage[] = [
      { role: 'system', content: this.systemPrompt },
      ...this.getHistory(userId),
      { role: 'user', content: message.text },
    ];

    const reply = await this.executor.complete(turns, {
      tools: options.allowTools ? this.registry.getToolDefinitions() : undefined,
      traceId: options.traceId,
    });

    if (reply.kind === 'text') {
      this.remember(userId, message.text, reply.text);
      return { text: reply.text, outcome: 'reply', provider: reply.provider };
    }

    return this.handleToolCall(message, turns, reply.toolCall, reply.text, options);
  }

  getHistory(userId: string): LLMMessage[] {
    return [...(this.history.get(userId)?.turns ?? [])];
  }

  clearHistory(userId: string): void {
    this.history.delete(userId);
  }

  /** Drop the history of users idle longer than historyIdleMs */
  pruneHistory(): number {
    const cutoff = this.now() - this.historyIdleMs;
    let pruned = 0;
    for (const [userId, entry] of this.history) {
      if (entry.lastActiveAt < cutoff) {
        this.history.delete(userId);
        pruned++;
      }
    }
    return pruned;
  }

  private async handleToolCall(
    message: InboundMessage,
    turns: LLMMessage[],
    call: ToolCallRequest,
    preamble: string,
    options: TurnOptions
  ): Promise<TurnResult> {
    const userId = message.sender.id;
    const tool = this.registry.get(call.name);

    if (tool && tool.requiresConfirmation && this.registry.isEnabled(call.name)) {
      const validation = tool.validate(call.arguments);
      if (!validation.valid) {
        return this.askForClarification(message, call.name, validation.field, validation.message, options);
      }

      const sessionId = this.confirmations.open(userId, call.name, call.arguments);
      const prompt = this.confirmations.getSession(sessionId)?.prompt ?? `Confirm running ${call.name}? Yes/No`;
      this.states.setConfirmationState(userId, message.text, call.name, call.arguments, sessionId);
      this.tracer?.event(options.traceId, 'confirmation', 'confirmation_requested', {
        detail: { tool: call.name, sessionId },
      });
      this.logger.info(`Awaiting confirmation ${sessionId} for '${call.name}' from user ${userId}`);
      return { text: prompt, outcome: 'confirmation', toolName: call.name, sessionId };
    }

    const result = await this.registry.execute(call.name, call.arguments, {
      userId,
      traceId: options.traceId,
    });

    if (!result.success && result.error?.code === ParleyErrorCodes.INVALID_PARAMETERS) {
      return this.askForClarification(message, call.name, result.error.field, result.error.message, options);
    }

    const followUp: LLMMessage[] = [
      ...turns,
      { role: 'assistant', content: preamble, toolCalls: [call] },
      {
        role: 'tool',
        content: JSON.stringify({ success: result.success, data: result.data, error: result.error }),
        toolCallId: call.id,
        name: call.name,
      },
    ];

    const final = await this.executor.complete(followUp, { traceId: options.traceId });
    const text = final.text.trim() !== '' ? final.text : formatToolResult(call.name, result);

    this.tracer?.event(options.traceId, 'agent', 'response_generation', {
      detail: { tool: call.name, provider: final.provider, toolSuccess: result.success },
    });
    this.remember(userId, message.text, text);
    return { text, outcome: 'tool_result', provider: final.provider, toolName: call.name, toolResult: result };
  }

  private askForClarification(
    message: InboundMessage,
    toolName: string,
    field: string | undefined,
    detail: string,
    options: TurnOptions
  ): TurnResult {
    this.states.setClarificationState(message.sender.id, message.text, { toolName, field });
    this.tracer?.event(options.traceId, 'state', 'clarification_requested', {
      detail: { tool: toolName, field },
    });
    return {
      text: clarificationQuestion(toolName, field, detail),
      outcome: 'clarification',
      toolName,
    };
  }

  private remember(userId: string, userText: string, assistantText: string): void {
    if (this.historyTurns <= 0) return;

    const turns = this.history.get(userId)?.turns ?? [];
    turns.push({ role: 'user', content: userText }, { role: 'assistant', content: assistantText });
    this.history.set(userId, { turns: turns.slice(-this.historyTurns * 2), lastActiveAt: this.now() });
  }
}
