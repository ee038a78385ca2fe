/**
 * Gateway - entry point for inbound chat messages
 *
 * Validates the message, opens a trace, settles pending confirmation and
 * clarification states, routes everything else through the agent router and
 * turns terminal failures into fixed replies.
 */

import {
  ParleyErrorCodes,
  createNoAgentError,
  createValidationError,
  errorMessage,
  formatValidationErrors,
  hasErrorCode,
  isParleyError,
  validateInboundMessage,
  type InboundMessage,
} from '@parley/types';
import { createLogger, type Logger } from '@parley/utils';
import { ConversationalAgent } from './agents/conversational-agent.js';
import { ToolCallingAgent } from './agents/tool-calling-agent.js';
import type { Agent } from './agents/types.js';
import { AgentRouter, NO_AGENT_REPLY } from './router.js';
import { CONFIRMATION_SESSION_KEY, ConversationStateStore, type ConversationState } from './state.js';
import { createStatusServer } from './status.js';
import { ConfirmationManager, parseCallbackData } from './tools/confirmation-manager.js';
import { ToolRegistry } from './tools/registry.js';
import { RequestTracer } from './tracing/request-tracer.js';
import { TurnLoop, formatToolResult, type CompletionExecutor } from './turn-loop.js';

export const PROVIDER_UNAVAILABLE_REPLY =
  'Sorry, I cannot reach any language model right now. Please try again in a few minutes.';
export const INTERNAL_ERROR_REPLY = 'Sorry, something went wrong while handling your request.';
export const CANCELLED_REPLY = 'Cancelled. Nothing was run.';
export const EXPIRED_CONFIRMATION_REPLY =
  'That confirmation has expired or was already handled. Please send the request again.';
export const UNKNOWN_CALLBACK_REPLY = 'Unknown action.';

const AFFIRMATIVE = new Set(['yes', 'y', 'yeah', 'yep', 'sure', 'ok', 'okay', 'confirm', 'confirmed', 'do it', 'go ahead']);
const NEGATIVE = new Set(['no', 'n', 'nope', 'cancel', 'stop', 'abort', "don't", 'do not']);

/**
 * Read a yes/no answer; null when the text is neither
 */
export function parseConfirmationAnswer(text: string): boolean | null {
  const normalized = text.trim().toLowerCase().replace(/[.!]+$/, '');
  if (AFFIRMATIVE.has(normalized)) return true;
  if (NEGATIVE.has(normalized)) return false;
  return null;
}

export interface GatewayReply {
  text: string;
  /** Agent that produced the reply; null for fixed replies */
  agent: string | null;
  traceId: string;
  metadata: Record<string, unknown>;
}

export interface GatewayOptions {
  executor: CompletionExecutor;
  systemPrompt: string;
  historyTurns?: number;
  /** Idle time after which a user's replayed history is forgotten */
  historyIdleMs?: number;
  tracer?: RequestTracer;
  registry?: ToolRegistry;
  states?: ConversationStateStore;
  confirmations?: ConfirmationManager;
  /** Register the tool-calling and conversational agents (default true) */
  defaultAgents?: boolean;
  /** Port for the status endpoint; no server when undefined */
  statusPort?: number;
  /** Interval for the expiry sweeps; none when undefined */
  cleanupIntervalMs?: number;
  /** Extra status contributed by the provider cascade */
  providerStatus?: () => unknown;
  logger?: Logger;
}

export interface GatewayStatus {
  tools: ReturnType<ToolRegistry['getInfo']>;
  agents: ReturnType<AgentRouter['getStatus']>['agents'];
  traces: ReturnType<RequestTracer['getMetrics']>;
  confirmations: ReturnType<ConfirmationManager['getStats']>;
  states: ReturnType<ConversationStateStore['getStats']>;
  providers?: unknown;
}

export class Gateway {
  readonly tracer: RequestTracer;
  readonly registry: ToolRegistry;
  readonly states: ConversationStateStore;
  readonly confirmations: ConfirmationManager;
  readonly router: AgentRouter;
  readonly turnLoop: TurnLoop;

  private readonly options: GatewayOptions;
  private readonly logger: Logger;
  private statusServer: ReturnType<typeof createStatusServer> | null = null;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private shutdownHandlers: (() => void)[] = [];

  constructor(options: GatewayOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger('gateway');
    this.tracer = options.tracer ?? new RequestTracer();
    this.registry = options.registry ?? new ToolRegistry({ tracer: this.tracer });
    this.states = options.states ?? new ConversationStateStore();
    this.confirmations =
      options.confirmations ?? new ConfirmationManager({ registry: this.registry, tracer: this.tracer });
    this.router = new AgentRouter({ tracer: this.tracer, logger: options.logger });
    this.turnLoop = new TurnLoop({
      executor: options.executor,
      registry: this.registry,
      confirmations: this.confirmations,
      states: this.states,
      systemPrompt: options.systemPrompt,
      historyTurns: options.historyTurns,
      historyIdleMs: options.historyIdleMs,
      tracer: this.tracer,
      logger: options.logger,
    });

    if (options.defaultAgents !== false) {
      this.registerAgent(
        new ToolCallingAgent({ turnLoop: this.turnLoop, registry: this.registry, tracer: this.tracer })
      );
      this.registerAgent(new ConversationalAgent({ turnLoop: this.turnLoop, tracer: this.tracer }));
    }
  }

  registerAgent(agent: Agent): void {
    this.router.register(agent);
  }

  /**
   * Handle one inbound message. Throws only when the payload is malformed.
   */
  async handleMessage(raw: unknown): Promise<GatewayReply> {
    const validation = validateInboundMessage(raw);
    if (!validation.success) {
      throw createValidationError(`Invalid inbound message: ${formatValidationErrors(validation.errors)}`, {
        component: 'gateway',
        details: { errors: validation.errors.map(({ field, message }) => ({ field, message })) },
      });
    }

    const message = validation.data;
    const traceId = this.tracer.begin(message.sender.id, message.sessionId ?? message.conversationId, {
      messageId: message.id,
      conversationId: message.conversationId,
    });
    this.tracer.event(traceId, 'gateway', 'message_received', {
      detail: { length: message.text.length, role: message.sender.role },
    });

    return this.settle(traceId, () => this.dispatch(message, traceId));
  }

  /**
   * Handle a confirmation button press (`confirm:<sessionId>:yes|no`)
   */
  async handleConfirmationCallback(data: string, userId: string): Promise<GatewayReply> {
    const traceId = this.tracer.begin(userId, undefined, { callback: data });
    const parsed = parseCallbackData(data);

    if (!parsed) {
      this.tracer.event(traceId, 'gateway', 'error_handling', {
        success: false,
        error: 'unrecognized callback data',
      });
      this.tracer.end(traceId, 'failed');
      return { text: UNKNOWN_CALLBACK_REPLY, agent: null, traceId, metadata: { outcome: 'unknown_callback' } };
    }

    return this.settle(traceId, async () => {
      const state = this.states.get(userId);
      if (state && this.sessionIdOf(state) === parsed.sessionId) {
        this.states.clear(userId);
      }
      return this.resolveConfirmation(parsed.sessionId, parsed.confirmed, userId, traceId);
    });
  }

  getStatus(): GatewayStatus {
    const status: GatewayStatus = {
      tools: this.registry.getInfo(),
      agents: this.router.getStatus().agents,
      traces: this.tracer.getMetrics(),
      confirmations: this.confirmations.getStats(),
      states: this.states.getStats(),
    };
    if (this.options.providerStatus) {
      status.providers = this.options.providerStatus();
    }
    return status;
  }

  /**
   * Sweep expired traces, states, confirmations and idle histories
   */
  cleanup(): void {
    this.tracer.cleanup();
    this.states.cleanupExpired();
    this.confirmations.cleanupExpired();
    this.turnLoop.pruneHistory();
  }

  async start(): Promise<void> {
    if (this.options.statusPort !== undefined) {
      this.statusServer = createStatusServer({
        port: this.options.statusPort,
        getStatus: () => this.getStatus(),
        logger: this.options.logger,
      });
      await this.statusServer.start();
    }

    if (this.options.cleanupIntervalMs !== undefined) {
      this.cleanupTimer = setInterval(() => this.cleanup(), this.options.cleanupIntervalMs);
      this.cleanupTimer.unref();
    }

    this.logger.info('Gateway started');
  }

  async stop(): Promise<void> {
    this.removeSignalHandlers();

    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }

    if (this.statusServer && this.statusServer.server.listening) {
      await this.statusServer.stop();
    }
    this.statusServer = null;

    this.logger.info('Gateway stopped');
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const shutdown = async (signal: string) => {
      this.logger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await this.stop();
        process.exit(0);
      } catch (error) {
        this.logger.error('Error during shutdown:', error);
        process.exit(1);
      }
    };

    const sigintHandler = () => void shutdown('SIGINT');
    const sigtermHandler = () => void shutdown('SIGTERM');

    process.on('SIGINT', sigintHandler);
    process.on('SIGTERM', sigtermHandler);

    this.shutdownHandlers.push(
      () => process.removeListener('SIGINT', sigintHandler),
      () => process.removeListener('SIGTERM', sigtermHandler)
    );
  }

  private removeSignalHandlers(): void {
    this.shutdownHandlers.forEach((handler) => handler());
    this.shutdownHandlers = [];
  }

  private async dispatch(message: InboundMessage, traceId: string): Promise<GatewayReply> {
    const userId = message.sender.id;
    const state = this.states.get(userId);

    if (state?.kind === 'confirmation') {
      const answer = parseConfirmationAnswer(message.text);
      if (answer !== null) {
        const sessionId = this.sessionIdOf(state);
        this.states.clear(userId);
        if (!sessionId) {
          return this.fixedReply(traceId, EXPIRED_CONFIRMATION_REPLY, { outcome: 'confirmation_missing' });
        }
        return this.resolveConfirmation(sessionId, answer, userId, traceId);
      }
      this.logger.debug(`User ${userId} sent a new request while a confirmation is pending`);
    }

    let routed = message;
    if (state?.kind === 'clarification') {
      this.states.clear(userId);
      routed = { ...message, text: `${state.originalMessage}\n${message.text}` };
      this.tracer.event(traceId, 'state', 'clarification_requested', {
        detail: { resolved: true, tool: state.toolName },
      });
    }

    const result = await this.router.route(routed, { traceId });
    if (result.agentName === null) {
      throw createNoAgentError('No agent accepted the message', { component: 'gateway', correlationId: traceId });
    }

    return {
      text: result.reply.text,
      agent: result.agentName,
      traceId,
      metadata: { ...result.reply.metadata },
    };
  }

  private async resolveConfirmation(
    sessionId: string,
    confirmed: boolean,
    userId: string,
    traceId: string
  ): Promise<GatewayReply> {
    const session = this.confirmations.getSession(sessionId);
    const result = await this.confirmations.resolve(sessionId, confirmed, userId, traceId);

    if (result) {
      return {
        text: formatToolResult(session?.toolName ?? 'requested', result),
        agent: 'confirmation',
        traceId,
        metadata: { outcome: 'confirmed', sessionId, toolSuccess: result.success },
      };
    }

    if (!confirmed && session?.status === 'cancelled') {
      return { text: CANCELLED_REPLY, agent: 'confirmation', traceId, metadata: { outcome: 'cancelled', sessionId } };
    }

    return this.fixedReply(traceId, EXPIRED_CONFIRMATION_REPLY, {
      outcome: session?.status === 'expired' ? 'expired' : 'unavailable',
      sessionId,
    });
  }

  private fixedReply(traceId: string, text: string, metadata: Record<string, unknown>): GatewayReply {
    return { text, agent: null, traceId, metadata };
  }

  private sessionIdOf(state: ConversationState): string | undefined {
    const value = state.parameters[CONFIRMATION_SESSION_KEY];
    return typeof value === 'string' ? value : undefined;
  }

  /**
   * Run a handler and close the trace. ProviderUnavailable, no agent and
   * unexpected errors become fixed replies on a failed trace.
   */
  private async settle(traceId: string, handler: () => Promise<GatewayReply>): Promise<GatewayReply> {
    try {
      const reply = await handler();
      this.tracer.event(traceId, 'gateway', 'response_generation', {
        detail: { agent: reply.agent, length: reply.text.length },
      });
      this.tracer.end(traceId, 'completed', { agent: reply.agent });
      return reply;
    } catch (error) {
      const { text, code } = this.describeFailure(error);
      this.logger.error(`[${traceId}] ${code}: ${errorMessage(error)}`);
      this.tracer.event(traceId, 'gateway', 'error_handling', {
        success: false,
        error: errorMessage(error),
        detail: { code },
      });
      this.tracer.end(traceId, 'failed', { error: code });
      return { text, agent: null, traceId, metadata: { error: code } };
    }
  }

  private describeFailure(error: unknown): { text: string; code: string } {
    if (hasErrorCode(error, ParleyErrorCodes.NO_AGENT)) {
      return { text: NO_AGENT_REPLY, code: ParleyErrorCodes.NO_AGENT };
    }
    if (hasErrorCode(error, ParleyErrorCodes.PROVIDER_UNAVAILABLE)) {
      return { text: PROVIDER_UNAVAILABLE_REPLY, code: ParleyErrorCodes.PROVIDER_UNAVAILABLE };
    }
    return {
      text: INTERNAL_ERROR_REPLY,
      code: isParleyError(error) ? error.code : ParleyErrorCodes.INTERNAL,
    };
  }
}
