import type { InboundMessage } from '@parley/types';

/**
 * Per-request context handed to agents by the router
 */
export interface AgentContext {
  traceId: string;
}

export interface AgentReply {
  text: string;
  metadata?: Record<string, unknown>;
}

/**
 * A candidate handler. Higher priority is asked first.
 */
export interface Agent {
  readonly name: string;
  readonly priority: number;
  canHandle(message: InboundMessage, context: AgentContext): boolean | Promise<boolean>;
  process(message: InboundMessage, context: AgentContext): Promise<AgentReply>;
}
