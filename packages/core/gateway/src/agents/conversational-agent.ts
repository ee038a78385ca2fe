import type { InboundMessage, TraceSink } from '@parley/types';
import type { TurnLoop } from '../turn-loop.js';
import type { Agent, AgentContext, AgentReply } from './types.js';

export interface ConversationalAgentOptions {
  turnLoop: TurnLoop;
  tracer?: TraceSink;
  priority?: number;
}

/**
 * Catch-all agent: plain conversation, no tools
 */
export class ConversationalAgent implements Agent {
  readonly name = 'conversational';
  readonly priority: number;
  private readonly turnLoop: TurnLoop;
  private readonly tracer?: TraceSink;

  constructor(options: ConversationalAgentOptions) {
    this.turnLoop = options.turnLoop;
    this.tracer = options.tracer;
    this.priority = options.priority ?? 10;
  }

  canHandle(_message: InboundMessage): boolean {
    return true;
  }

  async process(message: InboundMessage, context: AgentContext): Promise<AgentReply> {
    this.tracer?.event(context.traceId, 'agent', 'agent_processing', { detail: { agent: this.name } });

    const result = await this.turnLoop.run(message, { traceId: context.traceId, allowTools: false });
    return { text: result.text, metadata: { outcome: result.outcome, provider: result.provider } };
  }
}
