import type { InboundMessage, TraceSink } from '@parley/types';
import type { ToolRegistry } from '../tools/registry.js';
import type { TurnLoop } from '../turn-loop.js';
import type { Agent, AgentContext, AgentReply } from './types.js';

export interface ToolCallingAgentOptions {
  turnLoop: TurnLoop;
  registry: ToolRegistry;
  tracer?: TraceSink;
  priority?: number;
}

/**
 * Answers admins with the tool catalog available to the model
 */
export class ToolCallingAgent implements Agent {
  readonly name = 'tool-calling';
  readonly priority: number;
  private readonly turnLoop: TurnLoop;
  private readonly registry: ToolRegistry;
  private readonly tracer?: TraceSink;

  constructor(options: ToolCallingAgentOptions) {
    this.turnLoop = options.turnLoop;
    this.registry = options.registry;
    this.tracer = options.tracer;
    this.priority = options.priority ?? 90;
  }

  canHandle(message: InboundMessage): boolean {
    return message.sender.role === 'admin' && this.registry.hasEnabledTools();
  }

  async process(message: InboundMessage, context: AgentContext): Promise<AgentReply> {
    this.tracer?.event(context.traceId, 'agent', 'agent_processing', {
      detail: { agent: this.name, tools: this.registry.list(true).length },
    });

    const result = await this.turnLoop.run(message, { traceId: context.traceId, allowTools: true });
    return {
      text: result.text,
      metadata: {
        outcome: result.outcome,
        provider: result.provider,
        tool: result.toolName,
        sessionId: result.sessionId,
      },
    };
  }
}
