/**
 * Agent Router - picks the agent that answers a message
 *
 * Agents are asked in descending priority (ties keep registration order);
 * the first whose canHandle() returns true processes the message.
 */

import { errorMessage, type InboundMessage, type TraceSink } from '@parley/types';
import { createLogger, type Logger } from '@parley/utils';
import type { Agent, AgentContext, AgentReply } from './agents/types.js';

export const NO_AGENT_REPLY = "Sorry, I can't handle that request.";

export interface RouteResult {
  /** Null when no agent accepted the message */
  agentName: string | null;
  reply: AgentReply;
}

export interface AgentRouterOptions {
  tracer?: TraceSink;
  logger?: Logger;
  now?: () => number;
}

export interface RouterStatus {
  agents: Array<{ name: string; priority: number }>;
}

export class AgentRouter {
  private agents: Agent[] = [];
  private readonly tracer?: TraceSink;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: AgentRouterOptions = {}) {
    this.tracer = options.tracer;
    this.logger = options.logger ?? createLogger('router');
    this.now = options.now ?? Date.now;
  }

  register(agent: Agent): void {
    // Array#sort is stable, so equal priorities stay in registration order
    this.agents = [...this.agents, agent].sort((a, b) => b.priority - a.priority);
    this.logger.info(`Registered agent '${agent.name}' (priority ${agent.priority})`);
  }

  /**
   * First agent, by priority, that accepts the message
   */
  async getAgentForMessage(message: InboundMessage, context: AgentContext): Promise<Agent | null> {
    for (const agent of this.agents) {
      const startedAt = this.now();
      try {
        const accepted = await agent.canHandle(message, context);
        this.tracer?.event(context.traceId, 'router', 'agent_check', {
          durationMs: this.now() - startedAt,
          detail: { agent: agent.name, priority: agent.priority, accepted },
        });
        if (accepted) return agent;
      } catch (error) {
        this.logger.warn(`Agent '${agent.name}' failed its check: ${errorMessage(error)}`);
        this.tracer?.event(context.traceId, 'router', 'agent_check', {
          durationMs: this.now() - startedAt,
          success: false,
          error: errorMessage(error),
          detail: { agent: agent.name, priority: agent.priority },
        });
      }
    }
    return null;
  }

  /**
   * Route a message to an agent. A throwing process() propagates.
   */
  async route(message: InboundMessage, context: AgentContext): Promise<RouteResult> {
    const agent = await this.getAgentForMessage(message, context);

    if (!agent) {
      this.logger.warn(`No agent accepted message ${message.id}`);
      this.tracer?.event(context.traceId, 'router', 'agent_routing', {
        success: false,
        error: 'no suitable agent',
        detail: { candidates: this.agents.length },
      });
      return { agentName: null, reply: { text: NO_AGENT_REPLY } };
    }

    const startedAt = this.now();
    try {
      const reply = await agent.process(message, context);
      this.tracer?.event(context.traceId, 'router', 'agent_routing', {
        durationMs: this.now() - startedAt,
        detail: { agent: agent.name },
      });
      return { agentName: agent.name, reply };
    } catch (error) {
      this.tracer?.event(context.traceId, 'router', 'agent_routing', {
        durationMs: this.now() - startedAt,
        success: false,
        error: errorMessage(error),
        detail: { agent: agent.name },
      });
      throw error;
    }
  }

  getStatus(): RouterStatus {
    return { agents: this.agents.map(({ name, priority }) => ({ name, priority })) };
  }
}
