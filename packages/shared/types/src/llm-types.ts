/**
 * LLM turn and reply types shared by the provider cascade and the gateway.
 */

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A tool invocation requested by a model, with arguments already decoded
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * One turn of a conversation as sent to a provider
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
  /** Present on assistant turns that requested tools */
  toolCalls?: ToolCallRequest[];
  /** Present on tool turns: the call this result answers */
  toolCallId?: string;
  name?: string;
}

/**
 * Tool catalog entry offered to tool-capable providers.
 * `parameters` is a JSON Schema object.
 */
export interface LLMToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface ReplyBase {
  /** Provider that produced the reply */
  provider: string;
  model: string;
  text: string;
  usage?: TokenUsage;
}

export interface TextReply extends ReplyBase {
  kind: 'text';
}

export interface ToolCallReply extends ReplyBase {
  kind: 'tool_call';
  toolCall: ToolCallRequest;
}

/**
 * Every provider response is normalized into one of these variants
 */
export type NormalizedReply = TextReply | ToolCallReply;

export function isToolCallReply(reply: NormalizedReply): reply is ToolCallReply {
  return reply.kind === 'tool_call';
}
