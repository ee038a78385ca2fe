import Anthropic from '@anthropic-ai/sdk';
import type { MessageParam, Tool } from '@anthropic-ai/sdk/resources/messages';
import type { LLMMessage, LLMToolDefinition, NormalizedReply } from '@parley/types';
import {
  mapProviderError,
  ProviderError,
  toRecord,
  type AdapterSendOptions,
  type LLMProviderAdapter,
  type ProviderRequest,
} from './types.js';

export function extractSystemPrompt(messages: LLMMessage[]): string | undefined {
  const system = messages
    .filter((message) => message.role === 'system')
    .map((message) => message.content)
    .filter(Boolean);
  return system.length > 0 ? system.join('\n\n') : undefined;
}

/**
 * Assistant tool requests become tool_use blocks and tool turns become
 * tool_result blocks on a user turn.
 */
export function toAnthropicMessages(messages: LLMMessage[]): MessageParam[] {
  const result: MessageParam[] = [];

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        break;
      case 'user':
        result.push({ role: 'user', content: message.content });
        break;
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          result.push({
            role: 'assistant',
            content: [
              ...(message.content ? [{ type: 'text' as const, text: message.content }] : []),
              ...message.toolCalls.map((call) => ({
                type: 'tool_use' as const,
                id: call.id,
                name: call.name,
                input: call.arguments,
              })),
            ],
          });
        } else {
          result.push({ role: 'assistant', content: message.content });
        }
        break;
      case 'tool':
        result.push({
          role: 'user',
          content: [
            {
              type: 'tool_result' as const,
              tool_use_id: message.toolCallId ?? '',
              content: message.content,
            },
          ],
        });
        break;
    }
  }

  return result;
}

export function toAnthropicTools(tools: LLMToolDefinition[] | undefined): Tool[] | undefined {
  if (!tools || tools.length === 0) return undefined;
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: {
      ...tool.parameters,
      type: 'object' as const,
    },
  }));
}

interface AnthropicContentBlock {
  type: string;
  id?: string;
  name?: string;
  input?: unknown;
  text?: string;
}

/**
 * The parts of a message response the normalizer reads
 */
export interface AnthropicMessageLike {
  model?: string;
  content: AnthropicContentBlock[];
  usage?: { input_tokens: number; output_tokens: number } | null;
}

/**
 * Normalize a message response. Only the first tool_use block is honoured.
 */
export function normalizeAnthropicResponse(
  response: AnthropicMessageLike,
  provider: string,
  requestedModel: string
): NormalizedReply {
  const text = response.content
    .filter((part) => part.type === 'text' && part.text)
    .map((part) => part.text ?? '')
    .join('');
  const model = response.model ?? requestedModel;
  const usage = response.usage
    ? {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      }
    : undefined;

  const call = response.content.find((part) => part.type === 'tool_use' && part.name);
  if (call?.name) {
    return {
      kind: 'tool_call',
      provider,
      model,
      text,
      usage,
      toolCall: { id: call.id ?? '', name: call.name, arguments: toRecord(call.input) },
    };
  }

  return { kind: 'text', provider, model, text, usage };
}

export interface AnthropicAdapterOptions {
  baseUrl?: string;
  apiKey?: string;
  /** Env var consulted when no key is given; ANTHROPIC_API_KEY by default */
  apiKeyEnv?: string;
}

export class AnthropicAdapter implements LLMProviderAdapter {
  public readonly name = 'anthropic';
  public readonly type = 'anthropic' as const;
  public readonly supportsTools = true;

  constructor(private readonly options: AnthropicAdapterOptions = {}) {}

  async send(request: ProviderRequest, options: AdapterSendOptions): Promise<NormalizedReply> {
    const apiKey = this.resolveApiKey();
    try {
      const client = new Anthropic({ apiKey, baseURL: this.options.baseUrl, maxRetries: 0 });
      const response = await client.messages.create({
        model: options.model,
        system: extractSystemPrompt(request.messages),
        messages: toAnthropicMessages(request.messages),
        tools: toAnthropicTools(request.tools),
        max_tokens: options.maxTokens ?? 1024,
        temperature: options.temperature,
      });

      return normalizeAnthropicResponse(response, this.name, options.model);
    } catch (error) {
      throw mapProviderError(error, this.name);
    }
  }

  private resolveApiKey(): string {
    if (this.options.apiKey) {
      return this.options.apiKey;
    }

    const envKey = process.env[this.options.apiKeyEnv ?? 'ANTHROPIC_API_KEY'];
    if (envKey) {
      return envKey;
    }

    throw new ProviderError(`${this.name}: API key missing`, 'auth');
  }
}
