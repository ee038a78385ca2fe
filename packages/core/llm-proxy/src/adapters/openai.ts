import OpenAI from 'openai';
import type { LLMMessage, LLMToolDefinition, NormalizedReply } from '@parley/types';
import {
  mapProviderError,
  parseToolArguments,
  ProviderError,
  type AdapterSendOptions,
  type LLMProviderAdapter,
  type ProviderRequest,
} from './types.js';

export function toOpenAiMessages(messages: LLMMessage[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return message.name
          ? { role: 'user', content: message.content, name: message.name }
          : { role: 'user', content: message.content };
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: message.content || null,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          };
        }
        return { role: 'assistant', content: message.content };
      case 'tool':
        return { role: 'tool', content: message.content, tool_call_id: message.toolCallId ?? '' };
    }
  });
}

export function toOpenAiTools(
  tools: LLMToolDefinition[] | undefined
): OpenAI.ChatCompletionTool[] | undefined {
  if (!tools || tools.length === 0) return undefined;
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

/**
 * The parts of a chat completion the normalizer reads
 */
export interface OpenAICompletionLike {
  model?: string;
  choices: Array<{
    message?: {
      content?: string | null;
      tool_calls?: Array<{ id?: string; function?: { name?: string; arguments?: string } }> | null;
    } | null;
    finish_reason?: string | null;
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number } | null;
}

/**
 * Normalize a chat completion. Only the first tool call is honoured.
 */
export function normalizeOpenAIResponse(
  response: OpenAICompletionLike,
  provider: string,
  requestedModel: string
): NormalizedReply {
  const choice = response.choices[0];
  if (!choice) {
    throw new ProviderError(`${provider}: no completion choice returned`, 'invalid_response');
  }

  const text = choice.message?.content ?? '';
  const model = response.model ?? requestedModel;
  const usage = response.usage
    ? {
        promptTokens: response.usage.prompt_tokens,
        completionTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens,
      }
    : undefined;

  const call = (choice.message?.tool_calls ?? []).find((candidate) => candidate.function?.name);
  if (call?.function?.name) {
    return {
      kind: 'tool_call',
      provider,
      model,
      text,
      usage,
      toolCall: {
        id: call.id ?? '',
        name: call.function.name,
        arguments: parseToolArguments(call.function.arguments, provider),
      },
    };
  }

  return { kind: 'text', provider, model, text, usage };
}

export interface OpenAIAdapterOptions {
  baseUrl?: string;
  apiKey?: string;
  /** Env var consulted when no key is given; OPENAI_API_KEY by default */
  apiKeyEnv?: string;
  /** Name reported on replies and trace events */
  name?: string;
}

export class OpenAIAdapter implements LLMProviderAdapter {
  public readonly name: string;
  public readonly type = 'openai' as const;
  public readonly supportsTools = true;

  constructor(private readonly options: OpenAIAdapterOptions = {}) {
    this.name = options.name ?? 'openai';
  }

  async send(request: ProviderRequest, options: AdapterSendOptions): Promise<NormalizedReply> {
    const apiKey = this.resolveApiKey();
    try {
      const client = new OpenAI({ apiKey, baseURL: this.options.baseUrl, maxRetries: 0 });
      const response = await client.chat.completions.create({
        model: options.model,
        messages: toOpenAiMessages(request.messages),
        tools: toOpenAiTools(request.tools),
        temperature: options.temperature,
        max_tokens: options.maxTokens,
        stream: false,
      });

      return normalizeOpenAIResponse(response, this.name, options.model);
    } catch (error) {
      throw mapProviderError(error, this.name);
    }
  }

  private resolveApiKey(): string {
    if (this.options.apiKey) {
      return this.options.apiKey;
    }

    const envKey = process.env[this.options.apiKeyEnv ?? 'OPENAI_API_KEY'];
    if (envKey) {
      return envKey;
    }

    throw new ProviderError(`${this.name}: API key missing`, 'auth');
  }
}
