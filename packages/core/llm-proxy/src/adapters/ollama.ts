import type { NormalizedReply } from '@parley/types';
import { OpenAIAdapter } from './openai.js';
import type { AdapterSendOptions, LLMProviderAdapter, ProviderRequest } from './types.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434/v1';

/**
 * Reduce any reply to its text. A tool directive from a text-only model
 * carries no usable intent.
 */
export function normalizeTextOnly(reply: NormalizedReply): NormalizedReply {
  if (reply.kind === 'text') return reply;
  return {
    kind: 'text',
    provider: reply.provider,
    model: reply.model,
    text: reply.text,
    usage: reply.usage,
  };
}

/**
 * Local models through Ollama's OpenAI-compatible endpoint, text only
 */
export class OllamaAdapter implements LLMProviderAdapter {
  public readonly name = 'ollama';
  public readonly type = 'ollama' as const;
  public readonly supportsTools = false;
  private readonly delegate: OpenAIAdapter;

  constructor(baseUrl?: string) {
    this.delegate = new OpenAIAdapter({
      baseUrl: baseUrl ?? DEFAULT_OLLAMA_URL,
      apiKey: 'ollama',
      name: this.name,
    });
  }

  async send(request: ProviderRequest, options: AdapterSendOptions): Promise<NormalizedReply> {
    const reply = await this.delegate.send({ messages: request.messages }, options);
    return normalizeTextOnly(reply);
  }
}
