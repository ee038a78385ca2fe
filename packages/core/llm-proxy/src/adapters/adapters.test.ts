import { describe, it, expect } from 'vitest';
import type { LLMMessage } from '@parley/types';
import { normalizeAnthropicResponse, toAnthropicMessages, extractSystemPrompt } from './anthropic.js';
import { normalizeTextOnly } from './ollama.js';
import { normalizeOpenAIResponse, toOpenAiMessages, toOpenAiTools } from './openai.js';
import { createProviderChain } from './registry.js';
import { ProviderError, mapProviderError, parseToolArguments } from './types.js';

describe('mapProviderError', () => {
  function withStatus(status: number): Error {
    return Object.assign(new Error('request failed'), { status });
  }

  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [402, 'billing'],
    [429, 'rate_limit'],
    [500, 'unavailable'],
    [503, 'unavailable'],
    [400, 'invalid_request'],
  ])('should classify HTTP %i as %s', (status, kind) => {
    const error = mapProviderError(withStatus(status), 'openai');
    expect(error.kind).toBe(kind);
    expect(error.providerCode).toBe(String(status));
  });

  it('should classify connection failures as network errors', () => {
    const error = mapProviderError(new Error('Request timed out.'), 'anthropic');
    expect(error.kind).toBe('network');
    expect(error.message).toBe('anthropic: Request timed out.');
  });

  it('should keep existing provider errors', () => {
    const original = new ProviderError('x', 'invalid_response');
    expect(mapProviderError(original, 'openai')).toBe(original);
  });

  it('should fall back to unknown', () => {
    expect(mapProviderError('weird', 'openai').kind).toBe('unknown');
  });
});

describe('parseToolArguments', () => {
  it('should decode a JSON object', () => {
    expect(parseToolArguments('{"command":"list apps"}', 'openai')).toEqual({ command: 'list apps' });
  });

  it('should treat empty arguments as an empty object', () => {
    expect(parseToolArguments('', 'openai')).toEqual({});
    expect(parseToolArguments(undefined, 'openai')).toEqual({});
  });

  it('should reject malformed arguments as an invalid response', () => {
    expect(() => parseToolArguments('{not json', 'openai')).toThrow('tool arguments are not valid JSON');
    expect(() => parseToolArguments('[1,2]', 'openai')).toThrow('tool arguments must be a JSON object');
  });
});

describe('OpenAI normalization', () => {
  it('should normalize a text completion', () => {
    const reply = normalizeOpenAIResponse(
      {
        model: 'gpt-4o-mini-2024',
        choices: [{ message: { content: 'Hello!' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 10, completion_tokens: 2, total_tokens: 12 },
      },
      'openai',
      'gpt-4o-mini'
    );

    expect(reply).toEqual({
      kind: 'text',
      provider: 'openai',
      model: 'gpt-4o-mini-2024',
      text: 'Hello!',
      usage: { promptTokens: 10, completionTokens: 2, totalTokens: 12 },
    });
  });

  it('should normalize the first tool call', () => {
    const reply = normalizeOpenAIResponse(
      {
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: 'call_1', function: { name: 'echo', arguments: '{"message":"hi"}' } },
                { id: 'call_2', function: { name: 'mcp', arguments: '{}' } },
              ],
            },
          },
        ],
      },
      'openai',
      'gpt-4o-mini'
    );

    expect(reply.kind).toBe('tool_call');
    if (reply.kind !== 'tool_call') return;
    expect(reply.model).toBe('gpt-4o-mini');
    expect(reply.text).toBe('');
    expect(reply.toolCall).toEqual({ id: 'call_1', name: 'echo', arguments: { message: 'hi' } });
  });

  it('should reject a completion without choices', () => {
    expect(() => normalizeOpenAIResponse({ choices: [] }, 'openai', 'm')).toThrow(
      'no completion choice returned'
    );
  });

  it('should map tool turns and tool definitions', () => {
    const messages: LLMMessage[] = [
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'c1', name: 'echo', arguments: { message: 'x' } }],
      },
      { role: 'tool', content: '{"echo":"x"}', toolCallId: 'c1', name: 'echo' },
    ];

    expect(toOpenAiMessages(messages)).toEqual([
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'c1', type: 'function', function: { name: 'echo', arguments: '{"message":"x"}' } },
        ],
      },
      { role: 'tool', content: '{"echo":"x"}', tool_call_id: 'c1' },
    ]);
    expect(toOpenAiTools([])).toBeUndefined();
  });
});

describe('Anthropic normalization', () => {
  it('should join text blocks and pick the first tool_use block', () => {
    const reply = normalizeAnthropicResponse(
      {
        model: 'claude-3-5-haiku-latest',
        content: [
          { type: 'text', text: 'Checking ' },
          { type: 'text', text: 'now.' },
          { type: 'tool_use', id: 'tu_1', name: 'mcp', input: { command: 'list apps' } },
        ],
        usage: { input_tokens: 20, output_tokens: 5 },
      },
      'anthropic',
      'claude'
    );

    expect(reply).toEqual({
      kind: 'tool_call',
      provider: 'anthropic',
      model: 'claude-3-5-haiku-latest',
      text: 'Checking now.',
      usage: { promptTokens: 20, completionTokens: 5, totalTokens: 25 },
      toolCall: { id: 'tu_1', name: 'mcp', arguments: { command: 'list apps' } },
    });
  });

  it('should lift system turns out of the message list', () => {
    const messages: LLMMessage[] = [
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'hi' },
      { role: 'tool', content: 'done', toolCallId: 'tu_1' },
    ];

    expect(extractSystemPrompt(messages)).toBe('Be brief.');
    expect(toAnthropicMessages(messages)).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'user', content: [{ type: 'tool_result', tool_use_id: 'tu_1', content: 'done' }] },
    ]);
  });
});

describe('normalizeTextOnly', () => {
  it('should turn a tool directive into plain text', () => {
    expect(
      normalizeTextOnly({
        kind: 'tool_call',
        provider: 'ollama',
        model: 'llama3',
        text: 'ok',
        toolCall: { id: '1', name: 'echo', arguments: {} },
      })
    ).toEqual({ kind: 'text', provider: 'ollama', model: 'llama3', text: 'ok' });
  });
});

describe('createProviderChain', () => {
  it('should build configured tiers in order with inherited limits', () => {
    const chain = createProviderChain({
      primary: { provider: 'openai', model: 'gpt-4o-mini', api_key_env: 'TEST_OPENAI_KEY' },
      tertiary: { provider: 'ollama', model: 'llama3', base_url: 'http://localhost:11434/v1', max_tokens: 256 },
      max_tokens: 1024,
      temperature: 0.2,
    });

    expect(chain.map((t) => [t.label, t.adapter.name, t.model, t.maxTokens, t.temperature])).toEqual([
      ['primary', 'openai', 'gpt-4o-mini', 1024, 0.2],
      ['tertiary', 'ollama', 'llama3', 256, 0.2],
    ]);
    expect(chain[1]?.adapter.supportsTools).toBe(false);
  });
});
