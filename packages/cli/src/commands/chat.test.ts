import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { Gateway } from '@parley/gateway';
import type { NormalizedReply } from '@parley/types';
import { noopLogger } from '@parley/utils';
import { createChatMessage, handleChatLine } from './chat.js';

describe('chat', () => {
  const previousLevel = chalk.level;
  const sender = { id: 'cli-user', role: 'user' } as const;
  const reply: NormalizedReply = { kind: 'text', provider: 'fake', model: 'fake-1', text: 'Hello from the model' };

  function createGateway(): Gateway {
    return new Gateway({
      executor: { complete: async () => reply },
      systemPrompt: 'Be brief.',
      logger: noopLogger,
    });
  }

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  it('should build an inbound message for the sender', () => {
    const message = createChatMessage('hi', sender, 3);

    expect(message.id).toBe('cli-3');
    expect(message.conversationId).toBe('cli:cli-user');
    expect(message.sender).toEqual(sender);
  });

  it('should send text to the gateway and label the reply', async () => {
    const gateway = createGateway();

    const result = await handleChatLine(gateway, '  hello  ', sender, 1);

    expect(result.kind).toBe('output');
    if (result.kind !== 'output') return;
    expect(result.lines[0]).toBe('parley> Hello from the model');
    expect(result.lines[1]).toMatch(/^\[conversational · [0-9a-f-]{8}\]$/);
  });

  it('should stop on /quit and ignore blank lines', async () => {
    const gateway = createGateway();

    expect(await handleChatLine(gateway, '/quit', sender, 1)).toEqual({ kind: 'quit' });
    expect(await handleChatLine(gateway, '   ', sender, 2)).toEqual({ kind: 'output', lines: [] });
  });

  it('should print gateway status on /status', async () => {
    const result = await handleChatLine(createGateway(), '/status', sender, 1);

    expect(result).toMatchObject({ kind: 'output' });
    if (result.kind !== 'output') return;
    expect(result.lines.slice(0, 2)).toEqual(['Tools', '']);
  });
});
