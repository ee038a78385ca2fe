/**
 * parley chat command
 * Talk to an in-process gateway from the terminal
 */

import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import { loadAndValidateConfig } from '@parley/config';
import { createGatewayFromConfig, type Gateway } from '@parley/gateway';
import { errorMessage, type InboundMessage, type Sender } from '@parley/types';
import { findConfigFileOrThrow } from '../core/config-discovery.js';
import { OutputFormatter, prettyOutput } from '../core/output.js';
import { getVersion } from '../cli.js';
import { renderStatus } from './status.js';

interface ChatOptions {
  json?: boolean;
  config?: string;
  user: string;
  admin?: boolean;
}

export type ChatLineResult = { kind: 'quit' } | { kind: 'output'; lines: string[] };

export function createChatMessage(text: string, sender: Sender, sequence: number): InboundMessage {
  return {
    id: `cli-${sequence}`,
    text,
    sender,
    conversationId: `cli:${sender.id}`,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Handle one typed line. `/quit` ends the session, `/status` prints gateway
 * status, anything else is sent as a message.
 */
export async function handleChatLine(
  gateway: Gateway,
  line: string,
  sender: Sender,
  sequence: number
): Promise<ChatLineResult> {
  const text = line.trim();

  if (text === '/quit' || text === '/exit') {
    return { kind: 'quit' };
  }
  if (text === '') {
    return { kind: 'output', lines: [] };
  }
  if (text === '/status') {
    return { kind: 'output', lines: renderStatus(gateway.getStatus()) };
  }

  const reply = await gateway.handleMessage(createChatMessage(text, sender, sequence));
  const label = chalk.dim(`[${reply.agent ?? 'gateway'} · ${reply.traceId}]`);
  return { kind: 'output', lines: [`${chalk.green('parley>')} ${reply.text}`, label] };
}

export async function chatCommand(options: ChatOptions): Promise<void> {
  const output = new OutputFormatter(false, 'chat', getVersion());

  try {
    const configPath = findConfigFileOrThrow(options.config);
    const config = loadAndValidateConfig({ configPath });
    const { gateway, roleFor } = createGatewayFromConfig(config, { statusServer: false });
    const sender: Sender = { id: options.user, role: options.admin ? 'admin' : roleFor(options.user) };

    prettyOutput.header(`Chatting as ${sender.id} (${sender.role})`);
    prettyOutput.indent(chalk.dim('Type /status for gateway status, /quit to leave.'));
    prettyOutput.blank();

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.setPrompt(chalk.cyan('you> '));
    rl.prompt();

    let sequence = 0;
    try {
      for await (const line of rl) {
        sequence++;

        let result: ChatLineResult;
        try {
          result = await handleChatLine(gateway, line, sender, sequence);
        } catch (error) {
          prettyOutput.warn(errorMessage(error));
          rl.prompt();
          continue;
        }

        if (result.kind === 'quit') break;
        for (const outputLine of result.lines) {
          console.log(outputLine);
        }
        rl.prompt();
      }
    } finally {
      rl.close();
      await gateway.stop();
    }
  } catch (error) {
    output.error(error);
  }
}
