/**
 * Command executors
 *
 * The infra tool talks to a command service through this boundary. With no
 * service configured, the emulated executor answers with canned data.
 */

import type { ToolExecutionContext } from '@parley/types';
import { classifyCommand } from './command-formatter.js';

export interface CommandExecution {
  success: boolean;
  /** Human-readable summary from the service */
  response?: string;
  /** Structured payload returned by the service */
  data?: unknown;
  error?: string;
  emulated?: boolean;
}

export interface CommandExecutor {
  execute(command: string, context: ToolExecutionContext): Promise<CommandExecution>;
}

export interface HttpCommandExecutorOptions {
  endpoint: string;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * POSTs `{ command, userId }` to the command service and expects
 * `{ success, response?, data?, error? }` back.
 */
export class HttpCommandExecutor implements CommandExecutor {
  private readonly timeoutMs: number;

  constructor(private readonly options: HttpCommandExecutorOptions) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async execute(command: string, context: ToolExecutionContext): Promise<CommandExecution> {
    const response = await fetch(this.options.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(context.traceId ? { 'X-Trace-Id': context.traceId } : {}),
      },
      body: JSON.stringify({ command, userId: context.userId }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      return { success: false, error: `Command service returned HTTP ${response.status}` };
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      return { success: false, error: 'Command service returned a malformed body' };
    }

    return {
      success: body.success === true,
      response: typeof body.response === 'string' ? body.response : undefined,
      data: body.data,
      error: typeof body.error === 'string' ? body.error : undefined,
    };
  }
}

const EMULATED_DATA: Record<string, Record<string, unknown>> = {
  applications: {
    apps: [
      { name: 'web-app', region: 'nyc3', status: 'active' },
      { name: 'api-service', region: 'sfo2', status: 'active' },
    ],
  },
  databases: {
    databases: [
      { name: 'production_db', engine: 'postgres', version: '14' },
      { name: 'analytics_db', engine: 'postgres', version: '13' },
    ],
  },
  deployments: {
    deployments: [
      { id: 'dep-123', status: 'success', createdAt: '2024-01-20' },
      { id: 'dep-124', status: 'in_progress', createdAt: '2024-01-21' },
    ],
  },
};

export class EmulatedCommandExecutor implements CommandExecutor {
  async execute(command: string): Promise<CommandExecution> {
    const category = classifyCommand(command);
    return {
      success: true,
      response: `[emulated] results for ${category}`,
      data: EMULATED_DATA[category] ?? { message: `Emulated response for: ${command}` },
      emulated: true,
    };
  }
}
