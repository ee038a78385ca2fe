/**
 * parley status command
 * Show the status of a running gateway
 */

import chalk from 'chalk';
import ora from 'ora';
import { errorMessage } from '@parley/types';
import { formatDuration, round } from '@parley/utils';
import { OutputFormatter } from '../core/output.js';
import { getVersion } from '../cli.js';
import { GatewayUnreachableError, StatusRequestError } from '../core/errors.js';

interface StatusOptions {
  json?: boolean;
  url: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function num(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

export async function fetchStatus(url: string): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(5000) });
  } catch (error) {
    throw new GatewayUnreachableError(url, errorMessage(error));
  }

  if (!response.ok) {
    throw new StatusRequestError(url, response.status);
  }
  return response.json();
}

/**
 * Render a /status body as terminal lines
 */
export function renderStatus(status: unknown): string[] {
  if (!isRecord(status)) {
    return [chalk.red('Unrecognised status payload')];
  }

  const lines: string[] = [chalk.bold('Tools')];
  for (const tool of records(status.tools)) {
    const state = tool.enabled === true ? chalk.green('enabled') : chalk.dim('disabled');
    const gate = tool.requiresConfirmation === true ? ' (confirmation)' : '';
    lines.push(`  ${chalk.cyan(str(tool.name))} ${state}${gate}`);
  }

  lines.push('', chalk.bold('Agents'));
  for (const agent of records(status.agents)) {
    lines.push(`  ${chalk.cyan(str(agent.name))} priority ${num(agent.priority)}`);
  }

  const traces = isRecord(status.traces) ? status.traces : {};
  lines.push(
    '',
    chalk.bold('Requests'),
    `  total ${num(traces.totalRequests)}, succeeded ${num(traces.successfulRequests)}, failed ${num(traces.failedRequests)}`,
    `  success rate ${round(num(traces.successRate) * 100, 1)}%, mean duration ${formatDuration(num(traces.avgDurationMs))}`,
    `  active ${num(traces.activeTraces)}, retained ${num(traces.completedTraces)}`
  );

  const confirmations = isRecord(status.confirmations) ? status.confirmations : {};
  const states = isRecord(status.states) ? status.states : {};
  lines.push(
    '',
    chalk.bold('Sessions'),
    `  confirmations ${num(confirmations.totalSessions)}, conversation states ${num(states.activeStates)}`
  );

  const providers = records(status.providers);
  if (providers.length > 0) {
    lines.push('', chalk.bold('Providers'));
    for (const provider of providers) {
      const cooling =
        provider.coolingDown === true
          ? chalk.yellow(`cooling down ${formatDuration(num(provider.cooldownRemainingMs))}`)
          : chalk.green('ready');
      lines.push(`  ${str(provider.tier)}: ${str(provider.provider)}/${str(provider.model)} ${cooling}`);
    }
  }

  return lines;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const output = new OutputFormatter(options.json ?? false, 'status', getVersion());
  const spinner = options.json ? null : ora(`Fetching ${options.url}`).start();

  try {
    const status = await fetchStatus(options.url);
    spinner?.stop();

    if (options.json) {
      output.success(status);
      return;
    }

    console.log();
    for (const line of renderStatus(status)) {
      console.log(line);
    }
    console.log();
  } catch (error) {
    spinner?.fail('Status request failed');
    output.error(error);
  }
}
