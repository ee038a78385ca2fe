import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { renderStatus } from './status.js';

describe('renderStatus', () => {
  const previousLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  it('should render every section of a gateway status body', () => {
    const lines = renderStatus({
      tools: [
        { name: 'echo', enabled: true, requiresConfirmation: false },
        { name: 'mcp', enabled: false, requiresConfirmation: true },
      ],
      agents: [
        { name: 'tool-calling', priority: 90 },
        { name: 'conversational', priority: 10 },
      ],
      traces: {
        totalRequests: 4,
        successfulRequests: 3,
        failedRequests: 1,
        successRate: 0.75,
        activeTraces: 0,
        completedTraces: 4,
        avgDurationMs: 1500,
      },
      confirmations: { totalSessions: 2 },
      states: { activeStates: 1 },
      providers: [
        { tier: 'primary', provider: 'openai', model: 'gpt-4o-mini', coolingDown: true, cooldownRemainingMs: 59000 },
        { tier: 'secondary', provider: 'ollama', model: 'llama3', coolingDown: false, cooldownRemainingMs: 0 },
      ],
    });

    expect(lines).toEqual([
      'Tools',
      '  echo enabled',
      '  mcp disabled (confirmation)',
      '',
      'Agents',
      '  tool-calling priority 90',
      '  conversational priority 10',
      '',
      'Requests',
      '  total 4, succeeded 3, failed 1',
      '  success rate 75%, mean duration 1.5s',
      '  active 0, retained 4',
      '',
      'Sessions',
      '  confirmations 2, conversation states 1',
      '',
      'Providers',
      '  primary: openai/gpt-4o-mini cooling down 59.0s',
      '  secondary: ollama/llama3 ready',
    ]);
  });

  it('should leave out providers when the gateway reports none', () => {
    const lines = renderStatus({ tools: [], agents: [], traces: {}, confirmations: {}, states: {} });

    expect(lines).not.toContain('Providers');
    expect(lines).toContain('  success rate 0%, mean duration 0ms');
  });

  it('should flag a payload that is not an object', () => {
    expect(renderStatus('nope')).toEqual(['Unrecognised status payload']);
  });
});
