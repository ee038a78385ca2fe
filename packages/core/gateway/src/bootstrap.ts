/**
 * Build a gateway from validated configuration
 */

import { CONFIG_DEFAULTS, type ParleyConfig } from '@parley/config';
import { CooldownManager, ProviderFallbackExecutor, createProviderChain } from '@parley/llm-proxy';
import { EchoTool } from '@parley/tool-echo';
import { EmulatedCommandExecutor, HttpCommandExecutor, InfraCommandTool } from '@parley/tool-infra';
import type { SenderRole } from '@parley/types';
import { createLogger, setLogLevel, type Logger } from '@parley/utils';
import { Gateway } from './gateway.js';
import { ConversationStateStore } from './state.js';
import { ConfirmationManager } from './tools/confirmation-manager.js';
import { ToolRegistry } from './tools/registry.js';
import { RequestTracer } from './tracing/request-tracer.js';
import type { CompletionExecutor } from './turn-loop.js';

export interface BootstrapOptions {
  /** Replaces the provider cascade built from `llm` */
  executor?: CompletionExecutor;
  /** Start the status server on runtime.status_port (default true) */
  statusServer?: boolean;
  logger?: Logger;
}

export interface Bootstrapped {
  gateway: Gateway;
  /** Role the bundled transports assign to a sender id */
  roleFor: (userId: string) => SenderRole;
}

const SECOND = 1000;

export function createGatewayFromConfig(config: ParleyConfig, options: BootstrapOptions = {}): Bootstrapped {
  if (config.runtime?.log_level) {
    setLogLevel(config.runtime.log_level);
  }
  const logger = options.logger;

  const tracer = new RequestTracer({
    maxTraces: config.tracing?.max_traces ?? CONFIG_DEFAULTS.tracingMaxTraces,
    ttlMs: (config.tracing?.ttl_hours ?? CONFIG_DEFAULTS.tracingTtlHours) * 60 * 60 * SECOND,
    activeTimeoutMs:
      (config.tracing?.active_timeout_seconds ?? CONFIG_DEFAULTS.tracingActiveTimeoutSeconds) * SECOND,
    logger,
  });

  let executor = options.executor;
  let providerStatus: (() => unknown) | undefined;
  if (!executor) {
    const cascade = new ProviderFallbackExecutor({
      tiers: createProviderChain(config.llm),
      cooldowns: CooldownManager.fromConfig(config.llm.cooldowns),
      tracer,
      logger,
    });
    executor = cascade;
    providerStatus = () => cascade.getStatus();
  }

  const registry = new ToolRegistry({ tracer, logger });
  registry.register(new EchoTool({ logger }), config.tools?.echo?.enabled ?? true);

  const infra = config.tools?.infra;
  const commandExecutor = infra?.endpoint
    ? new HttpCommandExecutor({
        endpoint: infra.endpoint,
        timeoutMs: infra.timeout_seconds !== undefined ? infra.timeout_seconds * SECOND : undefined,
      })
    : new EmulatedCommandExecutor();
  registry.register(new InfraCommandTool({ executor: commandExecutor, logger }), infra?.enabled ?? false);

  const ttls = config.state?.ttl_seconds ?? {};
  const states = new ConversationStateStore({
    defaultTtlMs: (config.state?.default_ttl_seconds ?? CONFIG_DEFAULTS.stateDefaultTtlSeconds) * SECOND,
    kindTtlMs: {
      normal: (ttls.normal ?? CONFIG_DEFAULTS.stateTtlSeconds.normal) * SECOND,
      confirmation: (ttls.confirmation ?? CONFIG_DEFAULTS.stateTtlSeconds.confirmation) * SECOND,
      clarification: (ttls.clarification ?? CONFIG_DEFAULTS.stateTtlSeconds.clarification) * SECOND,
      multi_step: (ttls.multi_step ?? CONFIG_DEFAULTS.stateTtlSeconds.multi_step) * SECOND,
    },
    historyLimit: config.state?.history_limit ?? CONFIG_DEFAULTS.stateHistoryLimit,
    logger,
  });

  const confirmations = new ConfirmationManager({
    registry,
    ttlMs: (config.confirmation?.ttl_seconds ?? CONFIG_DEFAULTS.confirmationTtlSeconds) * SECOND,
    tracer,
    logger,
  });

  const gateway = new Gateway({
    executor,
    systemPrompt: config.assistant?.system_prompt ?? CONFIG_DEFAULTS.systemPrompt,
    historyTurns: config.assistant?.history_turns ?? CONFIG_DEFAULTS.historyTurns,
    tracer,
    registry,
    states,
    confirmations,
    statusPort:
      options.statusServer === false ? undefined : (config.runtime?.status_port ?? CONFIG_DEFAULTS.statusPort),
    cleanupIntervalMs: 60 * SECOND,
    providerStatus,
    logger,
  });

  const admins = new Set(config.assistant?.admin_users ?? []);
  (logger ?? createLogger('bootstrap')).info(
    `Gateway built with ${registry.list(true).length} enabled tools and ${admins.size} admins`
  );

  return {
    gateway,
    roleFor: (userId) => (admins.has(userId) ? 'admin' : 'user'),
  };
}
