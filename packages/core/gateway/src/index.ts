/**
 * @parley/gateway
 *
 * Message handling core: routing, tool dispatch, confirmation, conversation
 * state and request tracing.
 */

export {
  Gateway,
  parseConfirmationAnswer,
  PROVIDER_UNAVAILABLE_REPLY,
  INTERNAL_ERROR_REPLY,
  CANCELLED_REPLY,
  EXPIRED_CONFIRMATION_REPLY,
  UNKNOWN_CALLBACK_REPLY,
  type GatewayOptions,
  type GatewayReply,
  type GatewayStatus,
} from './gateway.js';
export { createGatewayFromConfig, type BootstrapOptions, type Bootstrapped } from './bootstrap.js';
export { AgentRouter, NO_AGENT_REPLY, type RouteResult, type RouterStatus } from './router.js';
export * from './agents/index.js';
export {
  TurnLoop,
  formatToolResult,
  clarificationQuestion,
  type CompletionExecutor,
  type TurnOutcome,
  type TurnResult,
} from './turn-loop.js';
export { ToolRegistry, type ToolRegistryOptions } from './tools/registry.js';
export {
  ConfirmationManager,
  formatCallbackData,
  parseCallbackData,
  formatDefaultPrompt,
  type ConfirmationSession,
  type ConfirmationStatus,
  type ConfirmationStats,
  type ConfirmationButton,
} from './tools/confirmation-manager.js';
export {
  ConversationStateStore,
  CONFIRMATION_SESSION_KEY,
  DEFAULT_KIND_TTL_MS,
  ExportedStateSchema,
  type ConversationState,
  type ExportedState,
  type StateKind,
} from './state.js';
export {
  RequestTracer,
  traceDurationMs,
  componentDurations,
  type RequestTrace,
  type TraceEvent,
  type TraceMetrics,
} from './tracing/request-tracer.js';
export {
  createStatusServer,
  handleStatusRequest,
  getHealth,
  VERSION,
  type HealthReport,
} from './status.js';
