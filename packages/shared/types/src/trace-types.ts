/**
 * Trace vocabulary shared by every component that reports into the request
 * tracer.
 */

export type TraceComponent =
  | 'gateway'
  | 'router'
  | 'agent'
  | 'provider'
  | 'tool'
  | 'confirmation'
  | 'state';

export type TraceStep =
  | 'message_received'
  | 'agent_check'
  | 'agent_processing'
  | 'agent_routing'
  | 'provider_call'
  | 'tool_execution'
  | 'confirmation_requested'
  | 'confirmation_resolved'
  | 'clarification_requested'
  | 'response_generation'
  | 'error_handling';

export type TraceStatus = 'started' | 'completed' | 'failed' | 'timed_out';

export interface TraceEventOptions {
  detail?: Record<string, unknown>;
  durationMs?: number;
  /** Defaults to true */
  success?: boolean;
  error?: string;
}

/**
 * Minimal write side of the tracer. Implementations must never throw.
 */
export interface TraceSink {
  event(
    traceId: string,
    component: TraceComponent,
    step: TraceStep,
    options?: TraceEventOptions
  ): void;
}
