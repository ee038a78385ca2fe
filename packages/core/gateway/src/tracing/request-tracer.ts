/**
 * Request Tracer
 *
 * Follows one inbound message through router, agents, providers and tools.
 * Each request gets a short trace id; components append timed events to it
 * until the gateway ends the trace.
 */

import { v4 as uuid } from 'uuid';
import {
  errorMessage,
  type TraceComponent,
  type TraceEventOptions,
  type TraceSink,
  type TraceStatus,
  type TraceStep,
} from '@parley/types';
import { createLogger, round, type Logger } from '@parley/utils';

export interface TraceEvent {
  readonly timestamp: Date;
  readonly component: TraceComponent;
  readonly step: TraceStep;
  readonly success: boolean;
  readonly error?: string;
  readonly durationMs?: number;
  readonly detail: Readonly<Record<string, unknown>>;
}

export interface RequestTrace {
  traceId: string;
  userId: string;
  sessionId?: string;
  startTime: Date;
  /** Null while the trace is active */
  endTime: Date | null;
  status: TraceStatus;
  events: TraceEvent[];
  metadata: Record<string, unknown>;
}

export interface ComponentTiming {
  totalMs: number;
  /** Number of retained traces with timed events for the component */
  count: number;
  avgMs: number;
}

export interface TraceMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  successRate: number;
  activeTraces: number;
  completedTraces: number;
  avgDurationMs: number;
  componentPerformance: Partial<Record<TraceComponent, ComponentTiming>>;
}

export interface RequestTracerOptions {
  maxTraces?: number;
  ttlMs?: number;
  /** Active traces older than this are closed as timed_out on cleanup */
  activeTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

export function traceDurationMs(trace: RequestTrace): number | null {
  return trace.endTime ? trace.endTime.getTime() - trace.startTime.getTime() : null;
}

export function componentDurations(trace: RequestTrace): Partial<Record<TraceComponent, number>> {
  const durations: Partial<Record<TraceComponent, number>> = {};
  for (const event of trace.events) {
    if (event.durationMs !== undefined) {
      durations[event.component] = (durations[event.component] ?? 0) + event.durationMs;
    }
  }
  return durations;
}

export class RequestTracer implements TraceSink {
  private readonly active = new Map<string, RequestTrace>();
  /** Insertion order is completion order */
  private readonly completed = new Map<string, RequestTrace>();
  private readonly maxTraces: number;
  private readonly ttlMs: number;
  private readonly activeTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;

  constructor(options: RequestTracerOptions = {}) {
    this.maxTraces = options.maxTraces ?? 1000;
    this.ttlMs = options.ttlMs ?? 24 * 60 * 60 * 1000;
    this.activeTimeoutMs = options.activeTimeoutMs ?? 5 * 60 * 1000;
    this.logger = options.logger ?? createLogger('tracer');
    this.now = options.now ?? Date.now;
  }

  begin(userId: string, sessionId?: string, metadata: Record<string, unknown> = {}): string {
    let traceId = uuid().slice(0, 8);
    while (this.active.has(traceId) || this.completed.has(traceId)) {
      traceId = uuid().slice(0, 8);
    }

    this.active.set(traceId, {
      traceId,
      userId,
      sessionId,
      startTime: new Date(this.now()),
      endTime: null,
      status: 'started',
      events: [],
      metadata: { ...metadata },
    });
    this.totalRequests++;

    this.logger.debug(`[${traceId}] trace started for user ${userId}`);
    return traceId;
  }

  event(
    traceId: string,
    component: TraceComponent,
    step: TraceStep,
    options: TraceEventOptions = {}
  ): void {
    try {
      const trace = this.active.get(traceId);
      if (!trace) return;

      const success = options.success ?? true;
      trace.events.push(
        Object.freeze({
          timestamp: new Date(this.now()),
          component,
          step,
          success,
          error: options.error,
          durationMs: options.durationMs,
          detail: Object.freeze({ ...options.detail }),
        })
      );

      const timing = options.durationMs !== undefined ? ` (${round(options.durationMs, 1)}ms)` : '';
      const failure = options.error ? ` ERROR: ${options.error}` : '';
      this.logger.debug(`[${traceId}] ${success ? 'ok' : 'FAIL'} ${component} -> ${step}${timing}${failure}`);
    } catch (error) {
      this.logger.warn(`[${traceId}] failed to record ${component}/${step}: ${errorMessage(error)}`);
    }
  }

  end(traceId: string, status: Exclude<TraceStatus, 'started'> = 'completed', detail?: Record<string, unknown>): void {
    try {
      const trace = this.active.get(traceId);
      if (!trace) return;

      trace.endTime = new Date(this.now());
      trace.status = status;
      if (detail) {
        Object.assign(trace.metadata, detail);
      }

      if (status === 'completed') {
        this.successfulRequests++;
      } else {
        this.failedRequests++;
      }

      this.active.delete(traceId);
      this.completed.set(traceId, trace);
      this.enforceLimit();

      this.logger.debug(`[${traceId}] trace ${status} after ${traceDurationMs(trace) ?? 0}ms`);
    } catch (error) {
      this.logger.warn(`[${traceId}] failed to end trace: ${errorMessage(error)}`);
    }
  }

  /**
   * Run an operation and record it as one timed event. Failures are recorded
   * and rethrown.
   */
  async traceOperation<T>(
    traceId: string,
    component: TraceComponent,
    step: TraceStep,
    operation: () => Promise<T>,
    detail?: Record<string, unknown>
  ): Promise<T> {
    const startedAt = this.now();
    try {
      const result = await operation();
      this.event(traceId, component, step, { detail, durationMs: this.now() - startedAt });
      return result;
    } catch (error) {
      this.event(traceId, component, step, {
        detail,
        durationMs: this.now() - startedAt,
        success: false,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  getTrace(traceId: string): RequestTrace | undefined {
    return this.active.get(traceId) ?? this.completed.get(traceId);
  }

  getActiveTraces(): RequestTrace[] {
    return [...this.active.values()];
  }

  /** Newest first */
  getUserTraces(userId: string, limit = 10): RequestTrace[] {
    return [...this.active.values(), ...this.completed.values()]
      .filter((trace) => trace.userId === userId)
      .sort((a, b) => b.startTime.getTime() - a.startTime.getTime())
      .slice(0, limit);
  }

  getMetrics(): TraceMetrics {
    const completed = [...this.completed.values()];
    const durations = completed
      .map(traceDurationMs)
      .filter((duration): duration is number => duration !== null);

    const componentPerformance: Partial<Record<TraceComponent, ComponentTiming>> = {};
    for (const trace of completed) {
      for (const [component, totalMs] of Object.entries(componentDurations(trace))) {
        if (!isTraceComponent(component) || totalMs === undefined) continue;
        const stats = componentPerformance[component] ?? { totalMs: 0, count: 0, avgMs: 0 };
        stats.totalMs += totalMs;
        stats.count += 1;
        stats.avgMs = stats.totalMs / stats.count;
        componentPerformance[component] = stats;
      }
    }

    return {
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      successRate: this.totalRequests > 0 ? this.successfulRequests / this.totalRequests : 0,
      activeTraces: this.active.size,
      completedTraces: this.completed.size,
      avgDurationMs:
        durations.length > 0 ? durations.reduce((sum, value) => sum + value, 0) / durations.length : 0,
      componentPerformance,
    };
  }

  /**
   * Close stale active traces and drop completed ones past their TTL
   */
  cleanup(): { timedOut: number; evicted: number } {
    const now = this.now();
    let timedOut = 0;
    let evicted = 0;

    for (const trace of [...this.active.values()]) {
      if (now - trace.startTime.getTime() > this.activeTimeoutMs) {
        this.end(trace.traceId, 'timed_out', { reason: 'active timeout' });
        timedOut++;
      }
    }

    for (const [traceId, trace] of this.completed) {
      if (trace.endTime && now - trace.endTime.getTime() > this.ttlMs) {
        this.completed.delete(traceId);
        evicted++;
      }
    }

    if (timedOut > 0 || evicted > 0) {
      this.logger.info(`Trace cleanup: ${timedOut} timed out, ${evicted} evicted`);
    }
    return { timedOut, evicted };
  }

  private enforceLimit(): void {
    for (const traceId of this.completed.keys()) {
      if (this.completed.size <= this.maxTraces) break;
      this.completed.delete(traceId);
    }
  }
}

const TRACE_COMPONENTS: readonly TraceComponent[] = [
  'gateway',
  'router',
  'agent',
  'provider',
  'tool',
  'confirmation',
  'state',
];

function isTraceComponent(value: string): value is TraceComponent {
  return TRACE_COMPONENTS.some((component) => component === value);
}
