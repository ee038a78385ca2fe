/**
 * Confirmation Manager
 *
 * Gates confirmation-requiring tools behind an explicit yes/no from the user.
 * A session is opened with the bound tool call; resolving it moves the status
 * out of `pending` exactly once and, when confirmed, runs the tool through
 * the registry.
 *
 * The status check and transition in resolve() happen before any await, so
 * concurrent answers for the same session cannot both execute the tool.
 */

import { EventEmitter } from 'events';
import { v4 as uuid } from 'uuid';
import { errorMessage, type ToolResult, type TraceSink } from '@parley/types';
import { createLogger, type Logger } from '@parley/utils';
import type { ToolRegistry } from './registry.js';

export type ConfirmationStatus = 'pending' | 'confirmed' | 'cancelled' | 'expired';

export interface ConfirmationSession {
  sessionId: string;
  userId: string;
  toolName: string;
  parameters: Record<string, unknown>;
  /** Text shown to the user */
  prompt: string;
  status: ConfirmationStatus;
  createdAt: Date;
  expiresAt: Date;
  respondedAt: Date | null;
}

export interface ConfirmationStats {
  totalSessions: number;
  byStatus: Record<ConfirmationStatus, number>;
  /** Mean time between opening and answering, over answered sessions */
  averageResponseMs: number;
}

export interface ConfirmationButton {
  text: string;
  callbackData: string;
}

export type ConfirmationRequestListener = (session: ConfirmationSession) => void;
export type ConfirmationResponseListener = (session: ConfirmationSession, confirmed: boolean) => void;

export interface ConfirmationManagerOptions {
  registry: ToolRegistry;
  ttlMs?: number;
  /** How long answered or lapsed sessions stay queryable before cleanup drops them */
  retentionMs?: number;
  tracer?: TraceSink;
  logger?: Logger;
  now?: () => number;
}

const CALLBACK_PATTERN = /^confirm:([^:]+):(yes|no)$/;

export function formatCallbackData(sessionId: string, confirmed: boolean): string {
  return `confirm:${sessionId}:${confirmed ? 'yes' : 'no'}`;
}

/**
 * Parse button callback data of the form `confirm:<sessionId>:yes|no`
 */
export function parseCallbackData(data: string): { sessionId: string; confirmed: boolean } | null {
  const match = CALLBACK_PATTERN.exec(data.trim());
  if (!match?.[1] || !match[2]) return null;
  return { sessionId: match[1], confirmed: match[2] === 'yes' };
}

export function formatDefaultPrompt(toolName: string, parameters: Record<string, unknown>, ttlMs: number): string {
  const lines = ['Confirmation required', '', `Tool: ${toolName}`];
  const entries = Object.entries(parameters).filter(([, value]) => value !== undefined);
  if (entries.length > 0) {
    lines.push('Parameters:');
    for (const [key, value] of entries) {
      lines.push(`  • ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
  }
  lines.push(`Expires in ${Math.round(ttlMs / 1000)}s`, '', 'Confirm? Yes/No');
  return lines.join('\n');
}

export class ConfirmationManager extends EventEmitter {
  private readonly sessions = new Map<string, ConfirmationSession>();
  private readonly userSessions = new Map<string, string[]>();
  private readonly registry: ToolRegistry;
  private readonly ttlMs: number;
  private readonly retentionMs: number;
  private readonly tracer?: TraceSink;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ConfirmationManagerOptions) {
    super();
    this.registry = options.registry;
    this.ttlMs = options.ttlMs ?? 300_000;
    this.retentionMs = options.retentionMs ?? 3_600_000;
    this.tracer = options.tracer;
    this.logger = options.logger ?? createLogger('confirmation');
    this.now = options.now ?? Date.now;
  }

  /**
   * Open a confirmation session for a tool call. The prompt defaults to the
   * tool's own confirmation message.
   */
  open(
    userId: string,
    toolName: string,
    parameters: Record<string, unknown>,
    prompt?: string,
    ttlMs?: number
  ): string {
    const sessionId = uuid();
    const createdAt = this.now();
    const ttl = ttlMs ?? this.ttlMs;

    const session: ConfirmationSession = {
      sessionId,
      userId,
      toolName,
      parameters: { ...parameters },
      prompt:
        prompt ??
        this.registry.get(toolName)?.getConfirmationMessage(parameters) ??
        formatDefaultPrompt(toolName, parameters, ttl),
      status: 'pending',
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + ttl),
      respondedAt: null,
    };

    this.sessions.set(sessionId, session);
    const owned = this.userSessions.get(userId) ?? [];
    owned.push(sessionId);
    this.userSessions.set(userId, owned);

    this.notify('confirmation-requested', session);
    this.logger.info(`Opened confirmation ${sessionId} for tool '${toolName}' (user ${userId})`);
    return sessionId;
  }

  /**
   * Answer a session. Returns the tool result when confirmed and executed,
   * null in every other case.
   */
  async resolve(
    sessionId: string,
    confirmed: boolean,
    userId?: string,
    traceId?: string
  ): Promise<ToolResult | null> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      this.logger.warn(`Confirmation ${sessionId} not found`);
      return null;
    }

    if (userId !== undefined && session.userId !== userId) {
      this.logger.warn(`Confirmation ${sessionId} does not belong to user ${userId}`);
      return null;
    }

    if (session.status !== 'pending') {
      this.logger.warn(`Confirmation ${sessionId} already ${session.status}`);
      return null;
    }

    const answeredAt = this.now();
    if (answeredAt > session.expiresAt.getTime()) {
      session.status = 'expired';
      this.trace(traceId, session, false, 'expired');
      this.logger.warn(`Confirmation ${sessionId} expired`);
      return null;
    }

    session.status = confirmed ? 'confirmed' : 'cancelled';
    session.respondedAt = new Date(answeredAt);
    this.trace(traceId, session, true);
    this.notify('confirmation-resolved', session, confirmed);

    if (!confirmed) {
      this.logger.info(`Confirmation ${sessionId} cancelled`);
      return null;
    }

    this.logger.info(`Confirmation ${sessionId} accepted, running '${session.toolName}'`);
    return this.registry.execute(session.toolName, session.parameters, {
      userId: session.userId,
      traceId,
    });
  }

  getSession(sessionId: string): ConfirmationSession | undefined {
    return this.sessions.get(sessionId);
  }

  /** Pending sessions of a user; lapsed ones are marked expired on the way */
  getPendingSessions(userId: string): ConfirmationSession[] {
    const now = this.now();
    const pending: ConfirmationSession[] = [];

    for (const sessionId of this.userSessions.get(userId) ?? []) {
      const session = this.sessions.get(sessionId);
      if (!session || session.status !== 'pending') continue;

      if (now > session.expiresAt.getTime()) {
        session.status = 'expired';
      } else {
        pending.push(session);
      }
    }
    return pending;
  }

  cancelSession(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session || session.status !== 'pending') return false;

    session.status = 'cancelled';
    session.respondedAt = new Date(this.now());
    this.logger.info(`Confirmation ${sessionId} cancelled`);
    return true;
  }

  /**
   * Mark lapsed pending sessions expired and drop settled sessions once
   * they are older than the retention window. Returns the number newly
   * expired.
   */
  cleanupExpired(): number {
    const now = this.now();
    let expired = 0;
    let removed = 0;
    for (const session of this.sessions.values()) {
      if (session.status === 'pending') {
        if (now > session.expiresAt.getTime()) {
          session.status = 'expired';
          expired++;
        }
        continue;
      }

      const settledAt = Math.max(session.expiresAt.getTime(), session.respondedAt?.getTime() ?? 0);
      if (now > settledAt + this.retentionMs) {
        this.removeSession(session);
        removed++;
      }
    }

    if (expired > 0) {
      this.logger.info(`Marked ${expired} confirmations expired`);
    }
    if (removed > 0) {
      this.logger.debug(`Dropped ${removed} settled confirmations`);
    }
    return expired;
  }

  private removeSession(session: ConfirmationSession): void {
    this.sessions.delete(session.sessionId);
    const remaining = (this.userSessions.get(session.userId) ?? []).filter((id) => id !== session.sessionId);
    if (remaining.length > 0) {
      this.userSessions.set(session.userId, remaining);
    } else {
      this.userSessions.delete(session.userId);
    }
  }

  getStats(): ConfirmationStats {
    const byStatus: Record<ConfirmationStatus, number> = {
      pending: 0,
      confirmed: 0,
      cancelled: 0,
      expired: 0,
    };
    let responseTotal = 0;
    let responded = 0;

    for (const session of this.sessions.values()) {
      byStatus[session.status]++;
      if (session.respondedAt) {
        responseTotal += session.respondedAt.getTime() - session.createdAt.getTime();
        responded++;
      }
    }

    return {
      totalSessions: this.sessions.size,
      byStatus,
      averageResponseMs: responded > 0 ? responseTotal / responded : 0,
    };
  }

  formatButtons(sessionId: string): ConfirmationButton[] {
    return [
      { text: 'Confirm', callbackData: formatCallbackData(sessionId, true) },
      { text: 'Cancel', callbackData: formatCallbackData(sessionId, false) },
    ];
  }

  onRequest(listener: ConfirmationRequestListener): this {
    return this.on('confirmation-requested', listener);
  }

  onResponse(listener: ConfirmationResponseListener): this {
    return this.on('confirmation-resolved', listener);
  }

  private notify(event: string, session: ConfirmationSession, confirmed?: boolean): void {
    try {
      this.emit(event, session, confirmed);
    } catch (error) {
      this.logger.error(`Confirmation listener failed on ${event}: ${errorMessage(error)}`);
    }
  }

  private trace(traceId: string | undefined, session: ConfirmationSession, success: boolean, error?: string): void {
    if (!traceId) return;
    this.tracer?.event(traceId, 'confirmation', 'confirmation_resolved', {
      success,
      error,
      detail: { sessionId: session.sessionId, tool: session.toolName, status: session.status },
    });
  }
}
