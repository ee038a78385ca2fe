import type { LLMMessage, LLMToolDefinition, NormalizedReply } from '@parley/types';

export type ProviderType = 'openai' | 'anthropic' | 'ollama';

export type ProviderErrorKind =
  | 'rate_limit'
  | 'billing'
  | 'auth'
  | 'network'
  | 'invalid_request'
  | 'invalid_response'
  | 'unavailable'
  | 'unknown';

export interface ProviderRequest {
  messages: LLMMessage[];
  /** Omitted for text-only calls */
  tools?: LLMToolDefinition[];
}

export interface AdapterSendOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMProviderAdapter {
  readonly name: string;
  readonly type: ProviderType;
  /** Whether the adapter forwards a tool catalog */
  readonly supportsTools: boolean;
  send(request: ProviderRequest, options: AdapterSendOptions): Promise<NormalizedReply>;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly providerCode?: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

function readStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

const NETWORK_PATTERN = /connection|timed? ?out|ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|fetch failed/i;

/**
 * Classify an SDK or transport error. Both SDKs expose the HTTP status on
 * their API errors; connection failures carry no status.
 */
export function mapProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const status = readStatus(error);
  if (status !== undefined) {
    const code = String(status);
    if (status === 401 || status === 403) {
      return new ProviderError(`${provider}: authentication failed`, 'auth', code);
    }
    if (status === 402) {
      return new ProviderError(`${provider}: billing issue`, 'billing', code);
    }
    if (status === 429) {
      return new ProviderError(`${provider}: rate limit exceeded`, 'rate_limit', code);
    }
    if (status >= 500) {
      return new ProviderError(`${provider}: provider unavailable`, 'unavailable', code);
    }
    if (status >= 400) {
      return new ProviderError(`${provider}: request rejected`, 'invalid_request', code);
    }
  }

  if (error instanceof Error && NETWORK_PATTERN.test(`${error.name} ${error.message}`)) {
    return new ProviderError(`${provider}: ${error.message}`, 'network');
  }

  const detail = error instanceof Error ? error.message : String(error);
  return new ProviderError(`${provider}: ${detail}`, 'unknown');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode tool-call arguments sent as a JSON string
 */
export function parseToolArguments(raw: string | undefined, provider: string): Record<string, unknown> {
  if (!raw || raw.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ProviderError(`${provider}: tool arguments are not valid JSON`, 'invalid_response');
  }

  if (!isRecord(parsed)) {
    throw new ProviderError(`${provider}: tool arguments must be a JSON object`, 'invalid_response');
  }
  return parsed;
}

export function toRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
