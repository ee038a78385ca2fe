/**
 * Parley Error Types and Factory Functions
 *
 * Every component raises errors through these factories so that the code,
 * the originating component and an optional correlation (trace) id travel
 * with the error.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ParleyErrorCodes = {
  /** Configuration could not be loaded or is invalid */
  CONFIG: 'PARLEY_ERR_CONFIG',
  /** Inbound payload failed schema validation */
  VALIDATION: 'PARLEY_ERR_VALIDATION',
  /** Tool, session or trace does not exist */
  NOT_FOUND: 'PARLEY_ERR_NOT_FOUND',
  /** Tool exists but is switched off */
  TOOL_DISABLED: 'PARLEY_ERR_TOOL_DISABLED',
  /** Tool parameters did not match the tool's schema */
  INVALID_PARAMETERS: 'PARLEY_ERR_INVALID_PARAMETERS',
  /** Confirmation session or state outlived its TTL */
  EXPIRED: 'PARLEY_ERR_EXPIRED',
  /** Confirmation session already left the pending status */
  ALREADY_RESOLVED: 'PARLEY_ERR_ALREADY_RESOLVED',
  /** Every provider tier failed for one completion */
  PROVIDER_UNAVAILABLE: 'PARLEY_ERR_PROVIDER_UNAVAILABLE',
  /** Tool logic threw or reported failure */
  TOOL_FAILED: 'PARLEY_ERR_TOOL_FAILED',
  /** No agent accepted the message */
  NO_AGENT: 'PARLEY_ERR_NO_AGENT',
  /** Internal error */
  INTERNAL: 'PARLEY_ERR_INTERNAL',
} as const;

export type ParleyErrorCode = (typeof ParleyErrorCodes)[keyof typeof ParleyErrorCodes];

// ============================================================================
// Error Class
// ============================================================================

export interface ParleyErrorData {
  code: ParleyErrorCode;
  message: string;
  /** Component that generated the error */
  component: string;
  details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Trace id of the request being served, when there is one */
  correlationId?: string;
  cause?: Error;
}

export class ParleyError extends Error {
  readonly code: ParleyErrorCode;
  readonly component: string;
  readonly details?: Record<string, unknown>;
  readonly timestamp: string;
  readonly correlationId?: string;

  constructor(data: ParleyErrorData) {
    super(data.message);
    this.name = 'ParleyError';
    this.code = data.code;
    this.component = data.component;
    this.details = data.details;
    this.timestamp = data.timestamp;
    this.correlationId = data.correlationId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ParleyError);
    }

    if (data.cause) {
      this.cause = data.cause;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      component: this.component,
      details: this.details,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message} (component: ${this.component})`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

export interface CreateErrorOptions {
  component: string;
  details?: Record<string, unknown>;
  correlationId?: string;
  cause?: Error;
}

function build(code: ParleyErrorCode, message: string, options: CreateErrorOptions): ParleyError {
  return new ParleyError({
    code,
    message,
    timestamp: new Date().toISOString(),
    ...options,
  });
}

export function createConfigError(message: string, options: CreateErrorOptions): ParleyError {
  return build(ParleyErrorCodes.CONFIG, message, options);
}

export function createValidationError(message: string, options: CreateErrorOptions): ParleyError {
  return build(ParleyErrorCodes.VALIDATION, message, options);
}

export function createNotFoundError(message: string, options: CreateErrorOptions): ParleyError {
  return build(ParleyErrorCodes.NOT_FOUND, message, options);
}

export function createToolDisabledError(message: string, options: CreateErrorOptions): ParleyError {
  return build(ParleyErrorCodes.TOOL_DISABLED, message, options);
}

export function createInvalidParametersError(
  message: string,
  options: CreateErrorOptions
): ParleyError {
  return build(ParleyErrorCodes.INVALID_PARAMETERS, message, options);
}

export function createExpiredError(message: string, options: CreateErrorOptions): ParleyError {
  return build(ParleyErrorCodes.EXPIRED, message, options);
}

export function createAlreadyResolvedError(
  message: string,
  options: CreateErrorOptions
): ParleyError {
  return build(ParleyErrorCodes.ALREADY_RESOLVED, message, options);
}

/**
 * Raised by the provider cascade once every tier has failed. The attempted
 * tiers and their error classes belong in `details.attempts`.
 */
export function createProviderUnavailableError(
  message: string,
  options: CreateErrorOptions
): ParleyError {
  return build(ParleyErrorCodes.PROVIDER_UNAVAILABLE, message, options);
}

export function createToolFailedError(message: string, options: CreateErrorOptions): ParleyError {
  return build(ParleyErrorCodes.TOOL_FAILED, message, options);
}

export function createNoAgentError(message: string, options: CreateErrorOptions): ParleyError {
  return build(ParleyErrorCodes.NO_AGENT, message, options);
}

export function createInternalError(message: string, options: CreateErrorOptions): ParleyError {
  return build(ParleyErrorCodes.INTERNAL, message, options);
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isParleyError(error: unknown): error is ParleyError {
  return error instanceof ParleyError;
}

export function hasErrorCode(error: unknown, code: ParleyErrorCode): boolean {
  return isParleyError(error) && error.code === code;
}

/**
 * Wrap any error as a ParleyError.
 * ParleyErrors pass through untouched; anything else becomes an internal error.
 */
export function wrapError(error: unknown, options: CreateErrorOptions): ParleyError {
  if (isParleyError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return createInternalError(error.message, {
      ...options,
      cause: error,
    });
  }

  return createInternalError(String(error), options);
}

/**
 * Extract error information suitable for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (isParleyError(error)) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

/**
 * Short message for an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
