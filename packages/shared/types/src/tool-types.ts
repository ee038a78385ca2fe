/**
 * Tool Types
 *
 * Result and metadata shapes shared by tool implementations, the tool
 * registry and the confirmation flow.
 */

/**
 * Static description of a tool
 */
export interface ToolMetadata {
  name: string;
  description: string;
  /** Semantic version, defaults to 1.0.0 */
  version: string;
  /** Whether execution must be gated behind explicit user confirmation */
  requiresConfirmation: boolean;
  /** Human-readable estimate shown in confirmation prompts */
  estimatedTime: string;
}

export interface ToolError {
  /** One of the ParleyErrorCodes, or a tool-specific code */
  code: string;
  message: string;
  /** Offending parameter, for validation failures */
  field?: string;
}

/**
 * Metadata stamped on every dispatched result
 */
export interface ToolResultMetadata {
  toolName: string;
  toolVersion?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * What a tool's execute() returns before the registry stamps it
 */
export interface ToolOutput {
  success: boolean;
  data?: Record<string, unknown>;
  error?: ToolError;
  metadata?: Record<string, unknown>;
}

/**
 * Result of a dispatch through the registry
 */
export interface ToolResult {
  success: boolean;
  data?: Record<string, unknown>;
  error?: ToolError;
  metadata: ToolResultMetadata;
}

/**
 * Caller context handed to tools next to their parameters
 */
export interface ToolExecutionContext {
  userId?: string;
  traceId?: string;
}

/**
 * Operator view of a registered tool
 */
export interface ToolInfo {
  name: string;
  description: string;
  version: string;
  enabled: boolean;
  requiresConfirmation: boolean;
  estimatedTime: string;
}
