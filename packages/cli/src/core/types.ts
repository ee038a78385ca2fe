/**
 * Shared types for the Parley CLI
 */

/**
 * Standard JSON output envelope for all CLI commands
 */
export interface CommandOutput<T = unknown> {
  ok: boolean;
  /** Command name, e.g. "status" or "config validate" */
  command: string;
  /** Present when ok=true */
  data?: T;
  /** Present when ok=false */
  error?: {
    /** Machine-readable error code */
    code: string;
    message: string;
    details?: unknown;
  };
  meta: {
    /** ISO 8601 timestamp */
    timestamp: string;
    /** CLI version */
    version: string;
    /** parley.toml used, when the command read one */
    config_path?: string;
    duration_ms?: number;
  };
}
