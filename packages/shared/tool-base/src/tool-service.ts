/**
 * Tool Service Base Class
 *
 * Tools declare their metadata and a TypeBox parameter schema; the base
 * class validates raw parameters against the schema (filling defaults) and
 * offers helpers for building results.
 */

import type { Static, TObject } from '@sinclair/typebox';
import {
  validateWithDefaults,
  type LLMToolDefinition,
  type ToolExecutionContext,
  type ToolMetadata,
  type ToolOutput,
  type ValidationError,
} from '@parley/types';
import { createLogger, type Logger } from '@parley/utils';

export interface ToolServiceOptions {
  logger?: Logger;
}

export interface ToolValidationSuccess<T> {
  valid: true;
  params: T;
}

export interface ToolValidationFailure {
  valid: false;
  /** First offending parameter */
  field: string;
  message: string;
  errors: ValidationError[];
}

export type ToolValidationResult<T> = ToolValidationSuccess<T> | ToolValidationFailure;

/**
 * Abstract base class for tool implementations
 */
export abstract class ToolService<TParams extends TObject = TObject> {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly parameters: TParams;
  readonly version: string = '1.0.0';
  readonly requiresConfirmation: boolean = false;
  readonly estimatedTime: string = 'a few seconds';

  private injectedLogger?: Logger;
  private defaultLogger?: Logger;

  constructor(options: ToolServiceOptions = {}) {
    this.injectedLogger = options.logger;
  }

  protected get logger(): Logger {
    if (this.injectedLogger) return this.injectedLogger;
    this.defaultLogger ??= createLogger(`tool:${this.name}`);
    return this.defaultLogger;
  }

  /**
   * Run the tool. Parameters have already passed validate().
   * Throwing is allowed; the registry turns it into a failure result.
   */
  abstract execute(params: Static<TParams>, context: ToolExecutionContext): Promise<ToolOutput>;

  get metadata(): ToolMetadata {
    return {
      name: this.name,
      description: this.description,
      version: this.version,
      requiresConfirmation: this.requiresConfirmation,
      estimatedTime: this.estimatedTime,
    };
  }

  /**
   * Validate raw parameters against the schema, then against check()
   */
  validate(raw: unknown): ToolValidationResult<Static<TParams>> {
    const result = validateWithDefaults(this.parameters, raw ?? {});

    if (!result.success) {
      const first = result.errors[0];
      const field = first?.field || '(root)';
      return {
        valid: false,
        field,
        message: `Invalid parameter '${field}': ${first?.message ?? 'validation failed'}`,
        errors: result.errors,
      };
    }

    return this.check(result.data) ?? { valid: true, params: result.data };
  }

  /**
   * Checks the schema cannot express. Return a failure or null.
   */
  protected check(_params: Static<TParams>): ToolValidationFailure | null {
    return null;
  }

  /**
   * Prompt shown before a confirmation-gated run
   */
  getConfirmationMessage(params: Record<string, unknown>): string {
    const lines = [`Please confirm: ${this.description}`, '', `Tool: ${this.name}`];

    const entries = Object.entries(params).filter(([, value]) => value !== undefined);
    if (entries.length > 0) {
      lines.push('Parameters:');
      for (const [key, value] of entries) {
        lines.push(`  • ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
      }
    }

    lines.push(`Estimated time: ${this.estimatedTime}`, '', 'Confirm? Yes/No');
    return lines.join('\n');
  }

  /**
   * Catalog entry offered to tool-capable providers
   */
  toDefinition(): LLMToolDefinition {
    return {
      name: this.name,
      description: this.description,
      parameters: { ...this.parameters },
    };
  }

  protected ok(data: Record<string, unknown>, metadata?: Record<string, unknown>): ToolOutput {
    return { success: true, data, metadata };
  }

  protected fail(code: string, message: string, metadata?: Record<string, unknown>): ToolOutput {
    return { success: false, error: { code, message }, metadata };
  }

  protected invalid(field: string, message: string): ToolValidationFailure {
    return {
      valid: false,
      field,
      message: `Invalid parameter '${field}': ${message}`,
      errors: [{ path: `/${field}`, field, expected: 'valid value', received: undefined, message }],
    };
  }
}
