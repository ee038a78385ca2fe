/**
 * Runtime validation with TypeBox schemas.
 *
 * Used at the gateway boundary for inbound messages and by tools for their
 * parameters.
 */

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import { Value, type ValueError } from '@sinclair/typebox/value';
import type { TSchema, Static } from '@sinclair/typebox';
import { createValidationError } from './errors.js';
import { InboundMessageSchema, type InboundMessage } from './schemas.js';

// ============================================================================
// Validation Error Types
// ============================================================================

export interface ValidationError {
  /** JSON pointer of the failing value, e.g. /sender/id */
  path: string;
  /** Dotted field name derived from the path, e.g. sender.id */
  field: string;
  expected: string;
  received: unknown;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

// ============================================================================
// Compiled Validators
// ============================================================================

const compilerCache = new Map<TSchema, TypeCheck<TSchema>>();

function getCompiler<T extends TSchema>(schema: T): TypeCheck<T> {
  let compiler = compilerCache.get(schema);
  if (!compiler) {
    compiler = TypeCompiler.Compile(schema);
    compilerCache.set(schema, compiler);
  }
  return compiler as TypeCheck<T>;
}

function getSchemaTypeName(schema: Record<string, unknown>): string {
  if (schema.$id) return String(schema.$id);
  if (schema.type) return String(schema.type);
  if (schema.anyOf) return 'union';
  if (schema.const !== undefined) return `literal(${JSON.stringify(schema.const)})`;
  return 'unknown';
}

/**
 * Convert a JSON pointer into a dotted field name
 */
export function pointerToField(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .join('.');
}

function convertError(error: ValueError): ValidationError {
  return {
    path: error.path,
    field: pointerToField(error.path),
    expected: getSchemaTypeName(error.schema),
    received: error.value,
    message: error.message,
  };
}

// ============================================================================
// Core Validation Functions
// ============================================================================

export function validate<T extends TSchema>(schema: T, data: unknown): ValidationResult<Static<T>> {
  const compiler = getCompiler(schema);

  if (compiler.Check(data)) {
    return { success: true, data };
  }

  return {
    success: false,
    errors: [...compiler.Errors(data)].map(convertError),
  };
}

/**
 * Validate after filling schema defaults into a copy of the input
 */
export function validateWithDefaults<T extends TSchema>(
  schema: T,
  data: unknown
): ValidationResult<Static<T>> {
  const withDefaults = Value.Default(schema, Value.Clone(data));
  return validate(schema, withDefaults);
}

export function isValid<T extends TSchema>(schema: T, data: unknown): data is Static<T> {
  return getCompiler(schema).Check(data);
}

export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.field || '(root)'}: ${e.message}`).join('; ');
}

/**
 * Validate data and throw a PARLEY_ERR_VALIDATION error if invalid
 */
export function validateOrThrow<T extends TSchema>(
  schema: T,
  data: unknown,
  component = 'validation'
): Static<T> {
  const result = validate(schema, data);

  if (!result.success) {
    throw createValidationError(`Validation failed: ${formatValidationErrors(result.errors)}`, {
      component,
      details: { errors: result.errors.map(({ field, message }) => ({ field, message })) },
    });
  }

  return result.data;
}

export function validateInboundMessage(data: unknown): ValidationResult<InboundMessage> {
  return validate(InboundMessageSchema, data);
}
