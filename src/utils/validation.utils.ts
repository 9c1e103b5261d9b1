/**
 * @fileoverview Zod-based validation utilities providing type-safe schema validation with
 * structured results, used for grammars, client configuration and CLI input.
 *
 * Validation Result Types:
 * - ValidationSuccess<T>: Contains validated data
 * - ValidationFailure: Contains V24Error and detailed issue array
 * - ValidationResult<T>: Union type for result handling
 *
 * Core Functions:
 * - validate(schema, data): Full validation with detailed error info
 * - validateOrThrow(schema, data, code): Validation that rejects with a V24Error
 * - coerceToInteger(value): Strict integer coercion for CLI arguments
 * - formatValidationErrors(error): Multi-line error message with paths
 */

import { z, ZodError } from 'zod';
import { ErrorCode, V24Error, fromZodError } from './error.utils';

// ============================================================================
// VALIDATION RESULT TYPES
// ============================================================================

/**
 * Success validation result
 */
export interface ValidationSuccess<T> {
  success: true;
  data: T;
}

/**
 * Failed validation result
 */
export interface ValidationFailure {
  success: false;
  error: V24Error;
  issues: Array<{
    path: string;
    message: string;
    code: string;
  }>;
}

/**
 * Validation result union type
 */
export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

// ============================================================================
// CORE VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate data against a schema with detailed error info
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  code: ErrorCode = ErrorCode.VALIDATION
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return {
      success: true,
      data: result.data
    };
  }

  return {
    success: false,
    error: fromZodError(result.error, code),
    issues: result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code
    }))
  };
}

/**
 * Validate data and throw a V24Error when it does not match
 */
export function validateOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  code: ErrorCode = ErrorCode.VALIDATION
): z.output<S> {
  const result = validate(schema, data, code);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

// ============================================================================
// COERCION UTILITIES
// ============================================================================

/**
 * Coerce a decimal string to an integer; null for anything else
 */
export function coerceToInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value !== 'string' || !/^-?\d+$/.test(value.trim())) {
    return null;
  }
  return parseInt(value.trim(), 10);
}

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Format validation errors for display
 */
export function formatValidationErrors(error: ZodError): string {
  const messages = error.issues.map(issue => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return messages.join('\n');
}
