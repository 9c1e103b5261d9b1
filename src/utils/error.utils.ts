/**
 * @fileoverview Structured error handling for the V24 dialog client. Every public operation
 * either returns a domain result or rejects with one V24Error carrying a typed ErrorCode.
 *
 * Error Categories:
 * - Caller: INVALID_ARGUMENT, PROTOCOL_VIOLATION
 * - Transport: CONNECTION, TIMEOUT, IO, SESSION_CLOSED
 * - Wire: MALFORMED_FRAME
 * - Configuration: CONFIG_INVALID, VALIDATION
 *
 * TIMEOUT, IO and MALFORMED_FRAME are fatal for the session that raised them: the byte
 * stream can no longer be trusted and the session is closed before the error surfaces.
 *
 * Factory Functions:
 * - invalidArgumentError(), connectionError(), timeoutError(), ioError()
 * - malformedFrameError(), protocolViolationError(), sessionClosedError()
 * - fromZodError(): Converts Zod validation errors with issue details
 *
 * Utilities:
 * - isV24Error(), hasErrorCode(): Type guards
 * - toV24Error(): Converts unknown errors to V24Error
 * - createErrorResult(): Formats errors for CLI output
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  VALIDATION = 'VALIDATION',

  // Caller errors (raised before or instead of any I/O)
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  PROTOCOL_VIOLATION = 'PROTOCOL_VIOLATION',

  // Transport errors
  CONNECTION = 'CONNECTION',
  TIMEOUT = 'TIMEOUT',
  IO = 'IO',
  SESSION_CLOSED = 'SESSION_CLOSED',

  // Wire errors
  MALFORMED_FRAME = 'MALFORMED_FRAME',

  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID'
}

/**
 * Codes after which the session that raised them is closed
 */
export const FATAL_SESSION_ERRORS: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.TIMEOUT,
  ErrorCode.IO,
  ErrorCode.MALFORMED_FRAME
]);

// ============================================================================
// CUSTOM ERROR CLASS
// ============================================================================

/**
 * Error raised by every layer of the client, tagged with an ErrorCode
 */
export class V24Error extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'V24Error';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, V24Error);
    }
  }

  /**
   * Whether the session that raised this error has been closed because of it
   */
  public get isFatal(): boolean {
    return FATAL_SESSION_ERRORS.has(this.code);
  }

  /**
   * Convert to plain object for serialization
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message,
        stack: this.originalError.stack
      } : undefined
    };
  }

  /**
   * Get user-friendly error message
   */
  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.INVALID_ARGUMENT:
        return `Invalid argument: ${this.message}`;
      case ErrorCode.CONNECTION:
        return 'Could not connect to the printer. Please check the address and network';
      case ErrorCode.TIMEOUT:
        return 'The printer did not answer in time. Please reconnect and try again';
      case ErrorCode.IO:
        return 'Connection to the printer was lost. Please reconnect';
      case ErrorCode.MALFORMED_FRAME:
        return 'The printer sent an unreadable response. Please reconnect';
      case ErrorCode.SESSION_CLOSED:
        return 'The printer session is closed. Please reconnect';
      case ErrorCode.CONFIG_INVALID:
        return 'Configuration is invalid. Please check your settings';
      default:
        return this.message || 'An unexpected error occurred';
    }
  }
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create error from Zod validation error
 */
export function fromZodError(error: ZodError, code: ErrorCode = ErrorCode.VALIDATION): V24Error {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code
  }));

  return new V24Error(
    'Validation failed',
    code,
    { issues },
    error
  );
}

/**
 * Argument outside a command's domain. Raised before any I/O.
 */
export function invalidArgumentError(
  message: string,
  context?: Record<string, unknown>
): V24Error {
  return new V24Error(message, ErrorCode.INVALID_ARGUMENT, context);
}

/**
 * Transport could not be established
 */
export function connectionError(
  host: string,
  port: number,
  originalError?: Error
): V24Error {
  const reason = originalError ? `: ${originalError.message}` : '';
  return new V24Error(
    `Failed to connect to ${host}:${port}${reason}`,
    ErrorCode.CONNECTION,
    { host, port },
    originalError
  );
}

/**
 * Create timeout error
 */
export function timeoutError(operation: string, timeoutMs: number): V24Error {
  return new V24Error(
    `Operation timed out after ${timeoutMs}ms`,
    ErrorCode.TIMEOUT,
    { operation, timeoutMs }
  );
}

/**
 * Transport failed mid-exchange
 */
export function ioError(message: string, originalError?: Error): V24Error {
  return new V24Error(message, ErrorCode.IO, undefined, originalError);
}

/**
 * Received bytes do not match the frame grammar
 */
export function malformedFrameError(reason: string, received: Uint8Array): V24Error {
  return new V24Error(
    `Malformed frame: ${reason}`,
    ErrorCode.MALFORMED_FRAME,
    { received: Buffer.from(received).toString('hex') }
  );
}

/**
 * Caller broke the single-outstanding-request rule
 */
export function protocolViolationError(message: string): V24Error {
  return new V24Error(message, ErrorCode.PROTOCOL_VIOLATION);
}

/**
 * Operation attempted on a session that can no longer exchange frames
 */
export function sessionClosedError(operation: string): V24Error {
  return new V24Error(
    `Cannot ${operation}: session is closed`,
    ErrorCode.SESSION_CLOSED,
    { operation }
  );
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

/**
 * Check if error is a V24Error
 */
export function isV24Error(error: unknown): error is V24Error {
  return error instanceof V24Error;
}

/**
 * Check if error is a V24Error with the given code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): error is V24Error {
  return isV24Error(error) && error.code === code;
}

/**
 * Convert unknown error to V24Error
 */
export function toV24Error(error: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN): V24Error {
  if (isV24Error(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  if (error instanceof Error) {
    return new V24Error(
      error.message,
      defaultCode,
      undefined,
      error
    );
  }

  if (typeof error === 'string') {
    return new V24Error(error, defaultCode);
  }

  return new V24Error(
    'An unknown error occurred',
    defaultCode,
    { error }
  );
}

/**
 * Create error result for CLI output
 */
export function createErrorResult(error: unknown): { success: false; code: ErrorCode; error: string } {
  const v24Error = toV24Error(error);
  return {
    success: false,
    code: v24Error.code,
    error: v24Error.getUserMessage()
  };
}
