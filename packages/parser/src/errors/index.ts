import { CallflowErrorCode } from './codes.js';

export { CallflowErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all callflow errors
 */
export class CallflowError extends Error {
  constructor(
    message: string,
    public readonly code: CallflowErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'CallflowError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for diagnostics output
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

/**
 * A character no scanning rule accepts, outside any literal or comment.
 */
export class LexError extends CallflowError {
  constructor(
    public readonly character: string,
    public readonly line: number,
    public readonly source: string,
  ) {
    super(
      `Unexpected character ${JSON.stringify(character)} on line ${line} in ${source}`,
      CallflowErrorCode.LEX_ERROR,
      { character, line, source },
      'high',
      false,
    );
    this.name = 'LexError';
  }
}

/**
 * Input ended inside a quoted literal or block comment.
 * Carries whatever text was read before the end.
 */
export class TruncatedLiteralError extends CallflowError {
  constructor(
    public readonly construct: 'literal' | 'comment',
    public readonly partial: string,
    public readonly line: number,
    public readonly source: string,
  ) {
    super(
      `Unterminated ${construct} starting on line ${line} in ${source}`,
      CallflowErrorCode.TRUNCATED_LITERAL,
      { construct, line, source },
      'low',
      true,
    );
    this.name = 'TruncatedLiteralError';
  }
}

/**
 * A path that could not be opened or read
 */
export class UnreadableInputError extends CallflowError {
  constructor(
    public readonly path: string,
    context?: Record<string, unknown>,
  ) {
    super(`Cannot open ${path}`, CallflowErrorCode.UNREADABLE_INPUT, { ...context, path }, 'medium', true);
    this.name = 'UnreadableInputError';
  }
}

/**
 * An input unit rejected before reading (wrong extension, unmatched pattern)
 */
export class InvalidInputError extends CallflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CallflowErrorCode.INVALID_INPUT, context, 'medium', true);
    this.name = 'InvalidInputError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation)
 */
export class ConfigError extends CallflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, CallflowErrorCode.CONFIG_INVALID, context, 'medium', false);
    this.name = 'ConfigError';
  }
}

/**
 * Type guard to check if an error is a CallflowError
 */
export function isCallflowError(error: unknown): error is CallflowError {
  return error instanceof CallflowError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }
  return undefined;
}
