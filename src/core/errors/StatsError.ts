/**
 * Core error handling for mtstat
 *
 * Every failure raised by the library carries a structured code so callers
 * can branch on the category instead of parsing messages.
 */

/**
 * Error codes covering all error categories in mtstat
 */
export enum ErrorCode {
  // Argument errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',

  // Usage errors
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  PRECONDITION_VIOLATION = 'PRECONDITION_VIOLATION',

  // Sampling errors
  REJECTION_LIMIT = 'REJECTION_LIMIT',

  // System errors
  IO_ERROR = 'IO_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error class with a structured code and optional debugging context
 *
 * @example
 * ```typescript
 * throw new StatsError(
 *   ErrorCode.INVALID_ARGUMENT,
 *   'Poisson mean must be non-negative',
 *   { lambda: -1 }
 * );
 * ```
 */
export class StatsError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional values describing the failing call
   * @param cause - Underlying error, if this one wraps another
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'StatsError';
    Error.captureStackTrace(this, StatsError);
  }

  /**
   * Formatted representation including code and context
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is a StatsError
 */
export function isStatsError(error: unknown): error is StatsError {
  return error instanceof StatsError;
}

/**
 * Wrap an unknown thrown value as a StatsError, keeping the original as cause
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL_ERROR): StatsError {
  if (isStatsError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context = error instanceof Error ? { originalName: error.name } : { originalError: error };

  return new StatsError(code, message, context, error);
}
