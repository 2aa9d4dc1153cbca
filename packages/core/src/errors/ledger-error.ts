/**
 * LedgerError - Structured error class shared by every package
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a LedgerError
 */
export interface LedgerErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a LedgerError
 */
export interface SerializedLedgerError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedLedgerError | { name: string; message: string; stack?: string };
}

/**
 * Base error for the custody ledger.
 *
 * @example
 * ```typescript
 * throw new LedgerError({
 *   code: 'LEDGER_N401',
 *   context: { itemId: 'EV-1' },
 * });
 *
 * try {
 *   await ledger.submitTransaction(tx);
 * } catch (error) {
 *   if (LedgerError.isCategory(error, 'storage')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class LedgerError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: LedgerErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'LedgerError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LedgerError);
    }
  }

  /**
   * Create a LedgerError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): LedgerError {
    return new LedgerError({ code, context });
  }

  /**
   * Wrap an existing error with a LedgerError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): LedgerError {
    return new LedgerError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a LedgerError
   */
  static isLedgerError(error: unknown): error is LedgerError {
    return error instanceof LedgerError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return LedgerError.isLedgerError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return LedgerError.isLedgerError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedLedgerError {
    const result: SerializedLedgerError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (LedgerError.isLedgerError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Field validation error detail
 */
export interface FieldValidationError {
  /** Field path (e.g., 'transaction.item_id') */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Validation-specific error with field-level details
 */
export class ValidationError extends LedgerError {
  /** Field-level validation errors */
  readonly errors: FieldValidationError[];

  constructor(
    errors: FieldValidationError[],
    code: ErrorCode = 'LEDGER_V100',
    context?: Record<string, unknown>,
  ) {
    const message = errors.map((e) => `${e.path || '(root)'}: ${e.message}`).join('; ');

    super({
      code,
      message: `Validation failed: ${message}`,
      context: {
        ...context,
        fieldErrors: errors,
      },
    });

    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * Storage error
 */
export class StorageError extends LedgerError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * Connection error raised by peer transports
 */
export class ConnectionError extends LedgerError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'ConnectionError';
  }
}

/**
 * Not-found error
 */
export class NotFoundError extends LedgerError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super({ code, message, context });
    this.name = 'NotFoundError';
  }
}

/**
 * Helper function to ensure errors are LedgerErrors
 */
export function ensureLedgerError(
  error: unknown,
  defaultCode: ErrorCode = 'LEDGER_X900',
): LedgerError {
  if (LedgerError.isLedgerError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return LedgerError.wrap(error, defaultCode);
  }

  return new LedgerError({
    code: defaultCode,
    message: String(error),
  });
}
