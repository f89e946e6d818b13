/**
 * BenchError - Structured error class for the benchmark harness
 */

import type { Capability } from '../types/capability.js';
import type { OperationType } from '../types/operation.js';
import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a BenchError
 */
export interface BenchErrorOptions {
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
 * Serialized format of a BenchError
 */
export interface SerializedBenchError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedBenchError | { name: string; message: string; stack?: string };
}

/**
 * Base error for everything the harness raises or captures in a result.
 *
 * @example
 * ```typescript
 * try {
 *   await adapter.connect(config);
 * } catch (error) {
 *   if (BenchError.isCategory(error, 'configuration')) {
 *     console.error(error.format());
 *   }
 * }
 * ```
 */
export class BenchError extends Error {
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

  constructor(options: BenchErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'BenchError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static fromCode(code: ErrorCode, context?: Record<string, unknown>): BenchError {
    return new BenchError({ code, context });
  }

  /**
   * Wrap an existing error with a BenchError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): BenchError {
    return new BenchError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isBenchError(error: unknown): error is BenchError {
    return error instanceof BenchError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return BenchError.isBenchError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return BenchError.isBenchError(error) && error.category === category;
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

  toJSON(): SerializedBenchError {
    const result: SerializedBenchError = {
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
      if (BenchError.isBenchError(this.cause)) {
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
 * A single configuration problem
 */
export interface FieldIssue {
  /** Field path (e.g. 'uri' or 'options.maxPoolSize') */
  path: string;
  /** Human-readable message */
  message: string;
}

/**
 * Invalid connection parameters. Carries every problem found, not just the first.
 */
export class ConfigurationError extends BenchError {
  readonly issues: readonly FieldIssue[];

  constructor(issues: FieldIssue[], context?: Record<string, unknown>) {
    const message = issues.map((i) => `${i.path}: ${i.message}`).join('; ');

    super({
      code: 'BENCH_F100',
      message: `Configuration validation failed: ${message}`,
      context: { ...context, issues },
    });

    this.name = 'ConfigurationError';
    this.issues = Object.freeze([...issues]);
  }
}

/**
 * A breakdown dimension was negative, missing or not finite
 */
export class BreakdownValidationError extends BenchError {
  readonly dimension: string;

  constructor(dimension: string, value: unknown) {
    const reason =
      typeof value === 'number' && Number.isFinite(value)
        ? 'must not be negative'
        : 'is missing or not a finite number';

    super({
      code: 'BENCH_F101',
      message: `Duration "${dimension}" ${reason} (got ${String(value)})`,
      context: { dimension, value },
    });

    this.name = 'BreakdownValidationError';
    this.dimension = dimension;
  }
}

/**
 * An operation could not be constructed
 */
export class InvalidOperationError extends BenchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: 'BENCH_F102', message, context });
    this.name = 'InvalidOperationError';
  }
}

/**
 * Unreachable endpoint, rejected credentials or a closed connection
 */
export class ConnectionError extends BenchError {
  readonly adapterId: string;

  constructor(
    adapterId: string,
    message: string,
    options: { code?: ErrorCode; cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    super({
      code: options.code ?? 'BENCH_C200',
      message,
      cause: options.cause,
      context: { ...options.context, adapterId },
    });

    this.name = 'ConnectionError';
    this.adapterId = adapterId;
  }
}

/**
 * A single operation failed. Captured inside its OperationResult.
 */
export class OperationError extends BenchError {
  readonly operationId: string;
  readonly operationType: OperationType;

  constructor(
    operationId: string,
    operationType: OperationType,
    message: string,
    options: { code?: ErrorCode; cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    super({
      code: options.code ?? 'BENCH_O300',
      message,
      cause: options.cause,
      context: { ...options.context, operationId, operationType },
    });

    this.name = 'OperationError';
    this.operationId = operationId;
    this.operationType = operationType;
  }
}

/**
 * Capability-gated behavior was invoked on an adapter that lacks the capability
 */
export class CapabilityNotSupportedError extends BenchError {
  readonly capability: Capability;
  readonly adapterId: string;

  constructor(capability: Capability, adapterId: string) {
    super({
      code: 'BENCH_K400',
      message: `Capability "${capability}" not supported by adapter: ${adapterId}`,
      context: { capability, adapterId },
    });

    this.name = 'CapabilityNotSupportedError';
    this.capability = capability;
    this.adapterId = adapterId;
  }
}

/**
 * Fixture provisioning failed
 */
export class SetupError extends BenchError {
  constructor(message: string, options: { code?: ErrorCode; cause?: Error } = {}) {
    super({ code: options.code ?? 'BENCH_S500', message, cause: options.cause });
    this.name = 'SetupError';
  }
}

/**
 * Helper function to ensure errors are BenchErrors
 */
export function ensureBenchError(error: unknown, defaultCode: ErrorCode = 'BENCH_X900'): BenchError {
  if (BenchError.isBenchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return BenchError.wrap(error, defaultCode);
  }

  return new BenchError({
    code: defaultCode,
    message: String(error),
  });
}

/**
 * Normalize any thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
