/**
 * Benchmark Error System
 *
 * Structured errors with unique codes, suggestions, categories and cause chaining.
 * Configuration and connection failures are thrown; per-operation failures are
 * captured as {@link OperationError} inside a failed result.
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  BenchError,
  BreakdownValidationError,
  CapabilityNotSupportedError,
  ConfigurationError,
  ConnectionError,
  InvalidOperationError,
  OperationError,
  SetupError,
  ensureBenchError,
  toError,
  type BenchErrorOptions,
  type FieldIssue,
  type SerializedBenchError,
} from './bench-error.js';
