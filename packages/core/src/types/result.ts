import type { BenchError } from '../errors/bench-error.js';
import type { OverheadBreakdown } from '../metrics/overhead-breakdown.js';
import { NANOS_PER_SECOND } from '../time/time-source.js';
import type { JsonValue } from './document.js';
import type { OperationType } from './operation.js';

interface OperationResultBase {
  readonly operationId: string;
  readonly operationType: OperationType;
  /** Wall time of the whole operation, in nanoseconds */
  readonly totalDuration: number;
  /** Free-form adapter annotations (matched count, rows affected, …) */
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface SuccessfulOperationResult extends OperationResultBase {
  readonly success: true;
  /** Returned document(s), if the operation produces any */
  readonly data?: JsonValue;
  readonly breakdown?: OverheadBreakdown;
}

export interface FailedOperationResult extends OperationResultBase {
  readonly success: false;
  readonly error: BenchError;
}

/**
 * Outcome of executing one operation. Failures are data, not exceptions.
 */
export type OperationResult = SuccessfulOperationResult | FailedOperationResult;

export function successResult(
  operationId: string,
  operationType: OperationType,
  totalDuration: number,
  extras: { data?: JsonValue; breakdown?: OverheadBreakdown; metadata?: Record<string, unknown> } = {}
): SuccessfulOperationResult {
  return Object.freeze({
    success: true,
    operationId,
    operationType,
    totalDuration,
    ...(extras.data !== undefined ? { data: extras.data } : {}),
    ...(extras.breakdown ? { breakdown: extras.breakdown } : {}),
    metadata: Object.freeze({ ...extras.metadata }),
  });
}

export function failureResult(
  operationId: string,
  operationType: OperationType,
  totalDuration: number,
  error: BenchError,
  metadata: Record<string, unknown> = {}
): FailedOperationResult {
  return Object.freeze({
    success: false,
    operationId,
    operationType,
    totalDuration,
    error,
    metadata: Object.freeze({ ...metadata }),
  });
}

/**
 * Outcome of a batch. Per-item failures are counted, never thrown.
 */
export interface BulkResult {
  readonly results: readonly OperationResult[];
  readonly successCount: number;
  readonly failureCount: number;
  /** Nanoseconds from the first submission to the last completion */
  readonly totalDuration: number;
  /** Operations per second over `totalDuration`; 0 for an instantaneous batch */
  readonly throughput: number;
}

export function bulkResult(results: readonly OperationResult[], totalDuration: number): BulkResult {
  const successCount = results.filter((r) => r.success).length;
  return Object.freeze({
    results: Object.freeze([...results]),
    successCount,
    failureCount: results.length - successCount,
    totalDuration,
    throughput: totalDuration > 0 ? (results.length * NANOS_PER_SECOND) / totalDuration : 0,
  });
}
