import type { MetricsCollector } from '../metrics/metrics-collector.js';
import type { OverheadBreakdown } from '../metrics/overhead-breakdown.js';
import type { Capability, CapabilitySet } from '../types/capability.js';
import type {
  ConnectionConfig,
  ConnectionConfigInput,
  TestEnvironmentConfigInput,
  ValidationResult,
} from '../types/config.js';
import type { JsonObject } from '../types/document.js';
import type { AggregateOperation, Operation, ReadOperation } from '../types/operation.js';
import type { BulkResult, OperationResult } from '../types/result.js';
import type { ConnectionTimingMetrics, TimingListener } from './timing.js';

/**
 * A live, instrumented session against a backend
 */
export interface InstrumentedConnection {
  /** Unique connection identifier */
  readonly id: string;

  /** Collector this connection's own measurements are written to */
  readonly collector: MetricsCollector;

  /**
   * Whether the connection can still execute operations
   */
  isValid(): boolean;

  addTimingListener(listener: TimingListener): void;

  removeTimingListener(listener: TimingListener): void;

  /**
   * Totals accumulated since creation or the last reset
   */
  getTimingMetrics(): ConnectionTimingMetrics;

  /**
   * Zero the totals and drop every sample in {@link collector}
   */
  resetTimingMetrics(): void;

  /**
   * Release the session. Safe to call more than once.
   */
  close(): Promise<void>;
}

/**
 * Database adapter interface (pluggable backend).
 *
 * One adapter instance serves one backend. `execute` resolves with a failed
 * result instead of rejecting when a single operation fails, so a batch or a
 * benchmark run survives individual errors.
 */
export interface DatabaseAdapter {
  /** Stable identifier used as a metric prefix, e.g. `mongodb` */
  readonly id: string;

  /** Human-readable name */
  readonly displayName: string;

  /** Adapter version */
  readonly version: string;

  /** Optional behaviors this instance supports */
  readonly capabilities: CapabilitySet;

  hasCapability(capability: Capability): boolean;

  hasAllCapabilities(capabilities: Iterable<Capability>): boolean;

  /**
   * Check connection parameters without connecting. Reports every problem.
   */
  validateConfig(input: unknown): ValidationResult<ConnectionConfig>;

  /**
   * Adapter-specific `options` keys and their descriptions
   */
  getConfigurationOptions(): Readonly<Record<string, string>>;

  /**
   * Open an instrumented connection.
   *
   * @throws ConfigurationError before any network attempt when the
   * configuration is invalid
   * @throws ConnectionError when the backend is unreachable or rejects the
   * credentials
   */
  connect(config: ConnectionConfigInput): Promise<InstrumentedConnection>;

  execute(
    connection: InstrumentedConnection,
    operation: Operation,
    collector: MetricsCollector
  ): Promise<OperationResult>;

  executeBulk(
    connection: InstrumentedConnection,
    operations: readonly Operation[],
    collector: MetricsCollector
  ): Promise<BulkResult>;

  /**
   * The breakdown captured for a result, or one that carries only its total
   * latency
   */
  getOverheadBreakdown(result: OperationResult): OverheadBreakdown;

  /**
   * Query plan for a read or aggregation.
   *
   * @throws CapabilityNotSupportedError without `explain-plan`
   */
  explain(connection: InstrumentedConnection, operation: ReadOperation | AggregateOperation): Promise<JsonObject>;

  /**
   * Provision the collection or table and indexes on the most recent
   * connection. Repeating it yields the same environment.
   */
  setupTestEnvironment(config?: TestEnvironmentConfigInput): Promise<void>;

  /**
   * Remove what setup created. A no-op when nothing is set up.
   */
  teardownTestEnvironment(): Promise<void>;

  /**
   * Close every connection this adapter opened
   */
  close(): Promise<void>;
}
