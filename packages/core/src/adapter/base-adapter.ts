/**
 * Base class for database adapters.
 *
 * Owns the parts every backend shares: configuration validation, connection
 * bookkeeping, the exhaustive dispatch over operation types, failure capture,
 * bulk execution and test-environment lifecycle. Backends implement the
 * `do*` hooks and throw on failure; this class turns those throws into failed
 * results.
 *
 * @module adapter/base-adapter
 */

import type { z } from 'zod';
import {
  BenchError,
  CapabilityNotSupportedError,
  ConnectionError,
  OperationError,
  SetupError,
  toError,
} from '../errors/bench-error.js';
import type { MetricsCollector } from '../metrics/metrics-collector.js';
import { OverheadBreakdown } from '../metrics/overhead-breakdown.js';
import { type BenchLogger, silentLogger } from '../observability/logger.js';
import { Stopwatch, systemTime, type TimeSource } from '../time/time-source.js';
import type { Capability, CapabilitySet } from '../types/capability.js';
import {
  type ConnectionConfig,
  type ConnectionConfigInput,
  parseTestEnvironmentConfig,
  requireValid,
  type TestEnvironmentConfig,
  type TestEnvironmentConfigInput,
  validateWith,
  type ValidationResult,
} from '../types/config.js';
import type { JsonObject } from '../types/document.js';
import {
  type AggregateOperation,
  assertNever,
  type DeleteOperation,
  type InsertOperation,
  type Operation,
  type ReadOperation,
  type UpdateOperation,
} from '../types/operation.js';
import { bulkResult, failureResult, type BulkResult, type OperationResult } from '../types/result.js';
import type { DatabaseAdapter, InstrumentedConnection } from './adapter.js';
import type { BaseInstrumentedConnection } from './base-connection.js';

export interface BaseAdapterOptions {
  timeSource?: TimeSource;
  logger?: BenchLogger;
}

/**
 * Schema an adapter validates connection parameters with
 */
export type ConnectionConfigSchema = z.ZodType<ConnectionConfig, z.ZodTypeDef, ConnectionConfigInput>;

export abstract class BaseAdapter<C extends BaseInstrumentedConnection> implements DatabaseAdapter {
  abstract readonly id: string;
  abstract readonly displayName: string;
  abstract readonly version: string;
  abstract readonly capabilities: CapabilitySet;

  protected readonly timeSource: TimeSource;
  protected readonly logger: BenchLogger;

  /** Connections opened by this adapter and not yet closed */
  private readonly connections = new Set<C>();
  private current: C | null = null;
  private environment: TestEnvironmentConfig | null = null;
  private connectionSeq = 0;

  constructor(options: BaseAdapterOptions = {}) {
    this.timeSource = options.timeSource ?? systemTime();
    this.logger = options.logger ?? silentLogger;
  }

  // ── Capabilities ─────────────────────────────────────────────────────

  hasCapability(capability: Capability): boolean {
    return this.capabilities.has(capability);
  }

  hasAllCapabilities(capabilities: Iterable<Capability>): boolean {
    for (const capability of capabilities) {
      if (!this.capabilities.has(capability)) return false;
    }
    return true;
  }

  /**
   * @throws CapabilityNotSupportedError when the capability is missing
   */
  requireCapability(capability: Capability): void {
    if (!this.hasCapability(capability)) {
      throw new CapabilityNotSupportedError(capability, this.id);
    }
  }

  // ── Configuration ────────────────────────────────────────────────────

  validateConfig(input: unknown): ValidationResult<ConnectionConfig> {
    return validateWith(this.configSchema(), input);
  }

  abstract getConfigurationOptions(): Readonly<Record<string, string>>;

  /** Base schema refined with this backend's rules */
  protected abstract configSchema(): ConnectionConfigSchema;

  // ── Connections ──────────────────────────────────────────────────────

  async connect(input: ConnectionConfigInput): Promise<C> {
    const config = requireValid(this.validateConfig(input), { adapterId: this.id });
    const end = this.logger.time('connect');

    let connection: C;
    try {
      connection = await this.openConnection(config, `${this.id}-${++this.connectionSeq}`);
    } catch (error) {
      if (BenchError.isBenchError(error)) throw error;
      const cause = toError(error);
      throw new ConnectionError(this.id, `Failed to connect to ${this.displayName}: ${cause.message}`, {
        cause,
        context: { database: config.database },
      });
    }

    this.connections.add(connection);
    this.current = connection;
    end({ connectionId: connection.id, database: config.database });
    return connection;
  }

  /**
   * Open and verify a backend session. Throwing a {@link BenchError} passes it
   * through unchanged; anything else becomes a {@link ConnectionError}.
   */
  protected abstract openConnection(config: ConnectionConfig, connectionId: string): Promise<C>;

  /** Narrow a connection to this adapter's concrete type */
  protected abstract isOwnConnection(connection: InstrumentedConnection): connection is C;

  /**
   * @throws ConnectionError when the connection is closed or belongs to
   * another adapter
   */
  protected requireConnection(connection: InstrumentedConnection): C {
    if (!this.isOwnConnection(connection)) {
      throw new ConnectionError(this.id, `Connection ${connection.id} was not opened by ${this.id}`);
    }
    if (!connection.isValid()) {
      throw new ConnectionError(this.id, `Connection ${connection.id} is closed`, { code: 'BENCH_C202' });
    }
    return connection;
  }

  // ── Execution ────────────────────────────────────────────────────────

  async execute(
    connection: InstrumentedConnection,
    operation: Operation,
    collector: MetricsCollector
  ): Promise<OperationResult> {
    const stopwatch = new Stopwatch(this.timeSource);
    let result: OperationResult;

    try {
      const conn = this.requireConnection(connection);
      result = await this.dispatch(conn, operation, collector);
      conn.recordOperation();
    } catch (error) {
      result = failureResult(operation.id, operation.type, stopwatch.stop(), this.toOperationError(operation, error));
      this.logger.debug('Operation failed', {
        operationId: operation.id,
        operationType: operation.type,
        code: result.error.code,
      });
    }

    collector.recordTiming(`${this.id}.${operation.type}.latency`, result.totalDuration);
    collector.addCounter(`${this.id}.${operation.type}.${result.success ? 'succeeded' : 'failed'}`);
    if (result.success && result.breakdown) {
      collector.recordOverheadBreakdown(result.breakdown);
    }
    return result;
  }

  /**
   * Run operations one after another on the same connection
   */
  async executeBulk(
    connection: InstrumentedConnection,
    operations: readonly Operation[],
    collector: MetricsCollector
  ): Promise<BulkResult> {
    const stopwatch = new Stopwatch(this.timeSource);
    const results: OperationResult[] = [];
    for (const operation of operations) {
      results.push(await this.execute(connection, operation, collector));
    }
    const bulk = bulkResult(results, stopwatch.stop());
    this.logger.debug('Bulk executed', {
      operations: operations.length,
      succeeded: bulk.successCount,
      failed: bulk.failureCount,
    });
    return bulk;
  }

  getOverheadBreakdown(result: OperationResult): OverheadBreakdown {
    if (result.success && result.breakdown) return result.breakdown;
    return OverheadBreakdown.totalOnly(result.totalDuration);
  }

  async explain(connection: InstrumentedConnection, operation: ReadOperation | AggregateOperation): Promise<JsonObject> {
    this.requireCapability('explain-plan');
    return this.doExplain(this.requireConnection(connection), operation);
  }

  protected abstract doInsert(conn: C, op: InsertOperation, collector: MetricsCollector): Promise<OperationResult>;
  protected abstract doRead(conn: C, op: ReadOperation, collector: MetricsCollector): Promise<OperationResult>;
  protected abstract doUpdate(conn: C, op: UpdateOperation, collector: MetricsCollector): Promise<OperationResult>;
  protected abstract doDelete(conn: C, op: DeleteOperation, collector: MetricsCollector): Promise<OperationResult>;
  protected abstract doAggregate(conn: C, op: AggregateOperation, collector: MetricsCollector): Promise<OperationResult>;

  /**
   * Backend query plan. Only reached when the adapter declares `explain-plan`.
   */
  protected doExplain(_conn: C, _operation: ReadOperation | AggregateOperation): Promise<JsonObject> {
    return Promise.reject(new CapabilityNotSupportedError('explain-plan', this.id));
  }

  private dispatch(conn: C, operation: Operation, collector: MetricsCollector): Promise<OperationResult> {
    switch (operation.type) {
      case 'insert':
        return this.doInsert(conn, operation, collector);
      case 'read':
        return this.doRead(conn, operation, collector);
      case 'update':
        return this.doUpdate(conn, operation, collector);
      case 'delete':
        return this.doDelete(conn, operation, collector);
      case 'aggregate':
        if (operation.explain) this.requireCapability('explain-plan');
        return this.doAggregate(conn, operation, collector);
      default:
        return assertNever(operation);
    }
  }

  private toOperationError(operation: Operation, error: unknown): BenchError {
    if (BenchError.isBenchError(error)) return error;
    const cause = toError(error);
    return new OperationError(operation.id, operation.type, cause.message, { cause });
  }

  // ── Test environment ─────────────────────────────────────────────────

  async setupTestEnvironment(input: TestEnvironmentConfigInput = {}): Promise<void> {
    const config = parseTestEnvironmentConfig(input);
    const conn = this.currentConnection();
    if (!conn) {
      throw new SetupError(`${this.displayName} is not connected`, { code: 'BENCH_S501' });
    }

    const end = this.logger.time('setup');
    try {
      await this.provision(conn, config);
    } catch (error) {
      if (BenchError.isBenchError(error)) throw error;
      const cause = toError(error);
      throw new SetupError(`Failed to set up ${config.collectionName}: ${cause.message}`, { cause });
    }
    this.environment = config;
    end({ collection: config.collectionName, indexes: config.indexes.length });
  }

  async teardownTestEnvironment(): Promise<void> {
    const environment = this.environment;
    if (!environment) return;

    const conn = this.currentConnection();
    this.environment = null;
    if (!conn) return;

    try {
      await this.deprovision(conn, environment);
    } catch (error) {
      const cause = toError(error);
      throw new SetupError(`Failed to tear down ${environment.collectionName}: ${cause.message}`, { cause });
    }
  }

  /** Active test environment, if set up */
  protected get testEnvironment(): TestEnvironmentConfig | null {
    return this.environment;
  }

  protected abstract provision(conn: C, config: TestEnvironmentConfig): Promise<void>;
  protected abstract deprovision(conn: C, config: TestEnvironmentConfig): Promise<void>;

  // ── Lifecycle ────────────────────────────────────────────────────────

  async close(): Promise<void> {
    const open = Array.from(this.connections);
    this.connections.clear();
    this.current = null;
    this.environment = null;
    await Promise.all(open.map((c) => c.close()));
    if (open.length > 0) {
      this.logger.info('Adapter closed', { adapter: this.id, connections: open.length });
    }
  }

  private currentConnection(): C | null {
    if (this.current && this.current.isValid()) return this.current;
    for (const conn of this.connections) {
      if (!conn.isValid()) this.connections.delete(conn);
    }
    this.current = Array.from(this.connections).at(-1) ?? null;
    return this.current;
  }
}
