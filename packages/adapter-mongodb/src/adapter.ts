/**
 * MongoDB adapter.
 *
 * Documents travel as BSON. The client's command-monitoring events are
 * correlated by request id, and because every command carries its benchmark
 * operation id as the command comment, the server execution time of each
 * operation can be joined back into its breakdown. Projected reads walk the
 * raw reply with a sequential field scan.
 *
 * @module adapter
 */

import {
  type AggregateOperation,
  BaseAdapter,
  type BaseAdapterOptions,
  BreakdownRecorder,
  capabilitySet,
  connectionConfigSchema,
  type ConnectionConfig,
  type ConnectionConfigSchema,
  ConnectionError,
  countFields,
  type DeleteOperation,
  getAtPath,
  getIntOption,
  getStringOption,
  hasProjection,
  type InsertOperation,
  type InstrumentedConnection,
  intOptionIssue,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  MetricsCollector,
  OperationError,
  type OperationResult,
  parsePath,
  parseTestEnvironmentConfig,
  type ReadOperation,
  type ReadPreference,
  successResult,
  type TestEnvironmentConfig,
  toError,
  TraversalTimer,
  type UpdateOperation,
} from '@latency-lab/core';
import { z } from 'zod';
import { decodeDocument, encodedSize, encodeDocument, toJsonObject } from './bson.js';
import { scanProjection } from './bson-scanner.js';
import { MongoConnection } from './connection.js';
import { createMongoDriver, isAuthenticationError, isDuplicateKeyError } from './driver.js';
import type { MongoDriverFactory, MongoDriverSettings } from './types.js';

export const MONGODB_ADAPTER_ID = 'mongodb';

/** Platform-specific breakdown entry for building the command document */
export const QUERY_BUILD_METRIC = 'mongodb.query_build_time';

const DEFAULT_ENVIRONMENT = parseTestEnvironmentConfig();

const READ_PREFERENCES: readonly ReadPreference[] = [
  'primary',
  'primaryPreferred',
  'secondary',
  'secondaryPreferred',
  'nearest',
];

function isReadPreference(value: string): value is ReadPreference {
  return READ_PREFERENCES.some((preference) => preference === value);
}

/**
 * `majority`, or a number of acknowledging members written as `1` or `w1`
 */
export function parseWriteConcern(value: string): number | 'majority' | undefined {
  if (value === 'majority') return 'majority';
  const match = /^w?(\d+)$/.exec(value);
  return match ? Number(match[1]) : undefined;
}

export const mongoConfigSchema: ConnectionConfigSchema = connectionConfigSchema.superRefine((config, ctx) => {
  const issue = (path: (string | number)[], message: string) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, path, message });

  if (config.uri === undefined) {
    issue(['uri'], 'is required');
  } else if (!/^mongodb(\+srv)?:\/\//.test(config.uri)) {
    issue(['uri'], 'must start with mongodb:// or mongodb+srv://');
  }

  for (const name of ['maxPoolSize', 'minPoolSize', 'connectTimeoutMs']) {
    const optionIssue = intOptionIssue(config.options, name);
    if (optionIssue) issue(['options', name], optionIssue.message);
  }

  const maxPoolSize = Number(config.options.maxPoolSize ?? 100);
  const minPoolSize = Number(config.options.minPoolSize ?? 0);
  if (maxPoolSize > 0 && minPoolSize > maxPoolSize) {
    issue(['options', 'minPoolSize'], 'must not exceed maxPoolSize');
  }

  const readPreference = config.options.readPreference;
  if (readPreference !== undefined && !isReadPreference(String(readPreference))) {
    issue(['options', 'readPreference'], `must be one of ${READ_PREFERENCES.join(', ')}`);
  }

  const writeConcern = config.options.writeConcern;
  if (writeConcern !== undefined && parseWriteConcern(String(writeConcern)) === undefined) {
    issue(['options', 'writeConcern'], 'must be majority or a member count such as w1');
  }
});

function driverSettings(config: ConnectionConfig): MongoDriverSettings {
  const readPreference = getStringOption(config, 'readPreference', 'primary');
  return {
    uri: config.uri ?? '',
    database: config.database,
    ...(config.username !== undefined ? { username: config.username } : {}),
    ...(config.password !== undefined ? { password: config.password } : {}),
    maxPoolSize: getIntOption(config, 'maxPoolSize', 100),
    minPoolSize: getIntOption(config, 'minPoolSize', 0),
    connectTimeoutMs: getIntOption(config, 'connectTimeoutMs', 10_000),
    readPreference: isReadPreference(readPreference) ? readPreference : 'primary',
    writeConcern: parseWriteConcern(getStringOption(config, 'writeConcern', 'majority')) ?? 'majority',
  };
}

/**
 * Top-level fields to project for a set of paths. Array indexes cannot be
 * projected, so a path is cut at its first index; paths under an already
 * projected field are dropped because MongoDB rejects the collision.
 */
export function projectionFor(paths: readonly string[]): Record<string, 1> {
  const keys = paths
    .map((path) => {
      const segments = parsePath(path);
      const firstIndex = segments.findIndex((segment) => typeof segment === 'number');
      return (firstIndex < 0 ? segments : segments.slice(0, firstIndex)).join('.');
    })
    .filter((key) => key !== '')
    .sort((a, b) => a.length - b.length);

  const projection: Record<string, 1> = {};
  const kept: string[] = [];
  for (const key of keys) {
    if (kept.some((k) => key === k || key.startsWith(`${k}.`))) continue;
    kept.push(key);
    projection[key] = 1;
  }
  return projection;
}

function parseStages(op: AggregateOperation): JsonObject[] {
  return op.pipelineStages.map((text, index) => {
    const invalid = (message: string, cause?: Error) =>
      new OperationError(op.id, op.type, message, {
        code: 'BENCH_O303',
        ...(cause ? { cause } : {}),
        context: { stage: index },
      });

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw invalid(`Stage ${index} is not valid JSON`, toError(error));
    }
    if (!isJsonObject(value)) throw invalid(`Stage ${index} must be an object`);
    const operators = Object.keys(value).length;
    if (operators !== 1) throw invalid(`Stage ${index} must have exactly one operator, got ${operators}`);
    return value;
  });
}

interface RoundTrip<T> {
  bytesSent: number;
  call: () => Promise<T>;
  bytesReceived: (reply: T) => number;
}

export interface MongoAdapterOptions extends BaseAdapterOptions {
  /** Defaults to a driver over the `mongodb` client */
  driverFactory?: MongoDriverFactory;
}

/**
 * @example
 * ```typescript
 * const adapter = new MongoAdapter();
 * const conn = await adapter.connect({
 *   uri: 'mongodb://localhost:27017',
 *   database: 'bench',
 *   options: { maxPoolSize: 20, writeConcern: 'w1' },
 * });
 * ```
 */
export class MongoAdapter extends BaseAdapter<MongoConnection> {
  readonly id = MONGODB_ADAPTER_ID;
  readonly displayName = 'MongoDB';
  readonly version = '1.0.0';
  readonly capabilities = capabilitySet(
    'nested-document-access',
    'array-index-access',
    'partial-document-retrieval',
    'wildcard-path-access',
    'bulk-insert',
    'bulk-update',
    'bulk-read',
    'sharding',
    'replication',
    'secondary-indexes',
    'compound-indexes',
    'json-path-indexes',
    'single-document-atomicity',
    'multi-document-transactions',
    'server-execution-time',
    'explain-plan',
    'profiling',
    'client-timing-hooks',
    'deserialization-metrics'
  );

  private readonly driverFactory: MongoDriverFactory;
  private readonly opened = new WeakSet<MongoConnection>();
  private readonly traversalTimers = new WeakMap<MetricsCollector, TraversalTimer>();

  constructor(options: MongoAdapterOptions = {}) {
    super(options);
    this.driverFactory = options.driverFactory ?? createMongoDriver;
  }

  getConfigurationOptions(): Readonly<Record<string, string>> {
    return {
      maxPoolSize: 'Maximum connections in the client pool (default 100)',
      minPoolSize: 'Connections kept open when idle (default 0)',
      connectTimeoutMs: 'Connection timeout in milliseconds (default 10000)',
      readPreference: `Default read preference: ${READ_PREFERENCES.join(', ')} (default primary)`,
      writeConcern: 'Write concern: majority or a member count such as w1 (default majority)',
    };
  }

  protected configSchema(): ConnectionConfigSchema {
    return mongoConfigSchema;
  }

  protected async openConnection(config: ConnectionConfig, connectionId: string): Promise<MongoConnection> {
    const driver = this.driverFactory(driverSettings(config));
    try {
      await driver.ping();
    } catch (error) {
      await driver.close().catch((closeError: unknown) => {
        this.logger.debug('Client close after failed connect threw', { error: toError(closeError).message });
      });
      if (isAuthenticationError(error)) {
        throw new ConnectionError(this.id, `Authentication failed for database ${config.database}`, {
          code: 'BENCH_C201',
          cause: toError(error),
          context: { database: config.database },
        });
      }
      throw error;
    }

    const connection = new MongoConnection({
      id: connectionId,
      collector: new MetricsCollector({ logger: this.logger }),
      timeSource: this.timeSource,
      logger: this.logger,
      driver,
      database: config.database,
    });
    this.opened.add(connection);
    return connection;
  }

  protected isOwnConnection(connection: InstrumentedConnection): connection is MongoConnection {
    return connection instanceof MongoConnection && this.opened.has(connection);
  }

  // ── Operations ───────────────────────────────────────────────────────

  protected async doInsert(conn: MongoConnection, op: InsertOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionName();

    const { value: encoded, nanos } = conn.timeSerialization(
      op.id,
      () => encodeDocument(op.document),
      (bytes) => bytes.length
    );
    recorder.add('serializationTime', nanos);

    try {
      await this.roundTrip(conn, op.id, recorder, {
        bytesSent: encoded.length,
        call: () => conn.driver.insertOne(collection, op.document, { comment: op.id }),
        bytesReceived: () => 0,
      });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new OperationError(op.id, op.type, `Duplicate document id: ${op.document._id}`, {
          code: 'BENCH_O302',
          cause: toError(error),
          context: { documentId: op.document._id },
        });
      }
      throw error;
    }

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      breakdown,
      metadata: { insertedId: op.document._id, bytes: encoded.length },
    });
  }

  protected async doRead(conn: MongoConnection, op: ReadOperation, collector: MetricsCollector): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionName();

    const { options, bytesSent } = this.buildQuery(recorder, () => {
      const projection = hasProjection(op) ? projectionFor(op.projectionPaths) : undefined;
      return {
        options: {
          comment: op.id,
          readPreference: op.readPreference,
          ...(projection ? { projection } : {}),
        },
        bytesSent: encodedSize({
          find: collection,
          filter: { _id: op.documentId },
          ...(projection ? { projection } : {}),
        }),
      };
    });

    const raw = await this.roundTrip(conn, op.id, recorder, {
      bytesSent,
      call: () => conn.driver.findRawById(collection, op.documentId, options),
      bytesReceived: (reply) => reply?.length ?? 0,
    });
    if (raw === null) {
      throw new OperationError(op.id, op.type, `Document not found: ${op.documentId}`, {
        code: 'BENCH_O301',
        context: { documentId: op.documentId },
      });
    }

    const { value: doc, nanos } = conn.timeDeserialization(op.id, () => decodeDocument(raw), countFields);
    recorder.add('deserializationTime', nanos);

    if (!hasProjection(op)) {
      const { totalLatency, breakdown } = recorder.finish();
      return successResult(op.id, op.type, totalLatency, { data: doc, breakdown, metadata: { bytes: raw.length } });
    }

    const timer = this.traversalTimer(collector);
    const { data, positions } = recorder.measure('clientTraversalTime', () => {
      const scanned = scanProjection(timer, op.id, raw, op.projectionPaths);
      const projected: JsonObject = { _id: doc._id ?? op.documentId };
      for (const path of op.projectionPaths) {
        const value = getAtPath(doc, path);
        if (value !== undefined) projected[path] = value;
      }
      return { data: projected, positions: scanned };
    });

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      data,
      breakdown,
      metadata: { bytes: raw.length, fieldPositions: Object.fromEntries(positions) },
    });
  }

  protected async doUpdate(conn: MongoConnection, op: UpdateOperation): Promise<OperationResult> {
    const segments = parsePath(op.path);
    if (segments[0] === '_id') {
      throw new OperationError(op.id, op.type, 'The _id field cannot be updated', { context: { path: op.path } });
    }

    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionName();
    const set = this.buildQuery(recorder, (): JsonObject => ({ [segments.join('.')]: op.newValue }));

    const { value: encoded, nanos } = conn.timeSerialization(
      op.id,
      () => encodeDocument({ update: collection, q: { _id: op.documentId }, u: { $set: set } }),
      (bytes) => bytes.length
    );
    recorder.add('serializationTime', nanos);

    const result = await this.roundTrip(conn, op.id, recorder, {
      bytesSent: encoded.length,
      call: () => conn.driver.updateOne(collection, op.documentId, set, { upsert: op.upsert, comment: op.id }),
      bytesReceived: () => 0,
    });

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      breakdown,
      metadata: {
        matchedCount: result.matchedCount,
        modifiedCount: result.modifiedCount,
        upserted: result.upsertedCount > 0,
      },
    });
  }

  protected async doDelete(conn: MongoConnection, op: DeleteOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionName();

    const deletedCount = await this.roundTrip(conn, op.id, recorder, {
      bytesSent: encodedSize({ delete: collection, q: { _id: op.documentId } }),
      call: () => conn.driver.deleteOne(collection, op.documentId, { comment: op.id }),
      bytesReceived: () => 0,
    });

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, { breakdown, metadata: { deletedCount } });
  }

  protected async doAggregate(conn: MongoConnection, op: AggregateOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionName();
    const stages = this.buildQuery(recorder, () => parseStages(op));
    const bytesSent = encodedSize({ aggregate: collection, pipeline: stages });

    if (op.explain) {
      const plan = await this.roundTrip(conn, op.id, recorder, {
        bytesSent,
        call: () => conn.driver.explainAggregate(collection, stages, { comment: op.id }),
        bytesReceived: () => 0,
      });
      const { value: data, nanos } = conn.timeDeserialization(op.id, () => toJsonObject(plan), countFields);
      recorder.add('deserializationTime', nanos);

      const { totalLatency, breakdown } = recorder.finish();
      return successResult(op.id, op.type, totalLatency, { data, breakdown, metadata: { explain: true } });
    }

    const replies = await this.roundTrip(conn, op.id, recorder, {
      bytesSent,
      call: () => conn.driver.aggregateRaw(collection, stages, { comment: op.id }),
      bytesReceived: (docs) => docs.reduce((sum, doc) => sum + doc.length, 0),
    });
    const { value: data, nanos } = conn.timeDeserialization(
      op.id,
      (): JsonValue => replies.map(decodeDocument),
      countFields
    );
    recorder.add('deserializationTime', nanos);

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      data,
      breakdown,
      metadata: { returned: replies.length, bytes: replies.reduce((sum, doc) => sum + doc.length, 0) },
    });
  }

  protected override async doExplain(
    conn: MongoConnection,
    operation: ReadOperation | AggregateOperation
  ): Promise<JsonObject> {
    const collection = this.collectionName();
    if (operation.type === 'read') {
      return toJsonObject(await conn.driver.explainFind(collection, operation.documentId));
    }
    return toJsonObject(await conn.driver.explainAggregate(collection, parseStages(operation)));
  }

  // ── Test environment ─────────────────────────────────────────────────

  protected async provision(conn: MongoConnection, config: TestEnvironmentConfig): Promise<void> {
    if (config.dropExisting) {
      await conn.driver.dropCollection(config.collectionName);
    }
    for (const index of config.indexes) {
      const keys = Object.fromEntries(index.fields.map((field) => [field, 1] as const));
      const name = await conn.driver.createIndex(config.collectionName, keys, index.name);
      this.logger.debug('Index created', { collection: config.collectionName, index: name });
    }
  }

  protected async deprovision(conn: MongoConnection, config: TestEnvironmentConfig): Promise<void> {
    await conn.driver.dropCollection(config.collectionName);
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  private collectionName(): string {
    return (this.testEnvironment ?? DEFAULT_ENVIRONMENT).collectionName;
  }

  private buildQuery<T>(recorder: BreakdownRecorder, build: () => T): T {
    const start = this.timeSource.nanoTime();
    try {
      return build();
    } finally {
      recorder.addPlatformSpecific(QUERY_BUILD_METRIC, this.timeSource.nanoTime() - start);
    }
  }

  /**
   * Run one driver call and split its round trip into server execution, as
   * reported by the correlated command events, and wire time for the rest.
   * The two wire legs cannot be told apart, so the remainder is halved.
   */
  private async roundTrip<T>(
    conn: MongoConnection,
    operationId: string,
    recorder: BreakdownRecorder,
    { bytesSent, call, bytesReceived }: RoundTrip<T>
  ): Promise<T> {
    const start = this.timeSource.nanoTime();
    let reply: T;
    try {
      reply = await call();
    } catch (error) {
      conn.takeServerTiming(operationId);
      throw error;
    }
    const elapsed = this.timeSource.nanoTime() - start;

    const serverNanos = conn.takeServerTiming(operationId)?.serverExecutionNanos ?? 0;
    const wireNanos = Math.max(0, elapsed - serverNanos);
    const transmitNanos = Math.floor(wireNanos / 2);
    const receiveNanos = wireNanos - transmitNanos;

    recorder
      .add('serverExecutionTime', serverNanos)
      .add('wireTransmitTime', transmitNanos)
      .add('wireReceiveTime', receiveNanos);
    conn.recordWireTransmit(operationId, transmitNanos, bytesSent);
    conn.recordWireReceive(operationId, receiveNanos, bytesReceived(reply));
    return reply;
  }

  private traversalTimer(collector: MetricsCollector): TraversalTimer {
    let timer = this.traversalTimers.get(collector);
    if (!timer) {
      timer = new TraversalTimer({ namespace: 'bson', collector, timeSource: this.timeSource });
      this.traversalTimers.set(collector, timer);
    }
    return timer;
  }
}
