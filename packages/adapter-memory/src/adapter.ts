/**
 * In-process reference adapter.
 *
 * Documents live as JSON text in hash maps, so every operation pays a real
 * encode and decode while the "server" side costs only map lookups. Runs
 * without any backend and supports every operation and most capabilities,
 * which makes it the adapter for dry runs and harness tests.
 *
 * @module adapter
 */

import {
  BaseAdapter,
  type BaseAdapterOptions,
  BreakdownRecorder,
  capabilitySet,
  connectionConfigSchema,
  type ConnectionConfig,
  type ConnectionConfigSchema,
  countFields,
  getIntOption,
  hasProjection,
  type InstrumentedConnection,
  intOptionIssue,
  isJsonDocument,
  isJsonObject,
  type AggregateOperation,
  type DeleteOperation,
  type InsertOperation,
  type JsonDocument,
  type JsonObject,
  type JsonValue,
  MetricsCollector,
  OperationError,
  type OperationResult,
  parsePath,
  parseTestEnvironmentConfig,
  type ReadOperation,
  setAtPath,
  successResult,
  type TestEnvironmentConfig,
  TraversalTimer,
  type UpdateOperation,
} from '@latency-lab/core';
import { z } from 'zod';
import { MemoryConnection } from './connection.js';
import { applyStage, type AccessPlan, parsePipeline, type PipelineStage, planAccess } from './pipeline.js';
import { projectDocument } from './projection.js';
import { type MemoryCollection, MemoryDatabase } from './store.js';

export const MEMORY_ADAPTER_ID = 'memory';

const DEFAULT_ENVIRONMENT = parseTestEnvironmentConfig();

export const memoryConfigSchema: ConnectionConfigSchema = connectionConfigSchema.superRefine((config, ctx) => {
  if (config.uri !== undefined && !config.uri.startsWith('memory://')) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['uri'], message: 'must use the memory:// scheme' });
  }
  const issue = intOptionIssue(config.options, 'maxDocuments');
  if (issue) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['options', 'maxDocuments'], message: issue.message });
  }
});

function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

function decodeObject(encoded: string): JsonObject {
  const value: unknown = JSON.parse(encoded);
  if (!isJsonObject(value)) throw new Error('Stored value is not an object');
  return value;
}

function decodeDocument(encoded: string): JsonDocument {
  const value: unknown = JSON.parse(encoded);
  if (!isJsonDocument(value)) throw new Error('Stored value is not a document with a string _id');
  return value;
}

function decodeObjects(encoded: string): JsonObject[] {
  const value: unknown = JSON.parse(encoded);
  if (!Array.isArray(value)) throw new Error('Reply is not an array');
  return value.map((item: unknown) => {
    if (!isJsonObject(item)) throw new Error('Reply item is not an object');
    return item;
  });
}

function describePlan(collection: MemoryCollection, stages: readonly PipelineStage[], plan: AccessPlan): JsonObject {
  return {
    collection: collection.name,
    stage: plan.stage,
    ...(plan.indexName !== undefined ? { indexName: plan.indexName } : {}),
    candidates: plan.ids.length,
    pipeline: stages.map((stage) => stage.kind),
  };
}

export type MemoryAdapterOptions = BaseAdapterOptions;

/**
 * Hash-indexed in-memory adapter.
 *
 * Connections to the same database name share data for the adapter's
 * lifetime.
 *
 * @example
 * ```typescript
 * const adapter = new MemoryAdapter();
 * const conn = await adapter.connect({ database: 'bench' });
 * await adapter.setupTestEnvironment({ indexes: [{ fields: ['status'] }] });
 *
 * const collector = new MetricsCollector();
 * await adapter.execute(conn, insertOperation('op-1', { _id: 'doc-1', status: 'new' }), collector);
 * ```
 */
export class MemoryAdapter extends BaseAdapter<MemoryConnection> {
  readonly id = MEMORY_ADAPTER_ID;
  readonly displayName = 'In-memory';
  readonly version = '1.0.0';
  readonly capabilities = capabilitySet(
    'nested-document-access',
    'array-index-access',
    'partial-document-retrieval',
    'bulk-insert',
    'bulk-read',
    'bulk-update',
    'secondary-indexes',
    'compound-indexes',
    'single-document-atomicity',
    'server-execution-time',
    'explain-plan',
    'client-timing-hooks',
    'deserialization-metrics'
  );

  private readonly databases = new Map<string, MemoryDatabase>();
  private readonly traversalTimers = new WeakMap<MetricsCollector, TraversalTimer>();

  constructor(options: MemoryAdapterOptions = {}) {
    super(options);
  }

  getConfigurationOptions(): Readonly<Record<string, string>> {
    return {
      maxDocuments: 'Maximum documents per collection; 0 means no limit (default 0)',
    };
  }

  /**
   * The shared database behind a name, if any connection has opened it
   */
  getDatabase(name: string): MemoryDatabase | undefined {
    return this.databases.get(name);
  }

  protected configSchema(): ConnectionConfigSchema {
    return memoryConfigSchema;
  }

  protected openConnection(config: ConnectionConfig, connectionId: string): Promise<MemoryConnection> {
    let database = this.databases.get(config.database);
    if (!database) {
      database = new MemoryDatabase(config.database);
      this.databases.set(config.database, database);
    }

    return Promise.resolve(
      new MemoryConnection({
        id: connectionId,
        collector: new MetricsCollector({ logger: this.logger }),
        timeSource: this.timeSource,
        logger: this.logger,
        database,
        maxDocuments: getIntOption(config, 'maxDocuments', 0),
      })
    );
  }

  protected isOwnConnection(connection: InstrumentedConnection): connection is MemoryConnection {
    return (
      connection instanceof MemoryConnection && this.databases.get(connection.database.name) === connection.database
    );
  }

  // ── Operations ───────────────────────────────────────────────────────

  protected async doInsert(conn: MemoryConnection, op: InsertOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionFor(conn);

    const { value: encoded, nanos } = conn.timeSerialization(op.id, () => JSON.stringify(op.document), byteLength);
    recorder.add('serializationTime', nanos);
    const bytes = byteLength(encoded);
    conn.recordWireTransmit(op.id, 0, bytes);

    recorder.measure('serverExecutionTime', () => {
      const doc = recorder.measure('serverParseTime', () => decodeDocument(encoded));
      recorder.measure('serverIndexTime', () => {
        if (collection.has(doc._id)) {
          throw new OperationError(op.id, op.type, `Duplicate document id: ${doc._id}`, {
            code: 'BENCH_O302',
            context: { documentId: doc._id },
          });
        }
        this.requireRoom(conn, collection, op);
      });
      recorder.measure('serverFetchTime', () => collection.put(doc._id, encoded, doc));
    });

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      breakdown,
      metadata: { insertedId: op.document._id, bytes },
    });
  }

  protected async doRead(conn: MemoryConnection, op: ReadOperation, collector: MetricsCollector): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionFor(conn);

    const encoded = recorder.measure('serverExecutionTime', () =>
      recorder.measure('serverFetchTime', () => collection.get(op.documentId))
    );
    if (encoded === undefined) {
      throw new OperationError(op.id, op.type, `Document not found: ${op.documentId}`, {
        code: 'BENCH_O301',
        context: { documentId: op.documentId },
      });
    }

    const bytes = byteLength(encoded);
    conn.recordWireReceive(op.id, 0, bytes);
    const { value: doc, nanos } = conn.timeDeserialization(op.id, () => decodeDocument(encoded), countFields);
    recorder.add('deserializationTime', nanos);

    let data: JsonValue = doc;
    if (hasProjection(op)) {
      const timer = this.traversalTimer(collector);
      data = recorder.measure('clientTraversalTime', () => projectDocument(timer, op.id, doc, op.projectionPaths));
    }

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, { data, breakdown, metadata: { bytes } });
  }

  protected async doUpdate(conn: MemoryConnection, op: UpdateOperation): Promise<OperationResult> {
    if (parsePath(op.path)[0] === '_id') {
      throw new OperationError(op.id, op.type, 'The _id field cannot be updated', { context: { path: op.path } });
    }

    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionFor(conn);

    const { value: encoded, nanos } = conn.timeSerialization(
      op.id,
      () => JSON.stringify({ path: op.path, value: op.newValue }),
      byteLength
    );
    recorder.add('serializationTime', nanos);
    conn.recordWireTransmit(op.id, 0, byteLength(encoded));

    const outcome = recorder.measure('serverExecutionTime', () => {
      const command = recorder.measure('serverParseTime', () => decodeObject(encoded));
      const stored = recorder.measure('serverFetchTime', () => collection.get(op.documentId));
      if (stored === undefined && !op.upsert) {
        return { matchedCount: 0, modifiedCount: 0, upserted: false };
      }
      if (stored === undefined) {
        this.requireRoom(conn, collection, op);
      }

      const doc: JsonDocument = stored === undefined ? { _id: op.documentId } : decodeDocument(stored);
      const applied = recorder.measure('serverTraversalTime', () => setAtPath(doc, op.path, command.value));
      if (!applied) {
        throw new OperationError(op.id, op.type, `Cannot set ${op.path} on document ${op.documentId}`, {
          context: { documentId: op.documentId, path: op.path },
        });
      }

      recorder.measure('serverIndexTime', () => collection.put(op.documentId, JSON.stringify(doc), doc));
      return { matchedCount: stored === undefined ? 0 : 1, modifiedCount: 1, upserted: stored === undefined };
    });

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, { breakdown, metadata: outcome });
  }

  protected async doDelete(conn: MemoryConnection, op: DeleteOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionFor(conn);

    const deleted = recorder.measure('serverExecutionTime', () =>
      recorder.measure('serverIndexTime', () => collection.delete(op.documentId))
    );

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      breakdown,
      metadata: { deletedCount: deleted ? 1 : 0 },
    });
  }

  protected async doAggregate(conn: MemoryConnection, op: AggregateOperation): Promise<OperationResult> {
    const recorder = new BreakdownRecorder(this.timeSource);
    const collection = this.collectionFor(conn);

    const { reply, plan } = recorder.measure('serverExecutionTime', () => {
      const stages = recorder.measure('serverParseTime', () => parsePipeline(op.id, op.pipelineStages));
      const access = recorder.measure('serverIndexTime', () => planAccess(collection, stages));
      if (op.explain) {
        return { reply: JSON.stringify(describePlan(collection, stages, access)), plan: access };
      }

      const candidates = recorder.measure('serverFetchTime', () =>
        access.ids.flatMap((id) => {
          const stored = collection.get(id);
          return stored === undefined ? [] : [decodeDocument(stored)];
        })
      );
      const output = recorder.measure('serverTraversalTime', () =>
        stages.reduce<JsonObject[]>((docs, stage) => applyStage(docs, stage), candidates)
      );
      return { reply: JSON.stringify(output), plan: access };
    });

    const bytes = byteLength(reply);
    conn.recordWireReceive(op.id, 0, bytes);
    const { value: data, nanos } = conn.timeDeserialization(
      op.id,
      (): JsonObject | JsonObject[] => (op.explain ? decodeObject(reply) : decodeObjects(reply)),
      countFields
    );
    recorder.add('deserializationTime', nanos);

    const { totalLatency, breakdown } = recorder.finish();
    return successResult(op.id, op.type, totalLatency, {
      data,
      breakdown,
      metadata: {
        plan: plan.stage,
        examined: plan.ids.length,
        ...(Array.isArray(data) ? { returned: data.length } : {}),
        bytes,
      },
    });
  }

  protected override async doExplain(
    conn: MemoryConnection,
    operation: ReadOperation | AggregateOperation
  ): Promise<JsonObject> {
    const collection = this.collectionFor(conn);
    if (operation.type === 'read') {
      return describePlan(collection, [], {
        stage: 'IDHACK',
        ids: collection.has(operation.documentId) ? [operation.documentId] : [],
      });
    }
    const stages = parsePipeline(operation.id, operation.pipelineStages);
    return describePlan(collection, stages, planAccess(collection, stages));
  }

  // ── Test environment ─────────────────────────────────────────────────

  protected async provision(conn: MemoryConnection, config: TestEnvironmentConfig): Promise<void> {
    if (config.dropExisting) {
      conn.database.dropCollection(config.collectionName);
    }
    const collection = conn.database.collection(config.collectionName);
    for (const index of config.indexes) {
      const created = collection.createIndex(index, decodeDocument);
      this.logger.debug('Index created', { collection: collection.name, index: created.name });
    }
  }

  protected async deprovision(conn: MemoryConnection, config: TestEnvironmentConfig): Promise<void> {
    conn.database.dropCollection(config.collectionName);
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  private collectionFor(conn: MemoryConnection): MemoryCollection {
    const environment = this.testEnvironment ?? DEFAULT_ENVIRONMENT;
    return conn.database.collection(environment.collectionName);
  }

  private requireRoom(conn: MemoryConnection, collection: MemoryCollection, op: InsertOperation | UpdateOperation): void {
    if (conn.maxDocuments > 0 && collection.size >= conn.maxDocuments) {
      throw new OperationError(op.id, op.type, `Collection ${collection.name} is full`, {
        context: { maxDocuments: conn.maxDocuments },
      });
    }
  }

  private traversalTimer(collector: MetricsCollector): TraversalTimer {
    let timer = this.traversalTimers.get(collector);
    if (!timer) {
      timer = new TraversalTimer({ namespace: this.id, collector, timeSource: this.timeSource });
      this.traversalTimers.set(collector, timer);
    }
    return timer;
  }
}
