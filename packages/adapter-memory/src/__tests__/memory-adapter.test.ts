import {
  aggregateOperation,
  CapabilityNotSupportedError,
  ConfigurationError,
  deleteOperation,
  fullDocumentRead,
  getAtPath,
  insertOperation,
  type JsonDocument,
  MetricsCollector,
  MockTimeSource,
  type OperationResult,
  projectedRead,
  type TimingListener,
  updateOperation,
} from '@latency-lab/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MemoryAdapter } from '../adapter.js';
import type { MemoryConnection } from '../connection.js';

const order: JsonDocument = {
  _id: 'order-1',
  status: 'shipped',
  total: 42,
  customer: { name: 'Ada', address: { city: 'Oslo' } },
  items: [
    { sku: 'A-1', qty: 2 },
    { sku: 'B-2', qty: 1 },
  ],
};

function expectSuccess(result: OperationResult) {
  if (!result.success) {
    throw new Error(`expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result;
}

function expectFailure(result: OperationResult) {
  if (result.success) {
    throw new Error(`expected ${result.operationId} to fail`);
  }
  return result;
}

describe('MemoryAdapter', () => {
  let adapter: MemoryAdapter;
  let collector: MetricsCollector;
  let conn: MemoryConnection;

  beforeEach(async () => {
    adapter = new MemoryAdapter({ timeSource: new MockTimeSource() });
    collector = new MetricsCollector();
    conn = await adapter.connect({ database: 'bench' });
  });

  afterEach(async () => {
    await adapter.close();
  });

  async function insertAll(docs: JsonDocument[]): Promise<void> {
    for (const [i, doc] of docs.entries()) {
      expectSuccess(await adapter.execute(conn, insertOperation(`seed-${i}`, doc), collector));
    }
  }

  describe('configuration', () => {
    it('should report every invalid option', () => {
      const result = adapter.validateConfig({
        database: 'bench',
        uri: 'http://localhost',
        options: { maxDocuments: -1 },
      });

      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.path)).toEqual(['uri', 'options.maxDocuments']);
    });

    it('should accept a memory URI', () => {
      expect(adapter.validateConfig({ database: 'bench', uri: 'memory://local' }).valid).toBe(true);
    });

    it('should refuse to connect without a database', async () => {
      await expect(adapter.connect({ database: '' })).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should describe its options', () => {
      expect(Object.keys(adapter.getConfigurationOptions())).toEqual(['maxDocuments']);
    });
  });

  describe('insert and read', () => {
    it('should read back an inserted document', async () => {
      const inserted = expectSuccess(await adapter.execute(conn, insertOperation('op-1', order), collector));
      const read = expectSuccess(await adapter.execute(conn, fullDocumentRead('op-2', 'order-1'), collector));

      const bytes = Buffer.byteLength(JSON.stringify(order));
      expect(inserted.metadata).toEqual({ insertedId: 'order-1', bytes });
      expect(read.data).toEqual(order);
      expect(read.metadata).toEqual({ bytes });
    });

    it('should record latency, counters and the breakdown', async () => {
      await adapter.execute(conn, insertOperation('op-1', order), collector);

      expect(collector.hasMetric('memory.insert.latency')).toBe(true);
      expect(collector.getCounter('memory.insert.succeeded')).toBe(1);
      expect(collector.hasMetric('overhead.serialization_time')).toBe(true);
      expect(collector.hasMetric('overhead.server_execution_time')).toBe(true);
    });

    it('should reject a duplicate id', async () => {
      await insertAll([order]);

      const failed = expectFailure(await adapter.execute(conn, insertOperation('op-dup', order), collector));
      expect(failed.error.code).toBe('BENCH_O302');
      expect(collector.getCounter('memory.insert.failed')).toBe(1);
    });

    it('should fail a read of a missing document', async () => {
      const failed = expectFailure(await adapter.execute(conn, fullDocumentRead('op-1', 'nope'), collector));
      expect(failed.error.code).toBe('BENCH_O301');
    });

    it('should project requested paths and time their traversal', async () => {
      await insertAll([order]);

      const read = expectSuccess(
        await adapter.execute(
          conn,
          projectedRead('op-p', 'order-1', ['customer.address.city', 'items[1].sku', 'missing.field']),
          collector
        )
      );

      expect(read.data).toEqual({ _id: 'order-1', 'customer.address.city': 'Oslo', 'items[1].sku': 'B-2' });
      expect(collector.getCounter('memory.deserialization.field_count')).toBe(3);
      expect(collector.hasMetric('memory.field_access.customer.address.city')).toBe(true);
      expect(collector.hasMetric('memory.deserialization.total')).toBe(true);
    });

    it('should enforce maxDocuments', async () => {
      const small = await adapter.connect({ database: 'small', options: { maxDocuments: 1 } });

      expectSuccess(await adapter.execute(small, insertOperation('op-1', { _id: 'a' }), collector));
      const failed = expectFailure(await adapter.execute(small, insertOperation('op-2', { _id: 'b' }), collector));

      expect(failed.error.code).toBe('BENCH_O300');
      expect(failed.error.message).toBe('Collection benchmark_docs is full');
    });
  });

  describe('update and delete', () => {
    beforeEach(async () => {
      await insertAll([order]);
    });

    it('should set a nested path', async () => {
      const updated = expectSuccess(
        await adapter.execute(conn, updateOperation('op-u', 'order-1', 'customer.address.city', 'Bergen'), collector)
      );
      const read = expectSuccess(await adapter.execute(conn, fullDocumentRead('op-r', 'order-1'), collector));

      expect(updated.metadata).toEqual({ matchedCount: 1, modifiedCount: 1, upserted: false });
      expect(read.data === undefined ? undefined : getAtPath(read.data, 'customer.address.city')).toBe('Bergen');
    });

    it('should report no match for a missing document', async () => {
      const updated = expectSuccess(await adapter.execute(conn, updateOperation('op-u', 'ghost', 'status', 'x'), collector));
      expect(updated.metadata).toEqual({ matchedCount: 0, modifiedCount: 0, upserted: false });
    });

    it('should upsert a missing document', async () => {
      const updated = expectSuccess(
        await adapter.execute(conn, updateOperation('op-u', 'new-1', 'status', 'draft', { upsert: true }), collector)
      );
      const read = expectSuccess(await adapter.execute(conn, fullDocumentRead('op-r', 'new-1'), collector));

      expect(updated.metadata).toEqual({ matchedCount: 0, modifiedCount: 1, upserted: true });
      expect(read.data).toEqual({ _id: 'new-1', status: 'draft' });
    });

    it('should refuse to change _id', async () => {
      const failed = expectFailure(await adapter.execute(conn, updateOperation('op-u', 'order-1', '_id', 'x'), collector));
      expect(failed.error.message).toBe('The _id field cannot be updated');
    });

    it('should fail when the path crosses a scalar', async () => {
      const failed = expectFailure(
        await adapter.execute(conn, updateOperation('op-u', 'order-1', 'status.code', 1), collector)
      );
      expect(failed.error.code).toBe('BENCH_O300');
      expect(failed.error.message).toBe('Cannot set status.code on document order-1');
    });

    it('should delete once', async () => {
      const first = expectSuccess(await adapter.execute(conn, deleteOperation('op-d1', 'order-1'), collector));
      const second = expectSuccess(await adapter.execute(conn, deleteOperation('op-d2', 'order-1'), collector));

      expect(first.metadata).toEqual({ deletedCount: 1 });
      expect(second.metadata).toEqual({ deletedCount: 0 });
    });
  });

  describe('aggregate', () => {
    const orders: JsonDocument[] = [
      { _id: 'o1', status: 'shipped', total: 10 },
      { _id: 'o2', status: 'pending', total: 25 },
      { _id: 'o3', status: 'shipped', total: 30 },
      { _id: 'o4', status: 'shipped', total: 5 },
    ];

    it('should run match, sort, limit and project', async () => {
      await insertAll(orders);

      const result = expectSuccess(
        await adapter.execute(
          conn,
          aggregateOperation('op-a', [
            '{"$match":{"status":"shipped"}}',
            '{"$sort":{"total":-1}}',
            '{"$limit":2}',
            '{"$project":{"_id":0,"total":1}}',
          ]),
          collector
        )
      );

      expect(result.data).toEqual([{ total: 30 }, { total: 10 }]);
      expect(result.metadata.plan).toBe('COLLSCAN');
      expect(result.metadata.examined).toBe(4);
      expect(result.metadata.returned).toBe(2);
    });

    it('should count matches', async () => {
      await insertAll(orders);

      const result = expectSuccess(
        await adapter.execute(
          conn,
          aggregateOperation('op-a', ['{"$match":{"total":{"$gte":10}}}', '{"$count":"n"}']),
          collector
        )
      );
      expect(result.data).toEqual([{ n: 3 }]);
    });

    it('should use a covering secondary index', async () => {
      await adapter.setupTestEnvironment({ indexes: [{ fields: ['status'] }] });
      await insertAll(orders);

      const result = expectSuccess(
        await adapter.execute(conn, aggregateOperation('op-a', ['{"$match":{"status":"shipped"}}']), collector)
      );

      expect(result.metadata.plan).toBe('IXSCAN');
      expect(result.metadata.examined).toBe(3);
      expect(Array.isArray(result.data) ? result.data.length : -1).toBe(3);
    });

    it('should return the plan when asked to explain', async () => {
      await adapter.setupTestEnvironment({ indexes: [{ fields: ['status'] }] });
      await insertAll(orders);

      const result = expectSuccess(
        await adapter.execute(
          conn,
          aggregateOperation('op-a', ['{"$match":{"status":"pending"}}'], { explain: true }),
          collector
        )
      );

      expect(result.data).toEqual({
        collection: 'benchmark_docs',
        stage: 'IXSCAN',
        indexName: 'idx_status',
        candidates: 1,
        pipeline: ['$match'],
      });
    });

    it('should look up by _id', async () => {
      await insertAll(orders);

      const plan = await adapter.explain(conn, aggregateOperation('op-a', ['{"$match":{"_id":"o2"}}']));
      expect(plan.stage).toBe('IDHACK');
      expect(plan.candidates).toBe(1);
    });

    it.each([['not json'], ['{"$group":{"_id":"$status"}}'], ['{"$limit":0}'], ['{"$match":{},"$limit":1}']])(
      'should reject the stage %s',
      async (stage) => {
        const failed = expectFailure(await adapter.execute(conn, aggregateOperation('op-a', [stage]), collector));
        expect(failed.error.code).toBe('BENCH_O303');
      }
    );
  });

  describe('explain', () => {
    it('should describe a read by id', async () => {
      await insertAll([order]);

      await expect(adapter.explain(conn, fullDocumentRead('op-x', 'order-1'))).resolves.toEqual({
        collection: 'benchmark_docs',
        stage: 'IDHACK',
        candidates: 1,
        pipeline: [],
      });
    });

    it('should declare explain-plan', () => {
      expect(adapter.hasCapability('explain-plan')).toBe(true);
      expect(adapter.hasCapability('sharding')).toBe(false);
      expect(() => adapter.requireCapability('sharding')).toThrow(CapabilityNotSupportedError);
    });
  });

  describe('connections', () => {
    it('should share data between connections to one database', async () => {
      await insertAll([order]);
      const other = await adapter.connect({ database: 'bench' });

      expectSuccess(await adapter.execute(other, fullDocumentRead('op-r', 'order-1'), collector));
    });

    it('should reject a connection from another adapter', async () => {
      const stranger = new MemoryAdapter();
      const foreign = await stranger.connect({ database: 'bench' });

      const failed = expectFailure(await adapter.execute(foreign, fullDocumentRead('op-r', 'order-1'), collector));
      expect(failed.error.code).toBe('BENCH_C200');
      await stranger.close();
    });

    it('should fire timing listeners and accumulate bytes', async () => {
      const events: string[] = [];
      const listener: TimingListener = {
        onSerializationStart: (id) => events.push(`serialize:${id}`),
        onSerializationComplete: (id, bytes) => events.push(`serialized:${id}:${bytes}`),
        onWireTransmitComplete: (id, bytes) => events.push(`sent:${id}:${bytes}`),
      };
      conn.addTimingListener(listener);

      const doc: JsonDocument = { _id: 'a', n: 1 };
      await adapter.execute(conn, insertOperation('op-1', doc), collector);

      const bytes = Buffer.byteLength(JSON.stringify(doc));
      expect(events).toEqual(['serialize:op-1', `serialized:op-1:${bytes}`, `sent:op-1:${bytes}`]);
      expect(conn.getTimingMetrics().totalBytesSent).toBe(bytes);
      expect(conn.getTimingMetrics().operationCount).toBe(1);
    });

    it('should close every connection', async () => {
      await adapter.close();
      expect(conn.isValid()).toBe(false);
    });
  });

  describe('test environment', () => {
    it('should drop existing data on setup and remove it on teardown', async () => {
      await insertAll([order]);
      await adapter.setupTestEnvironment();

      expectFailure(await adapter.execute(conn, fullDocumentRead('op-r', 'order-1'), collector));

      await adapter.teardownTestEnvironment();
      await adapter.teardownTestEnvironment();
      expect(adapter.getDatabase('bench')?.hasCollection('benchmark_docs')).toBe(false);
    });

    it('should use the configured collection', async () => {
      await adapter.setupTestEnvironment({ collectionName: 'orders' });
      await insertAll([order]);

      expect(adapter.getDatabase('bench')?.collection('orders').size).toBe(1);
    });
  });

  describe('bulk', () => {
    it('should count a duplicate as one failure', async () => {
      const bulk = await adapter.executeBulk(
        conn,
        [
          insertOperation('op-1', { _id: 'a' }),
          insertOperation('op-2', { _id: 'a' }),
          insertOperation('op-3', { _id: 'b' }),
        ],
        collector
      );

      expect(bulk.successCount).toBe(2);
      expect(bulk.failureCount).toBe(1);
    });
  });
});
