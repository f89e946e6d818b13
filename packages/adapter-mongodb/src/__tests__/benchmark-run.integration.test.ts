import { createLogger, insertOperation, MockTimeSource, RunContext, runBenchmark } from '@latency-lab/core';
import { describe, expect, it } from 'vitest';
import { MongoAdapter } from '../adapter.js';
import { FakeMongoDriver } from './helpers/fake-mongo-driver.js';

describe('benchmark run against the MongoDB adapter', () => {
  it('should drop warm-up commands from the correlation metrics', async () => {
    const clock = new MockTimeSource();
    const driver = new FakeMongoDriver({ clock, roundTripNanos: 5_000, serverMs: 0.002 });
    const adapter = new MongoAdapter({ timeSource: clock, driverFactory: () => driver });
    const context = new RunContext({
      runId: 'run-mongo',
      timeSource: clock,
      logger: createLogger({ level: 'error', handler: () => {} }),
    });

    const report = await runBenchmark({
      adapter,
      connection: { uri: 'mongodb://localhost:27017', database: 'bench' },
      environment: { collectionName: 'orders' },
      warmupIterations: 5,
      iterations: 10,
      nextOperation: (i, phase) => insertOperation(`${phase}-${i}`, { _id: `${phase}-doc-${i}`, total: i }),
      context,
    });

    expect(report.successCount).toBe(10);
    expect(report.summary.get('mongodb.insert.latency')?.count()).toBe(10);
    expect(report.connectionSummary.get('mongodb.client_round_trip')?.count()).toBe(10);
    expect(report.connectionSummary.get('mongodb.server_execution')?.count()).toBe(10);
    expect(report.connectionSummary.get('mongodb.insert.client_round_trip')?.count()).toBe(10);
    expect(report.connectionSummary.getCounter('mongodb.completed')).toBe(10);
    expect(report.connectionSummary.getCounter('mongodb.missed')).toBe(0);
  });
});
