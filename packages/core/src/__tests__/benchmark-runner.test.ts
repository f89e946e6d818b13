import { describe, expect, it } from 'vitest';
import { InvalidOperationError, SetupError } from '../errors/bench-error.js';
import { createLogger } from '../observability/logger.js';
import { runBenchmark } from '../run/benchmark-runner.js';
import { RunContext, type RunEvent } from '../run/run-context.js';
import { MockTimeSource } from '../time/time-source.js';
import { fullDocumentRead } from '../types/operation.js';
import { ScriptedAdapter } from './helpers/scripted-adapter.js';

function quietContext(clock: MockTimeSource): RunContext {
  return new RunContext({ runId: 'run-test', timeSource: clock, logger: createLogger({ level: 'error', handler: () => {} }) });
}

describe('runBenchmark', () => {
  it('should exclude warm-up samples from the summary', async () => {
    const clock = new MockTimeSource();
    const adapter = new ScriptedAdapter({ timeSource: clock, operationNanos: 100, advance: (n) => clock.advance(n) });

    const report = await runBenchmark({
      adapter,
      connection: { database: 'bench' },
      warmupIterations: 5,
      iterations: 20,
      nextOperation: (i, phase) => fullDocumentRead(`${phase}-${i}`, `doc-${i}`),
      context: quietContext(clock),
    });

    expect(adapter.executed).toHaveLength(25);
    expect(report.summary.get('scripted.read.latency')?.count()).toBe(20);
    expect(report.successCount).toBe(20);
    expect(report.failureCount).toBe(0);
    expect(report.durationNanos).toBe(2000);
    expect(report.throughput).toBe(10_000_000);
  });

  it('should run every iteration exactly once under concurrency', async () => {
    const clock = new MockTimeSource();
    const adapter = new ScriptedAdapter({ timeSource: clock });

    await runBenchmark({
      adapter,
      connection: { database: 'bench' },
      iterations: 37,
      concurrency: 8,
      nextOperation: (i) => fullDocumentRead(`op-${i}`, 'doc-1'),
      context: quietContext(clock),
    });

    const ids = adapter.executed.map((op) => op.id);
    expect(new Set(ids).size).toBe(37);
  });

  it('should report failures without aborting the run', async () => {
    const clock = new MockTimeSource();
    const adapter = new ScriptedAdapter({ timeSource: clock, failingOperations: ['op-3', 'op-4'] });

    const report = await runBenchmark({
      adapter,
      connection: { database: 'bench' },
      iterations: 10,
      nextOperation: (i) => fullDocumentRead(`op-${i}`, 'doc-1'),
      context: quietContext(clock),
    });

    expect(report.failureCount).toBe(2);
    expect(report.summary.getCounter('scripted.read.failed')).toBe(2);
    expect(adapter.deprovisioned).toBe(1);
  });

  it('should close the adapter when setup fails', async () => {
    const clock = new MockTimeSource();
    const adapter = new ScriptedAdapter({ timeSource: clock, provisionError: new Error('no space') });
    const context = quietContext(clock);
    const phases: string[] = [];
    context.events().subscribe((e: RunEvent) => {
      if (e.type === 'phase') phases.push(e.phase);
    });

    const run = runBenchmark({
      adapter,
      connection: { database: 'bench' },
      iterations: 1,
      nextOperation: (i) => fullDocumentRead(`op-${i}`, 'doc-1'),
      context,
    });

    await expect(run).rejects.toBeInstanceOf(SetupError);
    expect(phases).toEqual(['connect', 'setup', 'close']);
    expect(adapter.executed).toHaveLength(0);
  });

  it('should emit progress for each measured iteration', async () => {
    const clock = new MockTimeSource();
    const context = quietContext(clock);
    const progress: number[] = [];
    context.events().subscribe((e) => {
      if (e.type === 'progress' && e.phase === 'measure') progress.push(e.completed);
    });

    await runBenchmark({
      adapter: new ScriptedAdapter({ timeSource: clock }),
      connection: { database: 'bench' },
      iterations: 3,
      nextOperation: (i) => fullDocumentRead(`op-${i}`, 'doc-1'),
      context,
    });

    expect(progress).toEqual([1, 2, 3]);
  });

  it('should reject a non-positive iteration count', async () => {
    await expect(
      runBenchmark({
        adapter: new ScriptedAdapter(),
        connection: { database: 'bench' },
        iterations: 0,
        nextOperation: (i) => fullDocumentRead(`op-${i}`, 'doc-1'),
      })
    ).rejects.toBeInstanceOf(InvalidOperationError);
  });
});
