/**
 * Drives one adapter through a complete benchmark run.
 *
 * connect → setup → warm-up → reset → measured iterations → summary →
 * teardown → close. The adapter is closed on every exit path, including a
 * failed setup.
 *
 * @module run/benchmark-runner
 */

import type { DatabaseAdapter, InstrumentedConnection } from '../adapter/adapter.js';
import { InvalidOperationError, toError } from '../errors/bench-error.js';
import type { MetricsSummary } from '../metrics/metrics-collector.js';
import { NANOS_PER_SECOND, Stopwatch } from '../time/time-source.js';
import type { ConnectionConfigInput, TestEnvironmentConfigInput } from '../types/config.js';
import type { Operation } from '../types/operation.js';
import type { OperationResult } from '../types/result.js';
import { RunContext } from './run-context.js';

/**
 * Produces the operation for an iteration. Indices restart at 0 for the
 * measured phase.
 */
export type OperationSource = (iteration: number, phase: 'warmup' | 'measure') => Operation;

export interface BenchmarkOptions {
  adapter: DatabaseAdapter;
  connection: ConnectionConfigInput;
  environment?: TestEnvironmentConfigInput;
  /** Iterations discarded before measurement (default 0) */
  warmupIterations?: number;
  /** Measured iterations */
  iterations: number;
  /** Operations in flight at once (default 1) */
  concurrency?: number;
  nextOperation: OperationSource;
  context?: RunContext;
}

/**
 * Outcome of a run
 */
export interface RunReport {
  readonly runId: string;
  readonly adapterId: string;
  readonly summary: MetricsSummary;
  /** Metrics the connection recorded itself, such as driver command correlation */
  readonly connectionSummary: MetricsSummary;
  readonly iterations: number;
  readonly successCount: number;
  readonly failureCount: number;
  /** Measured phase only, in nanoseconds */
  readonly durationNanos: number;
  /** Measured operations per second */
  readonly throughput: number;
}

function requireCount(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidOperationError(`${name} must be an integer of at least ${min}`, { [name]: value });
  }
  return value;
}

/**
 * Run `total` operations with at most `concurrency` in flight
 */
async function runPhase(
  adapter: DatabaseAdapter,
  connection: InstrumentedConnection,
  context: RunContext,
  phase: 'warmup' | 'measure',
  total: number,
  concurrency: number,
  nextOperation: OperationSource
): Promise<OperationResult[]> {
  const results: OperationResult[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < total) {
      const iteration = next++;
      results.push(await adapter.execute(connection, nextOperation(iteration, phase), context.collector));
      context.reportProgress(phase, results.length, total);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, total) }, () => worker()));
  return results;
}

/**
 * Execute a full benchmark run against one adapter.
 *
 * @example
 * ```typescript
 * const report = await runBenchmark({
 *   adapter: new MemoryAdapter(),
 *   connection: { database: 'bench' },
 *   iterations: 1000,
 *   warmupIterations: 100,
 *   concurrency: 8,
 *   nextOperation: (i) => fullDocumentRead(`op-${i}`, `doc-${i % 100}`),
 * });
 *
 * report.summary.get('memory.read.latency')?.percentile(99);
 * ```
 */
export async function runBenchmark(options: BenchmarkOptions): Promise<RunReport> {
  const iterations = requireCount('iterations', options.iterations, 1);
  const warmupIterations = requireCount('warmupIterations', options.warmupIterations ?? 0, 0);
  const concurrency = requireCount('concurrency', options.concurrency ?? 1, 1);

  const { adapter, nextOperation } = options;
  const context = options.context ?? new RunContext();
  const { collector, logger } = context;

  logger.info('Run started', { adapter: adapter.id, iterations, warmupIterations, concurrency });

  let failed = false;
  let setUp = false;
  try {
    context.enterPhase('connect');
    const connection = await adapter.connect(options.connection);

    context.enterPhase('setup');
    await adapter.setupTestEnvironment(options.environment);
    setUp = true;

    if (warmupIterations > 0) {
      context.enterPhase('warmup');
      await runPhase(adapter, connection, context, 'warmup', warmupIterations, concurrency, nextOperation);
    }

    collector.reset();
    connection.resetTimingMetrics();

    context.enterPhase('measure');
    const stopwatch = new Stopwatch(context.timeSource);
    const results = await runPhase(adapter, connection, context, 'measure', iterations, concurrency, nextOperation);
    const durationNanos = stopwatch.stop();

    const successCount = results.filter((r) => r.success).length;
    const report: RunReport = {
      runId: context.runId,
      adapterId: adapter.id,
      summary: collector.summarize(),
      connectionSummary: connection.collector.summarize(),
      iterations,
      successCount,
      failureCount: results.length - successCount,
      durationNanos,
      throughput: durationNanos > 0 ? (results.length * NANOS_PER_SECOND) / durationNanos : 0,
    };

    context.enterPhase('teardown');
    setUp = false;
    await adapter.teardownTestEnvironment();

    logger.info('Run finished', {
      adapter: adapter.id,
      succeeded: report.successCount,
      failed: report.failureCount,
      throughput: Math.round(report.throughput),
    });
    return report;
  } catch (error) {
    failed = true;
    logger.error('Run failed', error, { adapter: adapter.id });
    if (setUp) {
      await adapter.teardownTestEnvironment().catch((teardownError: unknown) => {
        logger.warn('Teardown failed after run error', { error: toError(teardownError).message });
      });
    }
    throw error;
  } finally {
    context.enterPhase('close');
    try {
      await adapter.close();
    } catch (closeError) {
      // The run's own error takes precedence.
      if (!failed) throw closeError;
      logger.warn('Close failed after run error', { error: toError(closeError).message });
    } finally {
      context.dispose();
    }
  }
}
