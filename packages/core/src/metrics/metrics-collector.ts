/**
 * MetricsCollector: named timing histograms and counters for one run.
 * ----------------------------------------------------------------------------
 * Adapters, the correlation tracker and the traversal timer all write into
 * a collector; callers read it back through an immutable
 * {@link MetricsSummary}. Histograms are created lazily on the first sample
 * for a name and stay live until {@link MetricsCollector.reset}.
 *
 * Every mutation is a single synchronous step on the event loop, so
 * concurrent operations never observe a half-applied update and no lock
 * orders unrelated operations.
 *
 * @module metrics/metrics-collector
 *
 * @example
 * ```typescript
 * const collector = new MetricsCollector();
 *
 * // warm-up ...
 * collector.reset();
 *
 * collector.recordTiming('mongodb.client_round_trip', micros(840));
 * collector.addCounter('mongodb.completed');
 *
 * const summary = collector.summarize();
 * summary.get('mongodb.client_round_trip')?.percentile(99);
 * ```
 */

import type { BenchLogger } from '../observability/logger.js';
import { LatencyHistogram, type TimingStats } from './histogram.js';
import { OVERHEAD_DIMENSIONS, type OverheadBreakdown, type OverheadDimension } from './overhead-breakdown.js';

/** Prefix for metrics fanned out of an overhead breakdown */
export const OVERHEAD_METRIC_PREFIX = 'overhead';

/**
 * Metric name a breakdown dimension is recorded under,
 * e.g. `serverTraversalTime` → `overhead.server_traversal_time`
 */
export function overheadMetricName(dimension: OverheadDimension): string {
  const snake = dimension.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
  return `${OVERHEAD_METRIC_PREFIX}.${snake}`;
}

/**
 * Immutable point-in-time view of a collector
 */
export class MetricsSummary {
  private readonly timings: ReadonlyMap<string, TimingStats>;
  private readonly counters: ReadonlyMap<string, number>;

  constructor(timings: Map<string, TimingStats>, counters: Map<string, number>) {
    this.timings = timings;
    this.counters = counters;
    Object.freeze(this);
  }

  hasMetric(name: string): boolean {
    return this.timings.has(name);
  }

  /** Timing distribution for a metric, or `undefined` if never recorded */
  get(name: string): TimingStats | undefined {
    return this.timings.get(name);
  }

  metricNames(): string[] {
    return Array.from(this.timings.keys()).sort();
  }

  hasCounter(name: string): boolean {
    return this.counters.has(name);
  }

  /** Counter value; zero when the counter was never touched */
  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  counterNames(): string[] {
    return Array.from(this.counters.keys()).sort();
  }
}

/**
 * Options for {@link MetricsCollector}
 */
export interface MetricsCollectorOptions {
  /** Logger for lifecycle events */
  logger?: BenchLogger;
}

export class MetricsCollector {
  private readonly histograms = new Map<string, LatencyHistogram>();
  private readonly counters = new Map<string, number>();
  private readonly logger?: BenchLogger;

  constructor(options: MetricsCollectorOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Append a nanosecond sample to the histogram for `name`
   */
  recordTiming(name: string, nanos: number): void {
    let histogram = this.histograms.get(name);
    if (!histogram) {
      histogram = new LatencyHistogram();
      this.histograms.set(name, histogram);
    }
    histogram.record(nanos);
  }

  /**
   * Increment a named counter
   */
  addCounter(name: string, delta = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
  }

  /**
   * Fan a breakdown out into one sample per base dimension plus one per
   * platform-specific entry
   */
  recordOverheadBreakdown(breakdown: OverheadBreakdown): void {
    for (const dimension of OVERHEAD_DIMENSIONS) {
      this.recordTiming(overheadMetricName(dimension), breakdown[dimension]);
    }
    for (const [name, nanos] of breakdown.platformSpecific) {
      this.recordTiming(name, nanos);
    }
  }

  hasMetric(name: string): boolean {
    return this.histograms.has(name);
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  metricNames(): string[] {
    return Array.from(this.histograms.keys()).sort();
  }

  /**
   * Snapshot every histogram and counter. Later samples do not affect the
   * returned summary.
   */
  summarize(): MetricsSummary {
    const timings = new Map<string, TimingStats>();
    for (const [name, histogram] of this.histograms) {
      timings.set(name, histogram.copy());
    }
    return new MetricsSummary(timings, new Map(this.counters));
  }

  /**
   * Drop every histogram and counter. Call between warm-up and measurement.
   */
  reset(): void {
    const metrics = this.histograms.size;
    const counters = this.counters.size;
    this.histograms.clear();
    this.counters.clear();
    this.logger?.debug('Metrics reset', { metrics, counters });
  }
}
