import { describe, expect, it } from 'vitest';
import { LatencyHistogram } from '../metrics/histogram.js';
import { MetricsCollector, overheadMetricName } from '../metrics/metrics-collector.js';
import { OVERHEAD_DIMENSIONS, OverheadBreakdown } from '../metrics/overhead-breakdown.js';

describe('LatencyHistogram', () => {
  it('should report zeros when empty', () => {
    const histogram = new LatencyHistogram();
    expect(histogram.count()).toBe(0);
    expect(histogram.mean()).toBe(0);
    expect(histogram.percentile(99)).toBe(0);
    expect(histogram.min()).toBe(0);
    expect(histogram.max()).toBe(0);
    expect(histogram.stdDeviation()).toBe(0);
  });

  it('should compute exact statistics for small values', () => {
    const histogram = new LatencyHistogram();
    for (const value of [2, 4, 4, 4, 5, 5, 7, 9]) histogram.record(value);

    expect(histogram.count()).toBe(8);
    expect(histogram.mean()).toBe(5);
    expect(histogram.stdDeviation()).toBe(2);
    expect(histogram.min()).toBe(2);
    expect(histogram.max()).toBe(9);
  });

  it('should resolve percentiles', () => {
    const histogram = new LatencyHistogram();
    for (let i = 1; i <= 100; i++) histogram.record(i);

    expect(histogram.percentile(50)).toBe(50);
    expect(histogram.percentile(99)).toBe(99);
    expect(histogram.percentile(100)).toBe(100);
  });

  it('should hold samples from nanoseconds to seconds within three digits', () => {
    const histogram = new LatencyHistogram();
    histogram.record(10);
    histogram.record(5_000_000_000);

    expect(histogram.min()).toBe(10);
    expect(histogram.max() / 5_000_000_000).toBeCloseTo(1, 2);
  });

  it('should clamp negative samples to zero', () => {
    const histogram = new LatencyHistogram();
    histogram.record(-50);
    expect(histogram.count()).toBe(1);
    expect(histogram.max()).toBe(0);
  });
});

describe('MetricsCollector', () => {
  it('should count every recorded sample', () => {
    const collector = new MetricsCollector();
    for (let i = 0; i < 250; i++) collector.recordTiming('memory.read.latency', 100 + i);

    const stats = collector.summarize().get('memory.read.latency');
    expect(stats?.count()).toBe(250);
  });

  it('should accumulate counters', () => {
    const collector = new MetricsCollector();
    collector.addCounter('mongodb.completed');
    collector.addCounter('mongodb.completed');
    collector.addCounter('bson.deserialization.field_count', 12);

    expect(collector.getCounter('mongodb.completed')).toBe(2);
    expect(collector.getCounter('bson.deserialization.field_count')).toBe(12);
    expect(collector.getCounter('never.touched')).toBe(0);
  });

  it('should forget every metric and counter on reset', () => {
    const collector = new MetricsCollector();
    collector.recordTiming('warmup.latency', 10);
    collector.addCounter('warmup.count');
    collector.reset();

    const summary = collector.summarize();
    expect(summary.hasMetric('warmup.latency')).toBe(false);
    expect(summary.hasCounter('warmup.count')).toBe(false);
    expect(collector.metricNames()).toEqual([]);
  });

  it('should produce snapshots unaffected by later samples', () => {
    const collector = new MetricsCollector();
    collector.recordTiming('op', 5);
    collector.addCounter('ops');
    const before = collector.summarize();

    collector.recordTiming('op', 6);
    collector.addCounter('ops');

    expect(before.get('op')?.count()).toBe(1);
    expect(before.getCounter('ops')).toBe(1);
    expect(collector.summarize().get('op')?.count()).toBe(2);
  });

  it('should fan a breakdown out into one sample per dimension', () => {
    const collector = new MetricsCollector();
    const breakdown = OverheadBreakdown.builder()
      .totalLatency(900)
      .serverTraversalTime(300)
      .addPlatformSpecific('mongodb.query_build_time', 40)
      .build();

    collector.recordOverheadBreakdown(breakdown);
    const summary = collector.summarize();

    for (const dimension of OVERHEAD_DIMENSIONS) {
      expect(summary.get(overheadMetricName(dimension))?.count()).toBe(1);
    }
    expect(summary.get('overhead.server_traversal_time')?.max()).toBe(300);
    expect(summary.get('overhead.total_latency')?.max()).toBe(900);
    expect(summary.get('mongodb.query_build_time')?.max()).toBe(40);
    expect(summary.metricNames()).toHaveLength(OVERHEAD_DIMENSIONS.length + 1);
  });

  it('should name breakdown metrics in snake case', () => {
    expect(overheadMetricName('connectionAcquisition')).toBe('overhead.connection_acquisition');
    expect(overheadMetricName('totalLatency')).toBe('overhead.total_latency');
  });
});
