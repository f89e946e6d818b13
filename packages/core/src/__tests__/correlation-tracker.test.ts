import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CorrelationTracker, type CorrelationAnomaly } from '../correlation/correlation-tracker.js';
import { MetricsCollector } from '../metrics/metrics-collector.js';
import { createLogger, type LogEntry } from '../observability/logger.js';
import { micros, MockTimeSource } from '../time/time-source.js';

describe('CorrelationTracker', () => {
  let clock: MockTimeSource;
  let collector: MetricsCollector;
  let tracker: CorrelationTracker;

  beforeEach(() => {
    clock = new MockTimeSource();
    collector = new MetricsCollector();
    tracker = new CorrelationTracker({ namespace: 'mongodb', collector, timeSource: clock });
  });

  afterEach(() => {
    tracker.destroy();
  });

  describe('successful commands', () => {
    it('should derive round trip and overhead', () => {
      tracker.onStart({ requestId: 1, commandName: 'find' });
      clock.advance(micros(900));
      const timing = tracker.onSuccess({ requestId: 1, serverExecutionNanos: micros(300) });

      expect(timing).toMatchObject({
        requestId: 1,
        commandName: 'find',
        clientRoundTripNanos: micros(900),
        serverExecutionNanos: micros(300),
        overheadNanos: micros(600),
      });
      expect(tracker.getCompletedCount()).toBe(1);
      expect(tracker.getPendingCount()).toBe(0);
    });

    it('should record general and per-command metrics', () => {
      tracker.onStart({ requestId: 7, commandName: 'insert' });
      clock.advance(1500);
      tracker.onSuccess({ requestId: 7, serverExecutionNanos: 500 });

      const summary = collector.summarize();
      expect(summary.get('mongodb.client_round_trip')?.max()).toBe(1500);
      expect(summary.get('mongodb.server_execution')?.max()).toBe(500);
      expect(summary.get('mongodb.overhead')?.max()).toBe(1000);
      expect(summary.get('mongodb.insert.client_round_trip')?.count()).toBe(1);
      expect(summary.get('mongodb.insert.server_execution')?.count()).toBe(1);
      expect(summary.getCounter('mongodb.completed')).toBe(1);
    });

    it('should carry the operation id through to the completion stream', () => {
      const seen: (string | undefined)[] = [];
      tracker.completions().subscribe((t) => seen.push(t.operationId));

      tracker.onStart({ requestId: 3, commandName: 'find', operationId: 'read-3' });
      tracker.onSuccess({ requestId: 3, serverExecutionNanos: 0 });

      expect(seen).toEqual(['read-3']);
    });

    it('should keep concurrent commands apart', () => {
      const k = 50;
      for (let id = 0; id < k; id++) {
        tracker.onStart({ requestId: id, commandName: 'find' });
        clock.advance(10);
      }
      for (let id = k - 1; id >= 0; id--) {
        tracker.onSuccess({ requestId: id, serverExecutionNanos: 1 });
      }

      expect(tracker.getCompletedCount()).toBe(k);
      expect(tracker.getPendingCount()).toBe(0);
      expect(collector.summarize().get('mongodb.client_round_trip')?.count()).toBe(k);
      expect(collector.summarize().get('mongodb.client_round_trip')?.min()).toBe(10);
    });

    it('should replace the entry when a request id is reused', () => {
      tracker.onStart({ requestId: 1, commandName: 'find' });
      clock.advance(100);
      tracker.onStart({ requestId: 1, commandName: 'update' });
      clock.advance(40);

      const timing = tracker.onSuccess({ requestId: 1, serverExecutionNanos: 0 });
      expect(timing?.commandName).toBe('update');
      expect(timing?.clientRoundTripNanos).toBe(40);
    });
  });

  describe('orphaned completions', () => {
    it('should count a success without a start as a miss', () => {
      const timing = tracker.onSuccess({ requestId: 99, serverExecutionNanos: 10 });

      expect(timing).toBeUndefined();
      expect(tracker.getMissedCount()).toBe(1);
      expect(tracker.getCompletedCount()).toBe(0);
      expect(collector.summarize().hasMetric('mongodb.client_round_trip')).toBe(false);
      expect(collector.getCounter('mongodb.missed')).toBe(1);
    });

    it('should count a failure without a start as both a failure and a miss', () => {
      tracker.onFailure({ requestId: 42 });

      expect(tracker.getFailedCount()).toBe(1);
      expect(tracker.getMissedCount()).toBe(1);
      expect(collector.summarize().hasMetric('mongodb.failed.client_round_trip')).toBe(false);
    });

    it('should publish misses as anomalies', () => {
      const anomalies: CorrelationAnomaly[] = [];
      tracker.anomalies().subscribe((a) => anomalies.push(a));
      tracker.onSuccess({ requestId: 5, serverExecutionNanos: 1 });

      expect(anomalies).toEqual([{ kind: 'miss', requestId: 5, outcome: 'success' }]);
    });
  });

  describe('failures', () => {
    it('should record only the failed round trip', () => {
      tracker.onStart({ requestId: 2, commandName: 'find' });
      clock.advance(700);
      tracker.onFailure({ requestId: 2 });

      const summary = collector.summarize();
      expect(summary.get('mongodb.failed.client_round_trip')?.max()).toBe(700);
      expect(summary.hasMetric('mongodb.client_round_trip')).toBe(false);
      expect(summary.getCounter('mongodb.failed')).toBe(1);
      expect(summary.getCounter('mongodb.completed')).toBe(0);
      expect(tracker.getTotalCount()).toBe(1);
    });
  });

  describe('clock skew', () => {
    it('should floor overhead at zero and count the skew', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: (e) => entries.push(e) });
      const skewed = new CorrelationTracker({ namespace: 'mongodb', collector, timeSource: clock, logger });
      const anomalies: CorrelationAnomaly[] = [];
      skewed.anomalies().subscribe((a) => anomalies.push(a));

      skewed.onStart({ requestId: 1, commandName: 'find' });
      clock.advance(100);
      const timing = skewed.onSuccess({ requestId: 1, serverExecutionNanos: 130 });

      expect(timing?.overheadNanos).toBe(0);
      expect(collector.getCounter('mongodb.clock_skew')).toBe(1);
      expect(anomalies).toEqual([{ kind: 'clock-skew', requestId: 1, commandName: 'find', excessNanos: 30 }]);
      expect(entries.map((e) => e.level)).toEqual(['warn']);
      skewed.destroy();
    });
  });

  describe('eviction', () => {
    it('should remove only entries older than the cutoff', () => {
      tracker.onStart({ requestId: 1, commandName: 'find' });
      clock.advance(1000);
      tracker.onStart({ requestId: 2, commandName: 'find' });
      clock.advance(500);

      expect(tracker.sweep(800)).toBe(1);
      expect(tracker.getPendingCount()).toBe(1);
      expect(tracker.getEvictedCount()).toBe(1);
      expect(collector.getCounter('mongodb.evicted')).toBe(1);

      // The evicted command's late reply is now a miss
      tracker.onSuccess({ requestId: 1, serverExecutionNanos: 1 });
      expect(tracker.getMissedCount()).toBe(1);
      expect(tracker.onSuccess({ requestId: 2, serverExecutionNanos: 1 })).toBeDefined();
    });

    it('should sweep on an interval', () => {
      vi.useFakeTimers();
      try {
        tracker.onStart({ requestId: 1, commandName: 'find' });
        clock.advance(5000);
        tracker.startSweeper(100, 1000);
        vi.advanceTimersByTime(100);

        expect(tracker.getPendingCount()).toBe(0);
        tracker.stopSweeper();
      } finally {
        vi.useRealTimers();
      }
    });
  });

  it('should clear pending entries and counts on reset', () => {
    tracker.onStart({ requestId: 1, commandName: 'find' });
    tracker.onFailure({ requestId: 9 });
    tracker.reset();

    expect(tracker.getPendingCount()).toBe(0);
    expect(tracker.getFailedCount()).toBe(0);
    expect(tracker.getMissedCount()).toBe(0);
  });
});
