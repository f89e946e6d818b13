import { beforeEach, describe, expect, it } from 'vitest';
import { MetricsCollector } from '../metrics/metrics-collector.js';
import { MockTimeSource } from '../time/time-source.js';
import { TraversalTimer } from '../traversal/traversal-timer.js';

describe('TraversalTimer', () => {
  let clock: MockTimeSource;
  let collector: MetricsCollector;
  let timer: TraversalTimer;

  beforeEach(() => {
    clock = new MockTimeSource();
    collector = new MetricsCollector();
    timer = new TraversalTimer({ namespace: 'bson', collector, timeSource: clock });
  });

  it('should track field positions and count', () => {
    timer.startDeserialization('op-1');
    timer.recordFieldAccess('op-1', '_id', 0);
    timer.recordFieldAccess('op-1', 'name', 1);
    timer.recordFieldAccess('op-1', 'email', 2);
    timer.endDeserialization('op-1');

    expect(timer.getFieldAccessCount('op-1')).toBe(3);
    expect(timer.getFieldPosition('op-1', 'name')).toBe(1);
    expect(timer.getDeserializationBreakdown('op-1')).toMatchObject({ fieldCount: 3, lastFieldPosition: 2 });
  });

  it('should count fields accessed without a position but not store one', () => {
    timer.startDeserialization('op-1');
    timer.recordFieldAccess('op-1', 'tags');

    expect(timer.getFieldAccessCount('op-1')).toBe(1);
    expect(timer.getFieldPosition('op-1', 'tags')).toBe(-1);
    expect(timer.getDeserializationBreakdown('op-1')?.lastFieldPosition).toBe(-1);
  });

  it('should record the time since the previous event per field', () => {
    timer.startDeserialization('op-1');
    clock.advance(40);
    timer.recordFieldAccess('op-1', 'a', 0);
    clock.advance(25);
    timer.enterNestedDocument('op-1', 'b');
    clock.advance(15);
    timer.recordFieldAccess('op-1', 'c', 0);

    const summary = collector.summarize();
    expect(summary.get('bson.field_access.a')?.max()).toBe(40);
    expect(summary.get('bson.field_access.c')?.max()).toBe(15);
  });

  it('should keep operations independent', () => {
    timer.startDeserialization('op-a');
    timer.startDeserialization('op-b');
    timer.recordFieldAccess('op-a', 'x', 0);
    timer.recordFieldAccess('op-b', 'x', 0);
    timer.recordFieldAccess('op-b', 'y', 1);

    expect(timer.getFieldAccessCount('op-a')).toBe(1);
    expect(timer.getFieldAccessCount('op-b')).toBe(2);
  });

  it('should track maximum nesting depth and never go below zero', () => {
    timer.startDeserialization('op-1');
    timer.enterNestedDocument('op-1', 'a');
    timer.enterNestedDocument('op-1', 'b');
    timer.exitNestedDocument('op-1');
    timer.exitNestedDocument('op-1');
    timer.exitNestedDocument('op-1');
    timer.enterNestedDocument('op-1', 'c');

    expect(timer.getMaxNestingDepth('op-1')).toBe(2);
  });

  it('should count array elements per array', () => {
    timer.startDeserialization('op-1');
    timer.enterArray('op-1', 'items');
    timer.recordArrayElementAccess('op-1', 'items', 0);
    timer.recordArrayElementAccess('op-1', 'items', 1);
    timer.exitArray('op-1');
    timer.enterArray('op-1', 'empty');
    timer.exitArray('op-1');

    expect(timer.getArrayElementCount('op-1', 'items')).toBe(2);
    expect(timer.getArrayElementCount('op-1', 'empty')).toBe(0);
    expect(timer.getDeserializationBreakdown('op-1')?.totalArrayElements).toBe(2);
  });

  it('should emit totals when deserialization ends', () => {
    timer.startDeserialization('op-1');
    timer.recordFieldAccess('op-1', 'a', 0);
    timer.recordFieldAccess('op-1', 'b', 1);
    clock.advance(300);
    timer.endDeserialization('op-1');

    expect(timer.getTotalDeserializationTime('op-1')).toBe(300);
    expect(collector.summarize().get('bson.deserialization.total')?.max()).toBe(300);
    expect(collector.getCounter('bson.deserialization.field_count')).toBe(2);
  });

  it('should report zero time before the traversal ends', () => {
    timer.startDeserialization('op-1');
    clock.advance(50);
    expect(timer.getTotalDeserializationTime('op-1')).toBe(0);
  });

  it('should ignore unknown operation ids', () => {
    timer.recordFieldAccess('missing', 'a', 0);
    timer.enterNestedDocument('missing');
    timer.endDeserialization('missing');

    expect(timer.getFieldAccessCount('missing')).toBe(0);
    expect(timer.getFieldPosition('missing', 'a')).toBe(-1);
    expect(timer.getDeserializationBreakdown('missing')).toBeUndefined();
    expect(collector.metricNames()).toEqual([]);
  });

  it('should drop the context on clear', () => {
    timer.startDeserialization('op-1');
    timer.clear('op-1');
    expect(timer.activeCount()).toBe(0);
    expect(timer.getDeserializationBreakdown('op-1')).toBeUndefined();
  });
});
