import { beforeEach, describe, expect, it } from 'vitest';
import { BreakdownRecorder } from '../metrics/breakdown-recorder.js';
import { MockTimeSource } from '../time/time-source.js';

describe('BreakdownRecorder', () => {
  let clock: MockTimeSource;

  beforeEach(() => {
    clock = new MockTimeSource();
  });

  it('should time synchronous phases and the total', () => {
    const recorder = new BreakdownRecorder(clock);

    const value = recorder.measure('serializationTime', () => {
      clock.advance(150);
      return 'encoded';
    });
    clock.advance(50);

    const { totalLatency, breakdown } = recorder.finish();
    expect(value).toBe('encoded');
    expect(totalLatency).toBe(200);
    expect(breakdown.serializationTime).toBe(150);
    expect(breakdown.totalLatency).toBe(200);
    expect(breakdown.serverFetchTime).toBe(0);
  });

  it('should time asynchronous phases', async () => {
    const recorder = new BreakdownRecorder(clock);

    await recorder.measureAsync('serverExecutionTime', async () => {
      await Promise.resolve();
      clock.advance(700);
    });

    expect(recorder.get('serverExecutionTime')).toBe(700);
  });

  it('should sum repeated phases', () => {
    const recorder = new BreakdownRecorder(clock);
    recorder.add('serverIndexTime', 30).add('serverIndexTime', 12);
    recorder.addPlatformSpecific('memory.plan_time', 5).addPlatformSpecific('memory.plan_time', 5);

    const { breakdown } = recorder.finish();
    expect(breakdown.serverIndexTime).toBe(42);
    expect(breakdown.platformSpecific.get('memory.plan_time')).toBe(10);
  });

  it('should record a phase that throws', () => {
    const recorder = new BreakdownRecorder(clock);

    expect(() =>
      recorder.measure('serverFetchTime', () => {
        clock.advance(90);
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(recorder.get('serverFetchTime')).toBe(90);
  });

  it('should freeze the result on the first finish', () => {
    const recorder = new BreakdownRecorder(clock);
    clock.advance(100);
    const first = recorder.finish();
    clock.advance(100);

    expect(recorder.finish()).toBe(first);
    expect(recorder.elapsed()).toBe(100);
  });
});
