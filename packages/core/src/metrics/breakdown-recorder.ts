import { Stopwatch, type TimeSource } from '../time/time-source.js';
import { OverheadBreakdown, type OverheadDimension } from './overhead-breakdown.js';

type PhaseDimension = Exclude<OverheadDimension, 'totalLatency'>;

/**
 * Accumulates phase durations for one operation while it runs.
 *
 * The total latency is measured from construction to {@link finish}; phases
 * measured more than once are summed.
 *
 * @example
 * ```typescript
 * const recorder = new BreakdownRecorder(timeSource);
 * const reply = await recorder.measureAsync('serverExecutionTime', () => send(command));
 * const { totalLatency, breakdown } = recorder.finish();
 * ```
 */
export class BreakdownRecorder {
  private readonly stopwatch: Stopwatch;
  private readonly phases = new Map<PhaseDimension, number>();
  private readonly platformSpecific = new Map<string, number>();
  private result: { totalLatency: number; breakdown: OverheadBreakdown } | null = null;

  constructor(private readonly timeSource: TimeSource) {
    this.stopwatch = new Stopwatch(timeSource);
  }

  measure<T>(dimension: PhaseDimension, fn: () => T): T {
    const start = this.timeSource.nanoTime();
    try {
      return fn();
    } finally {
      this.add(dimension, this.timeSource.nanoTime() - start);
    }
  }

  async measureAsync<T>(dimension: PhaseDimension, fn: () => Promise<T>): Promise<T> {
    const start = this.timeSource.nanoTime();
    try {
      return await fn();
    } finally {
      this.add(dimension, this.timeSource.nanoTime() - start);
    }
  }

  add(dimension: PhaseDimension, nanos: number): this {
    this.phases.set(dimension, (this.phases.get(dimension) ?? 0) + nanos);
    return this;
  }

  addPlatformSpecific(name: string, nanos: number): this {
    this.platformSpecific.set(name, (this.platformSpecific.get(name) ?? 0) + nanos);
    return this;
  }

  get(dimension: PhaseDimension): number {
    return this.phases.get(dimension) ?? 0;
  }

  /** Nanoseconds since construction, or the frozen total once finished */
  elapsed(): number {
    return this.stopwatch.elapsed();
  }

  /**
   * Stop the clock and build the breakdown. Later calls return the same result.
   */
  finish(): { totalLatency: number; breakdown: OverheadBreakdown } {
    if (!this.result) {
      const totalLatency = this.stopwatch.stop();
      const builder = OverheadBreakdown.builder().totalLatency(totalLatency);
      for (const [dimension, nanos] of this.phases) {
        builder.set(dimension, nanos);
      }
      for (const [name, nanos] of this.platformSpecific) {
        builder.addPlatformSpecific(name, nanos);
      }
      this.result = { totalLatency, breakdown: builder.build() };
    }
    return this.result;
  }
}
