/**
 * Clock abstraction so timing code can run against a controllable clock in tests.
 *
 * @module time/time-source
 */

/** Nanoseconds per microsecond */
export const NANOS_PER_MICRO = 1_000;
/** Nanoseconds per millisecond */
export const NANOS_PER_MILLI = 1_000_000;
/** Nanoseconds per second */
export const NANOS_PER_SECOND = 1_000_000_000;

/** Convert microseconds to nanoseconds */
export function micros(value: number): number {
  return value * NANOS_PER_MICRO;
}

/** Convert milliseconds to nanoseconds */
export function millis(value: number): number {
  return Math.round(value * NANOS_PER_MILLI);
}

/** Convert nanoseconds to milliseconds */
export function toMillis(nanos: number): number {
  return nanos / NANOS_PER_MILLI;
}

/**
 * Source of monotonic time
 */
export interface TimeSource {
  /** Monotonic timestamp in nanoseconds; only differences are meaningful */
  nanoTime(): number;
  /** Wall-clock time in Unix milliseconds */
  now(): number;
}

/**
 * Measures elapsed time from the moment it was created.
 * The first `stop()` freezes the result; later calls return the same value.
 */
export class Stopwatch {
  private readonly startNanos: number;
  private stoppedAt: number | null = null;

  constructor(private readonly timeSource: TimeSource) {
    this.startNanos = timeSource.nanoTime();
  }

  get startedAt(): number {
    return this.startNanos;
  }

  stop(): number {
    if (this.stoppedAt === null) {
      this.stoppedAt = this.timeSource.nanoTime() - this.startNanos;
    }
    return this.stoppedAt;
  }

  elapsed(): number {
    return this.stoppedAt ?? this.timeSource.nanoTime() - this.startNanos;
  }
}

/**
 * Process clock backed by `performance.now()`
 */
export class SystemTimeSource implements TimeSource {
  nanoTime(): number {
    return Math.round(performance.now() * NANOS_PER_MILLI);
  }

  now(): number {
    return Date.now();
  }
}

/**
 * Manually advanced clock for deterministic tests.
 *
 * @example
 * ```typescript
 * const clock = new MockTimeSource();
 * const watch = new Stopwatch(clock);
 * clock.advance(micros(250));
 * watch.stop(); // 250_000
 * ```
 */
export class MockTimeSource implements TimeSource {
  private nanos: number;
  private wallClock: number;

  constructor(initialNanos = 0, initialWallClock = 0) {
    this.nanos = initialNanos;
    this.wallClock = initialWallClock;
  }

  nanoTime(): number {
    return this.nanos;
  }

  now(): number {
    return this.wallClock;
  }

  /** Move both clocks forward */
  advance(nanos: number): void {
    this.nanos += nanos;
    this.wallClock += nanos / NANOS_PER_MILLI;
  }

  setNanoTime(nanos: number): void {
    this.nanos = nanos;
  }
}

const systemTimeSource = new SystemTimeSource();

/** Shared process clock */
export function systemTime(): TimeSource {
  return systemTimeSource;
}
