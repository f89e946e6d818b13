/**
 * Correlates asynchronous start/complete notifications by request id.
 *
 * Drivers announce a command when it goes on the wire and again when its
 * reply (or failure) arrives, on a different tick and without the issuing
 * call's async context. The tracker pairs the two by request id, derives the
 * client round trip and the overhead above the server-reported execution
 * time, and records both into a {@link MetricsCollector} under a namespace.
 *
 * @module correlation/correlation-tracker
 */

import { Observable, Subject } from 'rxjs';
import type { MetricsCollector } from '../metrics/metrics-collector.js';
import type { BenchLogger } from '../observability/logger.js';
import { systemTime, type TimeSource } from '../time/time-source.js';

/**
 * A command went on the wire
 */
export interface CommandStart {
  readonly requestId: number;
  /** Backend command name, e.g. `find` or `insert` */
  readonly commandName: string;
  /** Benchmark operation that issued the command, when the driver exposes it */
  readonly operationId?: string;
}

/**
 * A command completed successfully
 */
export interface CommandSuccess {
  readonly requestId: number;
  /** Execution time reported by the server, in nanoseconds */
  readonly serverExecutionNanos: number;
}

/**
 * A command failed
 */
export interface CommandFailure {
  readonly requestId: number;
}

/**
 * Timing derived for one successfully correlated command
 */
export interface CorrelatedTiming {
  readonly requestId: number;
  readonly commandName: string;
  readonly operationId?: string;
  readonly clientRoundTripNanos: number;
  readonly serverExecutionNanos: number;
  /** Round trip minus server execution, floored at zero */
  readonly overheadNanos: number;
}

/**
 * Something that did not correlate cleanly
 */
export type CorrelationAnomaly =
  | { readonly kind: 'miss'; readonly requestId: number; readonly outcome: 'success' | 'failure' }
  | {
      readonly kind: 'clock-skew';
      readonly requestId: number;
      readonly commandName: string;
      /** How far the server time exceeded the client round trip */
      readonly excessNanos: number;
    }
  | { readonly kind: 'evicted'; readonly requestId: number; readonly commandName: string; readonly ageNanos: number };

interface PendingCommand {
  readonly requestId: number;
  readonly commandName: string;
  readonly operationId?: string;
  readonly startNanos: number;
}

export interface CorrelationTrackerOptions {
  /** Metric name prefix, e.g. `mongodb` */
  namespace: string;
  collector: MetricsCollector;
  timeSource?: TimeSource;
  logger?: BenchLogger;
}

/**
 * Metric and counter names written by a tracker
 */
export function correlationMetricNames(namespace: string) {
  return {
    clientRoundTrip: `${namespace}.client_round_trip`,
    serverExecution: `${namespace}.server_execution`,
    overhead: `${namespace}.overhead`,
    failedClientRoundTrip: `${namespace}.failed.client_round_trip`,
    completed: `${namespace}.completed`,
    failed: `${namespace}.failed`,
    missed: `${namespace}.missed`,
    clockSkew: `${namespace}.clock_skew`,
    evicted: `${namespace}.evicted`,
    commandClientRoundTrip: (command: string) => `${namespace}.${command}.client_round_trip`,
    commandServerExecution: (command: string) => `${namespace}.${command}.server_execution`,
  } as const;
}

/**
 * @example
 * ```typescript
 * const tracker = new CorrelationTracker({ namespace: 'mongodb', collector });
 *
 * client.on('commandStarted', (e) => tracker.onStart({ requestId: e.requestId, commandName: e.commandName }));
 * client.on('commandSucceeded', (e) =>
 *   tracker.onSuccess({ requestId: e.requestId, serverExecutionNanos: millis(e.duration) })
 * );
 * client.on('commandFailed', (e) => tracker.onFailure({ requestId: e.requestId }));
 * ```
 */
export class CorrelationTracker {
  readonly namespace: string;

  private readonly pending = new Map<number, PendingCommand>();
  private readonly collector: MetricsCollector;
  private readonly timeSource: TimeSource;
  private readonly logger?: BenchLogger;
  private readonly names: ReturnType<typeof correlationMetricNames>;

  private readonly completions$ = new Subject<CorrelatedTiming>();
  private readonly anomalies$ = new Subject<CorrelationAnomaly>();

  private sweeper: ReturnType<typeof setInterval> | null = null;

  private completedCount = 0;
  private failedCount = 0;
  private missedCount = 0;
  private evictedCount = 0;

  constructor(options: CorrelationTrackerOptions) {
    this.namespace = options.namespace;
    this.collector = options.collector;
    this.timeSource = options.timeSource ?? systemTime();
    this.logger = options.logger;
    this.names = correlationMetricNames(options.namespace);
  }

  /**
   * Register an outgoing command. A reused request id replaces the earlier entry.
   */
  onStart(event: CommandStart): void {
    this.pending.set(event.requestId, {
      requestId: event.requestId,
      commandName: event.commandName,
      ...(event.operationId !== undefined ? { operationId: event.operationId } : {}),
      startNanos: this.timeSource.nanoTime(),
    });
  }

  /**
   * Pair a success with its start. Returns the derived timing, or `undefined`
   * when no start was registered for the request id.
   */
  onSuccess(event: CommandSuccess): CorrelatedTiming | undefined {
    const started = this.take(event.requestId);
    if (!started) {
      this.recordMiss(event.requestId, 'success');
      return undefined;
    }

    const clientRoundTripNanos = this.timeSource.nanoTime() - started.startNanos;
    const serverExecutionNanos = Math.max(0, event.serverExecutionNanos);
    const rawOverhead = clientRoundTripNanos - serverExecutionNanos;
    const overheadNanos = Math.max(0, rawOverhead);

    if (rawOverhead < 0) {
      this.collector.addCounter(this.names.clockSkew);
      this.logger?.warn('Server execution exceeds client round trip', {
        requestId: started.requestId,
        commandName: started.commandName,
        clientRoundTripNanos,
        serverExecutionNanos,
      });
      this.anomalies$.next({
        kind: 'clock-skew',
        requestId: started.requestId,
        commandName: started.commandName,
        excessNanos: -rawOverhead,
      });
    }

    this.collector.recordTiming(this.names.clientRoundTrip, clientRoundTripNanos);
    this.collector.recordTiming(this.names.serverExecution, serverExecutionNanos);
    this.collector.recordTiming(this.names.overhead, overheadNanos);
    this.collector.recordTiming(this.names.commandClientRoundTrip(started.commandName), clientRoundTripNanos);
    this.collector.recordTiming(this.names.commandServerExecution(started.commandName), serverExecutionNanos);
    this.collector.addCounter(this.names.completed);
    this.completedCount++;

    const timing: CorrelatedTiming = {
      requestId: started.requestId,
      commandName: started.commandName,
      ...(started.operationId !== undefined ? { operationId: started.operationId } : {}),
      clientRoundTripNanos,
      serverExecutionNanos,
      overheadNanos,
    };
    this.completions$.next(timing);
    return timing;
  }

  /**
   * Pair a failure with its start. The failure counter always moves; the
   * round trip is only recorded when a start was registered.
   */
  onFailure(event: CommandFailure): void {
    const started = this.take(event.requestId);
    if (started) {
      this.collector.recordTiming(
        this.names.failedClientRoundTrip,
        this.timeSource.nanoTime() - started.startNanos
      );
    } else {
      this.recordMiss(event.requestId, 'failure');
    }
    this.collector.addCounter(this.names.failed);
    this.failedCount++;
  }

  /**
   * Drop pending entries older than `maxAgeNanos`. Returns how many were removed.
   */
  sweep(maxAgeNanos: number): number {
    const now = this.timeSource.nanoTime();
    let removed = 0;
    for (const [requestId, entry] of this.pending) {
      const ageNanos = now - entry.startNanos;
      if (ageNanos <= maxAgeNanos) continue;

      this.pending.delete(requestId);
      removed++;
      this.evictedCount++;
      this.collector.addCounter(this.names.evicted);
      this.anomalies$.next({ kind: 'evicted', requestId, commandName: entry.commandName, ageNanos });
    }
    if (removed > 0) {
      this.logger?.warn('Evicted stale pending commands', { namespace: this.namespace, removed });
    }
    return removed;
  }

  /**
   * Sweep on a timer. The timer does not keep the process alive.
   */
  startSweeper(intervalMs: number, maxAgeNanos: number): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => {
      this.sweep(maxAgeNanos);
    }, intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  /** Every successfully correlated command */
  completions(): Observable<CorrelatedTiming> {
    return this.completions$.asObservable();
  }

  /** Misses, clock skew and evictions */
  anomalies(): Observable<CorrelationAnomaly> {
    return this.anomalies$.asObservable();
  }

  getCompletedCount(): number {
    return this.completedCount;
  }

  getFailedCount(): number {
    return this.failedCount;
  }

  getMissedCount(): number {
    return this.missedCount;
  }

  getEvictedCount(): number {
    return this.evictedCount;
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  /** Completed plus failed */
  getTotalCount(): number {
    return this.completedCount + this.failedCount;
  }

  /**
   * Forget pending entries and zero the counts. Collector metrics are untouched.
   */
  reset(): void {
    this.pending.clear();
    this.completedCount = 0;
    this.failedCount = 0;
    this.missedCount = 0;
    this.evictedCount = 0;
  }

  /**
   * Stop the sweeper and complete both streams
   */
  destroy(): void {
    this.stopSweeper();
    this.pending.clear();
    this.completions$.complete();
    this.anomalies$.complete();
  }

  private take(requestId: number): PendingCommand | undefined {
    const entry = this.pending.get(requestId);
    if (entry) this.pending.delete(requestId);
    return entry;
  }

  private recordMiss(requestId: number, outcome: 'success' | 'failure'): void {
    this.missedCount++;
    this.collector.addCounter(this.names.missed);
    this.logger?.debug('Completion without a registered start', { requestId, outcome });
    this.anomalies$.next({ kind: 'miss', requestId, outcome });
  }
}
