import {
  BaseInstrumentedConnection,
  type BaseConnectionOptions,
  type CorrelatedTiming,
  CorrelationTracker,
  millis,
} from '@latency-lab/core';
import type { Subscription } from 'rxjs';
import type { MongoDriver } from './types.js';

export interface MongoConnectionOptions extends BaseConnectionOptions {
  driver: MongoDriver;
  database: string;
}

/**
 * Server timing gathered for one benchmark operation across its commands
 */
export interface OperationServerTiming {
  readonly commands: number;
  readonly serverExecutionNanos: number;
  readonly clientRoundTripNanos: number;
}

/**
 * Session over one MongoDB client.
 *
 * Command-monitoring events feed a correlation tracker writing into this
 * connection's collector. Completions that name an operation are kept until
 * the adapter takes them to build that operation's breakdown.
 */
export class MongoConnection extends BaseInstrumentedConnection {
  readonly driver: MongoDriver;
  readonly database: string;
  readonly tracker: CorrelationTracker;

  private readonly serverTimings = new Map<string, OperationServerTiming>();
  private readonly subscription: Subscription;
  private readonly unobserve: () => void;

  constructor(options: MongoConnectionOptions) {
    super(options);
    this.driver = options.driver;
    this.database = options.database;
    this.tracker = new CorrelationTracker({
      namespace: 'mongodb',
      collector: this.collector,
      timeSource: this.timeSource,
      logger: this.logger,
    });

    this.subscription = this.tracker.completions().subscribe((timing) => this.accumulate(timing));
    this.unobserve = this.driver.observe({
      started: (event) => this.tracker.onStart(event),
      succeeded: (event) => {
        this.tracker.onSuccess({ requestId: event.requestId, serverExecutionNanos: millis(event.durationMs) });
      },
      failed: (event) => this.tracker.onFailure(event),
    });
  }

  /**
   * Remove and return the server timing collected for an operation
   */
  takeServerTiming(operationId: string): OperationServerTiming | undefined {
    const timing = this.serverTimings.get(operationId);
    this.serverTimings.delete(operationId);
    return timing;
  }

  /**
   * Also forgets correlation state, so commands issued before the reset
   * leave no trace in the tracker or the collector
   */
  override resetTimingMetrics(): void {
    super.resetTimingMetrics();
    this.tracker.reset();
    this.serverTimings.clear();
  }

  protected override isBackendOpen(): boolean {
    return this.driver.isOpen();
  }

  protected async closeBackend(): Promise<void> {
    this.unobserve();
    this.subscription.unsubscribe();
    this.tracker.destroy();
    this.serverTimings.clear();
    await this.driver.close();
  }

  private accumulate(timing: CorrelatedTiming): void {
    if (timing.operationId === undefined) return;
    const previous = this.serverTimings.get(timing.operationId);
    this.serverTimings.set(timing.operationId, {
      commands: (previous?.commands ?? 0) + 1,
      serverExecutionNanos: (previous?.serverExecutionNanos ?? 0) + timing.serverExecutionNanos,
      clientRoundTripNanos: (previous?.clientRoundTripNanos ?? 0) + timing.clientRoundTripNanos,
    });
  }
}
