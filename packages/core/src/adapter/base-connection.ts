import type { MetricsCollector } from '../metrics/metrics-collector.js';
import { type BenchLogger, silentLogger } from '../observability/logger.js';
import { systemTime, type TimeSource } from '../time/time-source.js';
import type { InstrumentedConnection } from './adapter.js';
import { ConnectionTimingMetrics, type TimingListener } from './timing.js';

export interface BaseConnectionOptions {
  /** Connection id; adapters usually derive it from their own id */
  id: string;
  collector: MetricsCollector;
  timeSource?: TimeSource;
  logger?: BenchLogger;
}

type ListenerEvent = {
  [K in keyof TimingListener]-?: NonNullable<TimingListener[K]> extends (...args: infer A) => void ? A : never;
};

/**
 * Shared bookkeeping for instrumented connections: listener fan-out,
 * timing accumulators and an idempotent close.
 *
 * Subclasses hold the backend handle and implement {@link closeBackend}.
 */
export abstract class BaseInstrumentedConnection implements InstrumentedConnection {
  readonly id: string;
  readonly collector: MetricsCollector;

  protected readonly timeSource: TimeSource;
  protected readonly logger: BenchLogger;

  private readonly listeners = new Set<TimingListener>();
  private closed = false;
  private closing: Promise<void> | null = null;

  private serializationNanos = 0;
  private wireTransmitNanos = 0;
  private wireReceiveNanos = 0;
  private deserializationNanos = 0;
  private bytesSent = 0;
  private bytesReceived = 0;
  private operationCount = 0;

  constructor(options: BaseConnectionOptions) {
    this.id = options.id;
    this.collector = options.collector;
    this.timeSource = options.timeSource ?? systemTime();
    this.logger = options.logger ?? silentLogger;
  }

  isValid(): boolean {
    return !this.closed && this.isBackendOpen();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  addTimingListener(listener: TimingListener): void {
    this.listeners.add(listener);
  }

  removeTimingListener(listener: TimingListener): void {
    this.listeners.delete(listener);
  }

  getTimingMetrics(): ConnectionTimingMetrics {
    return new ConnectionTimingMetrics(
      this.serializationNanos,
      this.wireTransmitNanos,
      this.wireReceiveNanos,
      this.deserializationNanos,
      this.bytesSent,
      this.bytesReceived,
      this.operationCount
    );
  }

  resetTimingMetrics(): void {
    this.serializationNanos = 0;
    this.wireTransmitNanos = 0;
    this.wireReceiveNanos = 0;
    this.deserializationNanos = 0;
    this.bytesSent = 0;
    this.bytesReceived = 0;
    this.operationCount = 0;
    this.collector.reset();
  }

  /**
   * Count one executed operation
   */
  recordOperation(): void {
    this.operationCount++;
  }

  /**
   * Time an encode step and report its size to listeners
   */
  timeSerialization<T>(operationId: string, encode: () => T, sizeOf: (encoded: T) => number): { value: T; nanos: number } {
    this.emit('onSerializationStart', operationId);
    const start = this.timeSource.nanoTime();
    const value = encode();
    const nanos = this.timeSource.nanoTime() - start;
    const bytes = sizeOf(value);
    this.serializationNanos += nanos;
    this.emit('onSerializationComplete', operationId, bytes);
    return { value, nanos };
  }

  /**
   * Time a decode step and report how many fields it produced
   */
  timeDeserialization<T>(
    operationId: string,
    decode: () => T,
    fieldCount: (decoded: T) => number
  ): { value: T; nanos: number } {
    this.emit('onDeserializationStart', operationId);
    const start = this.timeSource.nanoTime();
    const value = decode();
    const nanos = this.timeSource.nanoTime() - start;
    this.deserializationNanos += nanos;
    this.emit('onDeserializationComplete', operationId, fieldCount(value));
    return { value, nanos };
  }

  /**
   * Account for a finished transmission measured elsewhere
   */
  recordWireTransmit(operationId: string, nanos: number, bytes: number): void {
    this.emit('onWireTransmitStart', operationId);
    this.wireTransmitNanos += nanos;
    this.bytesSent += bytes;
    this.emit('onWireTransmitComplete', operationId, bytes);
  }

  /**
   * Account for a finished reply measured elsewhere
   */
  recordWireReceive(operationId: string, nanos: number, bytes: number): void {
    this.emit('onWireReceiveStart', operationId);
    this.wireReceiveNanos += nanos;
    this.bytesReceived += bytes;
    this.emit('onWireReceiveComplete', operationId, bytes);
  }

  /**
   * Close the backend handle once; later calls wait for the first to finish
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closed = true;
      this.listeners.clear();
      this.closing = this.closeBackend().then(() => {
        this.logger.debug('Connection closed', { connectionId: this.id });
      });
    }
    return this.closing;
  }

  /**
   * Whether the backend handle is still usable
   */
  protected isBackendOpen(): boolean {
    return true;
  }

  protected abstract closeBackend(): Promise<void>;

  private emit<K extends keyof ListenerEvent>(event: K, ...args: ListenerEvent[K]): void {
    for (const listener of this.listeners) {
      const handler = listener[event];
      if (!handler) continue;
      try {
        Reflect.apply(handler, listener, args);
      } catch (error) {
        this.logger.warn('Timing listener threw', {
          event,
          connectionId: this.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
