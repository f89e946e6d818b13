/**
 * Decomposition of one operation's latency into named components.
 *
 * All durations are nanoseconds. A breakdown is validated and frozen on
 * construction; every derived quantity is computed on demand from the
 * thirteen base dimensions.
 *
 * @module metrics/overhead-breakdown
 */

import { BreakdownValidationError } from '../errors/bench-error.js';

/**
 * The thirteen base dimensions of a breakdown
 */
export const OVERHEAD_DIMENSIONS = [
  'totalLatency',
  'connectionAcquisition',
  'connectionRelease',
  'serializationTime',
  'wireTransmitTime',
  'serverExecutionTime',
  'serverParseTime',
  'serverTraversalTime',
  'serverIndexTime',
  'serverFetchTime',
  'wireReceiveTime',
  'deserializationTime',
  'clientTraversalTime',
] as const;

export type OverheadDimension = (typeof OVERHEAD_DIMENSIONS)[number];

/**
 * Base durations, in nanoseconds
 */
export type OverheadComponents = Record<OverheadDimension, number>;

/**
 * Plain-object form of a breakdown, including derived values
 */
export interface OverheadBreakdownJSON extends OverheadComponents {
  platformSpecific: Record<string, number>;
  totalOverhead: number;
  traversalOverhead: number;
  networkOverhead: number;
  serializationOverhead: number;
  connectionOverhead: number;
  overheadPercentage: number;
  traversalPercentage: number;
  networkPercentage: number;
  serializationPercentage: number;
  connectionPercentage: number;
}

function validateDuration(name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new BreakdownValidationError(name, value);
  }
  return value;
}

/**
 * Immutable overhead decomposition.
 *
 * @example
 * ```typescript
 * const breakdown = OverheadBreakdown.builder()
 *   .totalLatency(micros(1000))
 *   .serverFetchTime(micros(120))
 *   .build();
 *
 * breakdown.totalOverhead;      // 880_000 ns
 * breakdown.overheadPercentage; // 88
 * ```
 */
export class OverheadBreakdown implements OverheadComponents {
  readonly totalLatency: number;
  readonly connectionAcquisition: number;
  readonly connectionRelease: number;
  readonly serializationTime: number;
  readonly wireTransmitTime: number;
  readonly serverExecutionTime: number;
  readonly serverParseTime: number;
  readonly serverTraversalTime: number;
  readonly serverIndexTime: number;
  readonly serverFetchTime: number;
  readonly wireReceiveTime: number;
  readonly deserializationTime: number;
  readonly clientTraversalTime: number;

  /** Backend-specific durations keyed by metric name */
  readonly platformSpecific: ReadonlyMap<string, number>;

  constructor(components: OverheadComponents, platformSpecific: Iterable<[string, number]> = []) {
    // Validate everything before assigning anything.
    for (const dimension of OVERHEAD_DIMENSIONS) {
      validateDuration(dimension, components[dimension]);
    }
    const specific = new Map<string, number>();
    for (const [name, value] of platformSpecific) {
      specific.set(name, validateDuration(name, value));
    }

    this.totalLatency = components.totalLatency;
    this.connectionAcquisition = components.connectionAcquisition;
    this.connectionRelease = components.connectionRelease;
    this.serializationTime = components.serializationTime;
    this.wireTransmitTime = components.wireTransmitTime;
    this.serverExecutionTime = components.serverExecutionTime;
    this.serverParseTime = components.serverParseTime;
    this.serverTraversalTime = components.serverTraversalTime;
    this.serverIndexTime = components.serverIndexTime;
    this.serverFetchTime = components.serverFetchTime;
    this.wireReceiveTime = components.wireReceiveTime;
    this.deserializationTime = components.deserializationTime;
    this.clientTraversalTime = components.clientTraversalTime;
    this.platformSpecific = specific;

    Object.freeze(this);
  }

  static builder(): OverheadBreakdownBuilder {
    return new OverheadBreakdownBuilder();
  }

  /**
   * A breakdown that carries only the total latency
   */
  static totalOnly(totalLatency: number): OverheadBreakdown {
    return new OverheadBreakdownBuilder().totalLatency(totalLatency).build();
  }

  // ── Derived quantities ───────────────────────────────────────────────

  /** Everything except fetching the data itself, floored at zero */
  get totalOverhead(): number {
    return Math.max(0, this.totalLatency - this.serverFetchTime);
  }

  get traversalOverhead(): number {
    return this.serverTraversalTime + this.clientTraversalTime;
  }

  get networkOverhead(): number {
    return this.wireTransmitTime + this.wireReceiveTime;
  }

  get serializationOverhead(): number {
    return this.serializationTime + this.deserializationTime;
  }

  get connectionOverhead(): number {
    return this.connectionAcquisition + this.connectionRelease;
  }

  get overheadPercentage(): number {
    return this.percentageOf(this.totalOverhead);
  }

  get traversalPercentage(): number {
    return this.percentageOf(this.traversalOverhead);
  }

  get networkPercentage(): number {
    return this.percentageOf(this.networkOverhead);
  }

  get serializationPercentage(): number {
    return this.percentageOf(this.serializationOverhead);
  }

  get connectionPercentage(): number {
    return this.percentageOf(this.connectionOverhead);
  }

  /** Base dimensions as a plain record */
  components(): OverheadComponents {
    return {
      totalLatency: this.totalLatency,
      connectionAcquisition: this.connectionAcquisition,
      connectionRelease: this.connectionRelease,
      serializationTime: this.serializationTime,
      wireTransmitTime: this.wireTransmitTime,
      serverExecutionTime: this.serverExecutionTime,
      serverParseTime: this.serverParseTime,
      serverTraversalTime: this.serverTraversalTime,
      serverIndexTime: this.serverIndexTime,
      serverFetchTime: this.serverFetchTime,
      wireReceiveTime: this.wireReceiveTime,
      deserializationTime: this.deserializationTime,
      clientTraversalTime: this.clientTraversalTime,
    };
  }

  toJSON(): OverheadBreakdownJSON {
    return {
      ...this.components(),
      platformSpecific: Object.fromEntries(this.platformSpecific),
      totalOverhead: this.totalOverhead,
      traversalOverhead: this.traversalOverhead,
      networkOverhead: this.networkOverhead,
      serializationOverhead: this.serializationOverhead,
      connectionOverhead: this.connectionOverhead,
      overheadPercentage: this.overheadPercentage,
      traversalPercentage: this.traversalPercentage,
      networkPercentage: this.networkPercentage,
      serializationPercentage: this.serializationPercentage,
      connectionPercentage: this.connectionPercentage,
    };
  }

  private percentageOf(value: number): number {
    if (this.totalLatency === 0) return 0;
    return (value / this.totalLatency) * 100;
  }
}

/**
 * Accumulates dimensions one at a time; unset dimensions build as zero.
 */
export class OverheadBreakdownBuilder {
  private readonly components: OverheadComponents = {
    totalLatency: 0,
    connectionAcquisition: 0,
    connectionRelease: 0,
    serializationTime: 0,
    wireTransmitTime: 0,
    serverExecutionTime: 0,
    serverParseTime: 0,
    serverTraversalTime: 0,
    serverIndexTime: 0,
    serverFetchTime: 0,
    wireReceiveTime: 0,
    deserializationTime: 0,
    clientTraversalTime: 0,
  };
  private readonly platformSpecific = new Map<string, number>();

  set(dimension: OverheadDimension, nanos: number): this {
    this.components[dimension] = nanos;
    return this;
  }

  totalLatency(nanos: number): this {
    return this.set('totalLatency', nanos);
  }

  connectionAcquisition(nanos: number): this {
    return this.set('connectionAcquisition', nanos);
  }

  connectionRelease(nanos: number): this {
    return this.set('connectionRelease', nanos);
  }

  serializationTime(nanos: number): this {
    return this.set('serializationTime', nanos);
  }

  wireTransmitTime(nanos: number): this {
    return this.set('wireTransmitTime', nanos);
  }

  serverExecutionTime(nanos: number): this {
    return this.set('serverExecutionTime', nanos);
  }

  serverParseTime(nanos: number): this {
    return this.set('serverParseTime', nanos);
  }

  serverTraversalTime(nanos: number): this {
    return this.set('serverTraversalTime', nanos);
  }

  serverIndexTime(nanos: number): this {
    return this.set('serverIndexTime', nanos);
  }

  serverFetchTime(nanos: number): this {
    return this.set('serverFetchTime', nanos);
  }

  wireReceiveTime(nanos: number): this {
    return this.set('wireReceiveTime', nanos);
  }

  deserializationTime(nanos: number): this {
    return this.set('deserializationTime', nanos);
  }

  clientTraversalTime(nanos: number): this {
    return this.set('clientTraversalTime', nanos);
  }

  addPlatformSpecific(name: string, nanos: number): this {
    this.platformSpecific.set(name, nanos);
    return this;
  }

  build(): OverheadBreakdown {
    return new OverheadBreakdown({ ...this.components }, this.platformSpecific);
  }
}
