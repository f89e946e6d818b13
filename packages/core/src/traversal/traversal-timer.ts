/**
 * Field-level timing while a client decodes or walks a result document.
 *
 * Each operation gets its own context keyed by operation id, so interleaved
 * operations never see each other's counters. Mutators called with an id
 * that has no context are ignored.
 *
 * @module traversal/traversal-timer
 */

import type { MetricsCollector } from '../metrics/metrics-collector.js';
import { systemTime, type TimeSource } from '../time/time-source.js';

/**
 * Summary of one operation's traversal
 */
export interface TraversalBreakdown {
  /** Start to end, in nanoseconds; 0 until the traversal has ended */
  readonly totalTime: number;
  readonly fieldCount: number;
  readonly maxNestingDepth: number;
  /** Highest ordinal position reported for a field, or -1 */
  readonly lastFieldPosition: number;
  readonly totalArrayElements: number;
}

class TraversalContext {
  readonly startTime: number;
  lastEventTime: number;
  endTime: number | null = null;
  fieldAccessCount = 0;
  readonly fieldPositions = new Map<string, number>();
  readonly arrayElementCounts = new Map<string, number>();
  totalArrayElements = 0;
  currentNestingDepth = 0;
  maxNestingDepth = 0;
  lastFieldPosition = -1;

  constructor(startTime: number) {
    this.startTime = startTime;
    this.lastEventTime = startTime;
  }

  recordField(fieldName: string, position: number): void {
    this.fieldAccessCount++;
    if (position >= 0) {
      this.fieldPositions.set(fieldName, position);
      this.lastFieldPosition = Math.max(this.lastFieldPosition, position);
    }
  }

  enterNested(): void {
    this.currentNestingDepth++;
    this.maxNestingDepth = Math.max(this.maxNestingDepth, this.currentNestingDepth);
  }

  exitNested(): void {
    if (this.currentNestingDepth > 0) this.currentNestingDepth--;
  }

  enterArray(arrayName: string): void {
    if (!this.arrayElementCounts.has(arrayName)) this.arrayElementCounts.set(arrayName, 0);
  }

  recordArrayElement(arrayName: string): void {
    this.arrayElementCounts.set(arrayName, (this.arrayElementCounts.get(arrayName) ?? 0) + 1);
    this.totalArrayElements++;
  }

  totalTime(): number {
    return this.endTime === null ? 0 : this.endTime - this.startTime;
  }
}

export interface TraversalTimerOptions {
  /** Metric name prefix, e.g. `bson` */
  namespace: string;
  collector: MetricsCollector;
  timeSource?: TimeSource;
}

export class TraversalTimer {
  readonly namespace: string;

  private readonly collector: MetricsCollector;
  private readonly timeSource: TimeSource;
  private readonly contexts = new Map<string, TraversalContext>();

  constructor(options: TraversalTimerOptions) {
    this.namespace = options.namespace;
    this.collector = options.collector;
    this.timeSource = options.timeSource ?? systemTime();
  }

  /** Open a fresh context, replacing any earlier one for the same id */
  startDeserialization(operationId: string): void {
    this.contexts.set(operationId, new TraversalContext(this.timeSource.nanoTime()));
  }

  /**
   * Count a field access and record the time since the previous event under
   * `<ns>.field_access.<field>`. A negative position is counted but not stored.
   */
  recordFieldAccess(operationId: string, fieldName: string, position = -1): void {
    const ctx = this.contexts.get(operationId);
    if (!ctx) return;

    const now = this.timeSource.nanoTime();
    ctx.recordField(fieldName, position);
    this.collector.recordTiming(`${this.namespace}.field_access.${fieldName}`, now - ctx.lastEventTime);
    ctx.lastEventTime = now;
  }

  enterNestedDocument(operationId: string, _fieldName?: string): void {
    this.touch(operationId, (ctx) => ctx.enterNested());
  }

  exitNestedDocument(operationId: string): void {
    this.touch(operationId, (ctx) => ctx.exitNested());
  }

  enterArray(operationId: string, arrayName: string): void {
    this.touch(operationId, (ctx) => ctx.enterArray(arrayName));
  }

  exitArray(operationId: string): void {
    this.touch(operationId, () => undefined);
  }

  recordArrayElementAccess(operationId: string, arrayName: string, _index?: number): void {
    this.touch(operationId, (ctx) => ctx.recordArrayElement(arrayName));
  }

  /**
   * Close the context's timing and emit `<ns>.deserialization.total` plus the
   * `<ns>.deserialization.field_count` counter. The context stays queryable
   * until {@link clear}.
   */
  endDeserialization(operationId: string): void {
    const ctx = this.contexts.get(operationId);
    if (!ctx) return;

    ctx.endTime = this.timeSource.nanoTime();
    this.collector.recordTiming(`${this.namespace}.deserialization.total`, ctx.totalTime());
    this.collector.addCounter(`${this.namespace}.deserialization.field_count`, ctx.fieldAccessCount);
  }

  getFieldAccessCount(operationId: string): number {
    return this.contexts.get(operationId)?.fieldAccessCount ?? 0;
  }

  /** Ordinal position recorded for a field, or -1 */
  getFieldPosition(operationId: string, fieldName: string): number {
    return this.contexts.get(operationId)?.fieldPositions.get(fieldName) ?? -1;
  }

  getMaxNestingDepth(operationId: string): number {
    return this.contexts.get(operationId)?.maxNestingDepth ?? 0;
  }

  getArrayElementCount(operationId: string, arrayName: string): number {
    return this.contexts.get(operationId)?.arrayElementCounts.get(arrayName) ?? 0;
  }

  getTotalDeserializationTime(operationId: string): number {
    return this.contexts.get(operationId)?.totalTime() ?? 0;
  }

  getDeserializationBreakdown(operationId: string): TraversalBreakdown | undefined {
    const ctx = this.contexts.get(operationId);
    if (!ctx) return undefined;

    return {
      totalTime: ctx.totalTime(),
      fieldCount: ctx.fieldAccessCount,
      maxNestingDepth: ctx.maxNestingDepth,
      lastFieldPosition: ctx.lastFieldPosition,
      totalArrayElements: ctx.totalArrayElements,
    };
  }

  /** Number of open or ended contexts not yet cleared */
  activeCount(): number {
    return this.contexts.size;
  }

  clear(operationId: string): void {
    this.contexts.delete(operationId);
  }

  private touch(operationId: string, mutate: (ctx: TraversalContext) => void): void {
    const ctx = this.contexts.get(operationId);
    if (!ctx) return;
    mutate(ctx);
    ctx.lastEventTime = this.timeSource.nanoTime();
  }
}
