/**
 * Percentile histogram over nanosecond samples.
 *
 * Thin wrapper around an HDR histogram configured for three significant
 * digits. The trackable range starts at 1 ns and resizes automatically, so
 * samples from tens of nanoseconds to many seconds share one structure with a
 * fixed relative error and bounded memory.
 *
 * @module metrics/histogram
 */

import { build, type Histogram } from 'hdr-histogram-js';

/** Significant decimal digits kept by every histogram */
export const HISTOGRAM_PRECISION = 3;

/** Initial upper bound: one hour in nanoseconds (grows on demand) */
const INITIAL_HIGHEST_TRACKABLE = 3_600_000_000_000;

/**
 * Read-only view of a timing distribution
 */
export interface TimingStats {
  count(): number;
  mean(): number;
  /** Value at the given percentile (0–100) */
  percentile(p: number): number;
  min(): number;
  max(): number;
  stdDeviation(): number;
}

function createHdr(): Histogram {
  return build({
    lowestDiscernibleValue: 1,
    highestTrackableValue: INITIAL_HIGHEST_TRACKABLE,
    numberOfSignificantValueDigits: HISTOGRAM_PRECISION,
    autoResize: true,
    bitBucketSize: 64,
    useWebAssembly: false,
  });
}

/**
 * Mutable histogram of nanosecond durations
 */
export class LatencyHistogram implements TimingStats {
  private readonly hdr: Histogram;

  constructor() {
    this.hdr = createHdr();
  }

  /** Record one sample; negative values are clamped to zero */
  record(nanos: number): void {
    this.hdr.recordValue(Math.max(0, Math.round(nanos)));
  }

  count(): number {
    return this.hdr.totalCount;
  }

  mean(): number {
    return this.hdr.totalCount === 0 ? 0 : this.hdr.mean;
  }

  percentile(p: number): number {
    if (this.hdr.totalCount === 0) return 0;
    return this.hdr.getValueAtPercentile(Math.min(100, Math.max(0, p)));
  }

  min(): number {
    return this.hdr.totalCount === 0 ? 0 : this.hdr.getValueAtPercentile(0);
  }

  max(): number {
    return this.hdr.maxValue;
  }

  stdDeviation(): number {
    return this.hdr.totalCount === 0 ? 0 : this.hdr.stdDeviation;
  }

  /** Independent copy of the current distribution */
  copy(): LatencyHistogram {
    const clone = new LatencyHistogram();
    clone.hdr.add(this.hdr);
    return clone;
  }

  reset(): void {
    this.hdr.reset();
  }
}
