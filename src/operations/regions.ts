/**
 * Region summaries and selections over BED intervals
 *
 * @module operations/regions
 */

import { resolveConfig, type IntervalConfig } from "../config";
import type { GenomicInterval } from "../formats/bed/types";
import type { Strand } from "../types";

/**
 * Whole-dataset summary
 */
export interface RegionSummary {
  count: number;
  totalBases: number;
  sequenceCount: number;
  strandCounts: Record<Strand, number>;
}

/**
 * Per-sequence length statistics
 */
export interface SequenceRegionStats {
  sequenceName: string;
  count: number;
  totalBases: number;
  minLength: number;
  maxLength: number;
  meanLength: number;
}

export function regionLength(interval: GenomicInterval): number {
  return interval.end - interval.start;
}

/**
 * @example
 * ```typescript
 * summarizeRegions(records);
 * // { count: 3, totalBases: 450, sequenceCount: 2, strandCounts: { "+": 2, "-": 1, ".": 0 } }
 * ```
 */
export function summarizeRegions(intervals: Iterable<GenomicInterval>): RegionSummary {
  const summary: RegionSummary = {
    count: 0,
    totalBases: 0,
    sequenceCount: 0,
    strandCounts: { "+": 0, "-": 0, ".": 0 },
  };
  const sequences = new Set<string>();

  for (const interval of intervals) {
    summary.count++;
    summary.totalBases += regionLength(interval);
    summary.strandCounts[interval.strand]++;
    sequences.add(interval.sequenceName);
  }

  summary.sequenceCount = sequences.size;
  return summary;
}

/**
 * Length statistics per sequence, in order of first appearance
 */
export function summarizeByChromosome(intervals: Iterable<GenomicInterval>): SequenceRegionStats[] {
  const bySequence = new Map<string, SequenceRegionStats>();

  for (const interval of intervals) {
    const length = regionLength(interval);
    const stats = bySequence.get(interval.sequenceName);
    if (stats === undefined) {
      bySequence.set(interval.sequenceName, {
        sequenceName: interval.sequenceName,
        count: 1,
        totalBases: length,
        minLength: length,
        maxLength: length,
        meanLength: length,
      });
      continue;
    }
    stats.count++;
    stats.totalBases += length;
    stats.minLength = Math.min(stats.minLength, length);
    stats.maxLength = Math.max(stats.maxLength, length);
    stats.meanLength = stats.totalBases / stats.count;
  }

  return Array.from(bySequence.values());
}

/**
 * Intervals whose length lies in [minRegionSize, maxRegionSize]
 *
 * @throws {ValidationError} When the thresholds are invalid or crossed
 *
 * @example
 * ```typescript
 * filterBySize(records, { minRegionSize: 100, maxRegionSize: 5_000 });
 * ```
 */
export function filterBySize(
  intervals: Iterable<GenomicInterval>,
  config: Partial<IntervalConfig> = {}
): GenomicInterval[] {
  const { minRegionSize, maxRegionSize } = resolveConfig(config);
  const selected: GenomicInterval[] = [];
  for (const interval of intervals) {
    const length = regionLength(interval);
    if (length >= minRegionSize && length <= maxRegionSize) {
      selected.push(interval);
    }
  }
  return selected;
}

/**
 * Intervals strictly longer than `maxRegionSize`
 *
 * @throws {ValidationError} When the thresholds are invalid or crossed
 */
export function selectLargeRegions(
  intervals: Iterable<GenomicInterval>,
  config: Partial<IntervalConfig> = {}
): GenomicInterval[] {
  const { maxRegionSize } = resolveConfig(config);
  const selected: GenomicInterval[] = [];
  for (const interval of intervals) {
    if (regionLength(interval) > maxRegionSize) {
      selected.push(interval);
    }
  }
  return selected;
}

export function selectByStrand(intervals: Iterable<GenomicInterval>, strand: Strand): GenomicInterval[] {
  const selected: GenomicInterval[] = [];
  for (const interval of intervals) {
    if (interval.strand === strand) {
      selected.push(interval);
    }
  }
  return selected;
}

/**
 * Gap from each interval to the next one on the same sequence in stream
 * order, skipping intervals on other sequences. Negative when they overlap;
 * undefined when no later interval shares the sequence.
 *
 * @example
 * ```typescript
 * distanceToNext([chr1_0_10, chr2_0_10, chr1_20_30]); // [10, undefined, undefined]
 * ```
 */
export function distanceToNext(intervals: Iterable<GenomicInterval>): (number | undefined)[] {
  const list = Array.from(intervals);
  const gaps = new Array<number | undefined>(list.length);
  const nextStart = new Map<string, number>();

  for (let i = list.length - 1; i >= 0; i--) {
    const interval = list[i];
    if (interval === undefined) continue;
    const start = nextStart.get(interval.sequenceName);
    gaps[i] = start === undefined ? undefined : start - interval.end;
    nextStart.set(interval.sequenceName, interval.start);
  }
  return gaps;
}
