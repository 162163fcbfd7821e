/**
 * Interval algebra: overlap tests, ordering and merging
 *
 * Merging is lossy by nature. A run of overlapping or book-ended intervals
 * becomes one interval that keeps the first record's name, score and strand
 * and drops thick, colour, block and extra columns, which have no meaning
 * for the union.
 *
 * @module operations/merge
 */

import type { GenomicInterval } from "../formats/bed/types";

export type ChromosomeOrder = "lexical" | "natural";

export interface MergeOptions {
  /** How sequence names are ordered (default: "lexical", by code unit) */
  chromosomeOrder?: ChromosomeOrder;
}

const CHUNK = /(\d+|\D+)/g;

function compareNatural(a: string, b: string): number {
  const left = a.match(CHUNK) ?? [];
  const right = b.match(CHUNK) ?? [];
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? "";
    const y = right[i] ?? "";
    if (x === y) continue;
    if (/^\d/.test(x) && /^\d/.test(y)) {
      const difference = Number(x) - Number(y);
      if (difference !== 0) return difference;
      // Same value, different zero padding
      return x.length - y.length;
    }
    return x < y ? -1 : 1;
  }
  return left.length - right.length;
}

/**
 * Compare two sequence names
 *
 * @example
 * ```typescript
 * compareSequenceNames("chr10", "chr2", "lexical"); // < 0
 * compareSequenceNames("chr10", "chr2", "natural"); // > 0
 * ```
 */
export function compareSequenceNames(a: string, b: string, order: ChromosomeOrder = "lexical"): number {
  if (order === "natural") return compareNatural(a, b);
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Stable sort by (sequence name, start). Ties keep their input order.
 */
export function sortIntervals(
  records: Iterable<GenomicInterval>,
  order: ChromosomeOrder = "lexical"
): GenomicInterval[] {
  return Array.from(records).sort(
    (a, b) => compareSequenceNames(a.sequenceName, b.sequenceName, order) || a.start - b.start
  );
}

/**
 * True when the half-open intervals share at least one base
 */
export function overlaps(a: GenomicInterval, b: GenomicInterval): boolean {
  return a.sequenceName === b.sequenceName && a.start < b.end && b.start < a.end;
}

/**
 * True when the intervals overlap or are book-ended (one ends where the
 * other starts)
 */
export function touchesOrOverlaps(a: GenomicInterval, b: GenomicInterval): boolean {
  return a.sequenceName === b.sequenceName && a.start <= b.end && b.start <= a.end;
}

interface Run {
  readonly first: GenomicInterval;
  end: number;
  size: number;
}

function flush(run: Run): GenomicInterval {
  if (run.size === 1) return run.first;

  const { first } = run;
  return Object.freeze({
    sequenceName: first.sequenceName,
    start: first.start,
    end: run.end,
    ...(first.name !== undefined ? { name: first.name } : {}),
    ...(first.score !== undefined ? { score: first.score } : {}),
    strand: first.strand,
  });
}

/**
 * Merge overlapping and book-ended intervals per sequence
 *
 * The input is never modified. The output is sorted, and no two of its
 * intervals on the same sequence overlap or touch, so merging it again
 * returns the same intervals.
 *
 * @example
 * ```typescript
 * mergeIntervals([
 *   { sequenceName: "chr1", start: 0, end: 10, strand: "." },
 *   { sequenceName: "chr1", start: 5, end: 20, strand: "." },
 * ]);
 * // [{ sequenceName: "chr1", start: 0, end: 20, strand: "." }]
 * ```
 */
export function mergeIntervals(
  records: Iterable<GenomicInterval>,
  options: MergeOptions = {}
): GenomicInterval[] {
  const sorted = sortIntervals(records, options.chromosomeOrder ?? "lexical");
  const merged: GenomicInterval[] = [];
  let run: Run | undefined;

  for (const record of sorted) {
    if (run !== undefined && record.sequenceName === run.first.sequenceName && record.start <= run.end) {
      run.end = Math.max(run.end, record.end);
      run.size++;
      continue;
    }
    if (run !== undefined) merged.push(flush(run));
    run = { first: record, end: record.end, size: 1 };
  }
  if (run !== undefined) merged.push(flush(run));

  return merged;
}
