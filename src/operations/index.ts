/**
 * IntervalOps - pipeline-style operations over BED intervals
 *
 * Stages are lazy and stream through an async iterable until a terminal
 * method (`collect`, `count`, `summarize`, `writeBed`) pulls them. Sorting
 * and merging must see the whole input and buffer it.
 *
 * @example
 * ```typescript
 * const merged = await IntervalOps.fromBed("peaks.bed")
 *   .filter({ minSize: 50 })
 *   .merge({ chromosomeOrder: "natural" })
 *   .collect();
 * ```
 */

import { BedParser } from "../formats/bed/parser";
import type { BedParserOptions, BedWriterOptions, GenomicInterval } from "../formats/bed/types";
import { BedWriter } from "../formats/bed/writer";
import type { FileReaderOptions } from "../io/file-reader";
import { writeString } from "../io/file-writer";
import type { Strand } from "../types";
import { mergeIntervals, sortIntervals, type ChromosomeOrder, type MergeOptions } from "./merge";
import { regionLength, summarizeRegions, type RegionSummary } from "./regions";

/**
 * Declarative filter; every given criterion must hold
 */
export interface IntervalFilterOptions {
  /** Inclusive lower bound on `end - start` */
  minSize?: number;
  /** Inclusive upper bound on `end - start` */
  maxSize?: number;
  strand?: Strand;
  sequenceNames?: readonly string[];
}

type IntervalPredicate = (interval: GenomicInterval) => boolean;

function toPredicate(options: IntervalFilterOptions): IntervalPredicate {
  const names = options.sequenceNames !== undefined ? new Set(options.sequenceNames) : undefined;
  return (interval) => {
    const length = regionLength(interval);
    if (options.minSize !== undefined && length < options.minSize) return false;
    if (options.maxSize !== undefined && length > options.maxSize) return false;
    if (options.strand !== undefined && interval.strand !== options.strand) return false;
    if (names !== undefined && !names.has(interval.sequenceName)) return false;
    return true;
  };
}

export class IntervalOps implements AsyncIterable<GenomicInterval> {
  constructor(private readonly source: AsyncIterable<GenomicInterval>) {}

  // =============================================================================
  // STATIC FACTORY METHODS
  // =============================================================================

  static from(intervals: Iterable<GenomicInterval>): IntervalOps {
    async function* arrayToAsyncIterable(): AsyncIterable<GenomicInterval> {
      for (const interval of intervals) {
        yield interval;
      }
    }
    return new IntervalOps(arrayToAsyncIterable());
  }

  /**
   * Start a pipeline from a BED file. The file is read when the pipeline
   * is first pulled; per-line problems go to the parser's hooks.
   *
   * @throws {FileError} When the file cannot be read
   */
  static fromBed(
    path: string,
    options: BedParserOptions = {},
    fileOptions: FileReaderOptions = {}
  ): IntervalOps {
    async function* parseFile(): AsyncIterable<GenomicInterval> {
      const { records } = await new BedParser(options).parseFile(path, {}, fileOptions);
      yield* records;
    }
    return new IntervalOps(parseFile());
  }

  // =============================================================================
  // STREAMING STAGES
  // =============================================================================

  /**
   * @example
   * ```typescript
   * intervalOps(source).filter({ strand: "+", minSize: 100 });
   * intervalOps(source).filter((interval) => interval.name !== undefined);
   * ```
   */
  filter(criteria: IntervalFilterOptions | IntervalPredicate): IntervalOps {
    const predicate = typeof criteria === "function" ? criteria : toPredicate(criteria);
    async function* keep(source: AsyncIterable<GenomicInterval>): AsyncIterable<GenomicInterval> {
      for await (const interval of source) {
        if (predicate(interval)) yield interval;
      }
    }
    return new IntervalOps(keep(this.source));
  }

  head(n: number): IntervalOps {
    async function* take(source: AsyncIterable<GenomicInterval>): AsyncIterable<GenomicInterval> {
      if (n <= 0) return;
      let count = 0;
      for await (const interval of source) {
        yield interval;
        if (++count >= n) break;
      }
    }
    return new IntervalOps(take(this.source));
  }

  // =============================================================================
  // BUFFERING STAGES
  // =============================================================================

  sort(order: ChromosomeOrder = "lexical"): IntervalOps {
    return this.buffered((all) => sortIntervals(all, order));
  }

  merge(options: MergeOptions = {}): IntervalOps {
    return this.buffered((all) => mergeIntervals(all, options));
  }

  private buffered(
    apply: (intervals: GenomicInterval[]) => GenomicInterval[]
  ): IntervalOps {
    const { source } = this;
    async function* run(): AsyncIterable<GenomicInterval> {
      const all: GenomicInterval[] = [];
      for await (const interval of source) {
        all.push(interval);
      }
      yield* apply(all);
    }
    return new IntervalOps(run());
  }

  // =============================================================================
  // TERMINAL OPERATIONS
  // =============================================================================

  async collect(): Promise<GenomicInterval[]> {
    const results: GenomicInterval[] = [];
    for await (const interval of this.source) {
      results.push(interval);
    }
    return results;
  }

  async count(): Promise<number> {
    let count = 0;
    for await (const _interval of this.source) {
      count++;
    }
    return count;
  }

  async summarize(): Promise<RegionSummary> {
    return summarizeRegions(await this.collect());
  }

  /**
   * @throws {FileError} When the destination cannot be written
   */
  async writeBed(path: string, options: BedWriterOptions = {}): Promise<void> {
    const writer = new BedWriter(options);
    await writeString(path, writer.formatDocument(await this.collect()));
  }

  [Symbol.asyncIterator](): AsyncIterator<GenomicInterval> {
    return this.source[Symbol.asyncIterator]();
  }
}

/**
 * @example
 * ```typescript
 * const count = await intervalOps(stream).filter({ strand: "-" }).count();
 * ```
 */
export function intervalOps(intervals: AsyncIterable<GenomicInterval>): IntervalOps {
  return new IntervalOps(intervals);
}

export {
  BED_ATTRIBUTE_KEYS,
  bedToGff,
  convertDataset,
  featureToInterval,
  gffToBed,
  intervalToFeature,
  type ConversionResult,
  type FeatureConversion,
} from "./convert";
export {
  compareSequenceNames,
  mergeIntervals,
  overlaps,
  sortIntervals,
  touchesOrOverlaps,
  type ChromosomeOrder,
  type MergeOptions,
} from "./merge";
export {
  distanceToNext,
  filterBySize,
  regionLength,
  selectByStrand,
  selectLargeRegions,
  summarizeByChromosome,
  summarizeRegions,
  type RegionSummary,
  type SequenceRegionStats,
} from "./regions";
