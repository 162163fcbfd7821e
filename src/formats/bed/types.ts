/**
 * BED record types and schema
 */

import { type } from "arktype";
import type { ParserOptions, Rgb, Strand } from "../../types";

/**
 * One exon-like sub-block of a BED12 record
 */
export interface BedBlock {
  readonly size: number;
  /** Offset from the record's start */
  readonly relativeStart: number;
}

/**
 * A BED record: 0-based, half-open `[start, end)`
 */
export interface GenomicInterval {
  readonly sequenceName: string;
  readonly start: number;
  readonly end: number;
  readonly name?: string;
  /** Clamped to [0, 1000] */
  readonly score?: number;
  readonly strand: Strand;
  readonly thickStart?: number;
  readonly thickEnd?: number;
  readonly itemRgb?: Rgb;
  /**
   * Present when the line had block columns. Empty when the declared blocks
   * were inconsistent and had to be dropped.
   */
  readonly blocks?: readonly BedBlock[];
  /** Columns past the twelfth, verbatim */
  readonly extraFields?: readonly string[];
  readonly lineNumber?: number;
}

export interface BedParserOptions extends ParserOptions {
  /** Strand used when the column is absent or unrecognised (default ".") */
  defaultStrand?: Strand;
}

export interface BedWriterOptions {
  defaultName?: string;
  defaultScore?: string;
  defaultStrand?: Strand;
}

const RgbSchema = type({
  r: "0<=number.integer<=255",
  g: "0<=number.integer<=255",
  b: "0<=number.integer<=255",
});

const BedBlockSchema = type({
  size: "number.integer>=0",
  relativeStart: "number.integer>=0",
});

/**
 * Final structural check on a built record
 */
export const GenomicIntervalSchema = type({
  sequenceName: "string>0",
  start: "number.integer>=0",
  end: "number.integer>0",
  "name?": "string",
  "score?": "0<=number<=1000",
  strand: '"+" | "-" | "."',
  "thickStart?": "number.integer>=0",
  "thickEnd?": "number.integer>=0",
  "itemRgb?": RgbSchema,
  "blocks?": BedBlockSchema.array(),
  "extraFields?": "string[]",
  "lineNumber?": "number.integer>=1",
}).narrow((interval, ctx) => {
  if (interval.end <= interval.start) {
    return ctx.reject(`end greater than start (was ${interval.start}..${interval.end})`);
  }
  const { thickStart, thickEnd } = interval;
  if (thickStart !== undefined && (thickStart < interval.start || thickStart > interval.end)) {
    return ctx.reject("thickStart within [start, end]");
  }
  if (thickEnd !== undefined && (thickEnd < interval.start || thickEnd > interval.end)) {
    return ctx.reject("thickEnd within [start, end]");
  }
  for (const block of interval.blocks ?? []) {
    if (interval.start + block.relativeStart + block.size > interval.end) {
      return ctx.reject("blocks within [start, end]");
    }
  }
  return true;
});
