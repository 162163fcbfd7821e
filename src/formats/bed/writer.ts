/**
 * BED format writer
 */

import type { Strand } from "../../types";
import { formatRgb, NEUTRAL_RGB } from "../fields";
import type { HeaderMetadata } from "../headers";
import type { BedWriterOptions, GenomicInterval } from "./types";

/**
 * Writes BED rows and documents. A row runs to its last populated column;
 * earlier gaps are filled with the configured defaults.
 */
export class BedWriter {
  private readonly defaultName: string;
  private readonly defaultScore: string;
  private readonly defaultStrand: Strand;

  constructor(options: BedWriterOptions = {}) {
    this.defaultName = options.defaultName ?? ".";
    this.defaultScore = options.defaultScore ?? "0";
    this.defaultStrand = options.defaultStrand ?? ".";
  }

  /**
   * Format one interval as a tab-separated line, without terminator
   *
   * @example
   * ```typescript
   * new BedWriter().formatInterval({ sequenceName: "chr1", start: 0, end: 10, strand: "+" });
   * // "chr1\t0\t10\t.\t0\t+"
   * ```
   */
  formatInterval(interval: GenomicInterval): string {
    const columns: string[] = [
      interval.sequenceName,
      interval.start.toString(),
      interval.end.toString(),
      interval.name ?? this.defaultName,
      interval.score !== undefined ? interval.score.toString() : this.defaultScore,
      interval.strand,
      (interval.thickStart ?? interval.start).toString(),
      (interval.thickEnd ?? interval.end).toString(),
      formatRgb(interval.itemRgb ?? NEUTRAL_RGB),
      ...blockColumns(interval),
      ...(interval.extraFields ?? []),
    ];

    return columns.slice(0, populatedColumnCount(interval, this.defaultStrand)).join("\t");
  }

  /**
   * Format a whole document: retained header lines verbatim, then one row per
   * record, each newline-terminated
   */
  formatDocument(intervals: Iterable<GenomicInterval>, headers?: HeaderMetadata): string {
    const lines: string[] = [];
    for (const header of headers ?? []) {
      lines.push(header.text);
    }
    for (const interval of intervals) {
      lines.push(this.formatInterval(interval));
    }
    return lines.map((line) => `${line}\n`).join("");
  }
}

function blockColumns(interval: GenomicInterval): string[] {
  const blocks = interval.blocks ?? [];
  return [
    blocks.length.toString(),
    blocks.map((block) => block.size).join(","),
    blocks.map((block) => block.relativeStart).join(","),
  ];
}

/**
 * Number of columns needed to carry every populated field
 */
function populatedColumnCount(interval: GenomicInterval, defaultStrand: Strand): number {
  if (interval.extraFields !== undefined && interval.extraFields.length > 0) {
    return 12 + interval.extraFields.length;
  }
  if (interval.blocks !== undefined) return 12;
  if (interval.itemRgb !== undefined) return 9;
  if (interval.thickStart !== undefined || interval.thickEnd !== undefined) return 8;
  if (interval.strand !== defaultStrand) return 6;
  if (interval.score !== undefined) return 5;
  if (interval.name !== undefined) return 4;
  return 3;
}
