/**
 * BED / GFF3 format detection from a sample of lines
 *
 * @module formats/detection
 */

import type { FormatTag } from "../types";
import { validateGffStrand } from "./gff/parser";
import { isGffVersionPragma } from "./headers";
import { classifyLine, MINIMUM_FIELDS, splitLines } from "./lines";

export const DETECTION_SAMPLE_SIZE = 100;

/** Confidence floor when a pragma or track line agrees with the data */
export const HEADER_CONFIDENCE = 0.9;

/** Confidence from a pragma or track line when no data line decides */
export const HEADER_ONLY_CONFIDENCE = 0.5;

export interface DetectionResult {
  readonly format: FormatTag | "unknown";
  /** In [0, 1] */
  readonly confidence: number;
}

const INTEGER = /^\d+$/;

function looksLikeBed(fields: readonly string[]): boolean {
  if (fields.length < MINIMUM_FIELDS.bed) return false;
  const [name, start, end] = fields;
  if (name === undefined || name.trim() === "") return false;
  if (start === undefined || end === undefined) return false;
  if (!INTEGER.test(start) || !INTEGER.test(end)) return false;
  return Number(end) > Number(start);
}

function looksLikeGff(fields: readonly string[]): boolean {
  if (fields.length < MINIMUM_FIELDS.gff) return false;
  const start = fields[3] ?? "";
  const end = fields[4] ?? "";
  const strand = fields[6] ?? "";
  const coordinateOk = (value: string): boolean => value === "." || INTEGER.test(value);
  return coordinateOk(start) && coordinateOk(end) && validateGffStrand(strand);
}

/**
 * Guess the format of a sample
 *
 * Each data line votes for every format whose column shape it fits. The
 * confidence is the winner's share of data lines, raised to at least 0.9
 * by an agreeing `##gff-version` pragma or `track`/`browser` line.
 *
 * @example
 * ```typescript
 * detect(["##gff-version 3", "chr1\t.\tgene\t1\t9\t.\t+\t.\tID=g1"]);
 * // { format: "gff", confidence: 1 }
 * ```
 */
export function detect(sampleLines: readonly string[]): DetectionResult {
  const sample = sampleLines.slice(0, DETECTION_SAMPLE_SIZE);
  let gffHint = false;
  let bedHint = false;
  let dataLines = 0;
  let bedVotes = 0;
  let gffVotes = 0;

  for (const line of sample) {
    const classified = classifyLine(line);
    switch (classified.kind) {
      case "comment":
        if (isGffVersionPragma(classified.raw)) gffHint = true;
        break;
      case "track":
      case "browser":
        bedHint = true;
        break;
      case "data":
        dataLines++;
        if (looksLikeBed(classified.fields)) bedVotes++;
        if (looksLikeGff(classified.fields)) gffVotes++;
        break;
      default:
        break;
    }
  }

  const hinted = (format: FormatTag): boolean => (format === "gff" ? gffHint : bedHint);

  if (bedVotes === 0 && gffVotes === 0) {
    if (gffHint && !bedHint) return { format: "gff", confidence: HEADER_ONLY_CONFIDENCE };
    if (bedHint && !gffHint) return { format: "bed", confidence: HEADER_ONLY_CONFIDENCE };
    return { format: "unknown", confidence: 0 };
  }

  let format: FormatTag;
  if (gffVotes !== bedVotes) {
    format = gffVotes > bedVotes ? "gff" : "bed";
  } else if (gffHint !== bedHint) {
    format = gffHint ? "gff" : "bed";
  } else {
    return { format: "unknown", confidence: 0 };
  }

  const votes = format === "gff" ? gffVotes : bedVotes;
  const share = votes / dataLines;
  return { format, confidence: hinted(format) ? Math.max(share, HEADER_CONFIDENCE) : share };
}

/**
 * Detect the format of in-memory text from its first lines
 */
export function detectText(text: string): DetectionResult {
  return detect(splitLines(text).slice(0, DETECTION_SAMPLE_SIZE));
}
