/**
 * Line classification for tab-delimited interval formats
 *
 * Every raw line is exactly one of: comment, browser header, track header,
 * blank, or data. Data lines are split on literal tabs with empty fields
 * preserved.
 *
 * `track` and `browser` count as headers only as whole words, unlike a bare
 * prefix test, so a contig named `track1` stays data.
 *
 * @module formats/lines
 */

import type { FieldDefect } from "../diagnostics";
import type { FormatTag } from "../types";

export type ClassifiedLine =
  | { readonly kind: "comment"; readonly raw: string }
  | { readonly kind: "browser"; readonly raw: string }
  | { readonly kind: "track"; readonly raw: string }
  | { readonly kind: "blank" }
  | { readonly kind: "data"; readonly fields: readonly string[] }
  | { readonly kind: "invalid"; readonly fields: readonly string[]; readonly defect: FieldDefect };

export const FIELD_DELIMITER = "\t";

/** Minimum data columns per format */
export const MINIMUM_FIELDS: Readonly<Record<FormatTag, number>> = {
  bed: 3,
  gff: 9,
};

/**
 * Strip the line terminator, leaving any other trailing text intact
 */
export function stripLineEnding(line: string): string {
  return line.replace(/\r?\n$/, "").replace(/\r$/, "");
}

/**
 * `track` and `browser` only count as keywords when followed by whitespace
 * or the end of the line; a contig called `track1` is data.
 */
function startsWithKeyword(line: string, keyword: string): boolean {
  if (!line.startsWith(keyword)) return false;
  const next = line.charAt(keyword.length);
  return next === "" || next === " " || next === "\t";
}

/**
 * Classify a single raw line
 *
 * @param line - Raw line, with or without its terminator
 * @param format - When given, data lines with fewer than the format's
 *   minimum column count are reported as `invalid` with a TooFewFields defect
 *
 * @example
 * ```typescript
 * classifyLine("chr1\t10\t20", "bed");
 * // { kind: "data", fields: ["chr1", "10", "20"] }
 * classifyLine("chr1\t10", "bed").kind; // "invalid"
 * ```
 */
export function classifyLine(line: string, format?: FormatTag): ClassifiedLine {
  const raw = stripLineEnding(line);

  if (raw.startsWith("#")) return { kind: "comment", raw };
  if (startsWithKeyword(raw, "browser")) return { kind: "browser", raw };
  if (startsWithKeyword(raw, "track")) return { kind: "track", raw };
  if (raw.trim() === "") return { kind: "blank" };

  const fields = raw.split(FIELD_DELIMITER);

  if (format !== undefined) {
    const minimum = MINIMUM_FIELDS[format];
    if (fields.length < minimum) {
      return {
        kind: "invalid",
        fields,
        defect: {
          kind: "TooFewFields",
          message: `${format.toUpperCase()} requires at least ${minimum} tab-separated fields, got ${fields.length}`,
        },
      };
    }
  }

  return { kind: "data", fields };
}

/**
 * Split text into lines on LF or CRLF, dropping the empty tail that a
 * final newline leaves behind
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
