/**
 * Core type definitions shared by the BED and GFF3 modules
 *
 * Record types live beside their formats (formats/bed/types.ts,
 * formats/gff/types.ts); this module holds the vocabulary both use.
 */

/**
 * BED strand orientation
 */
export type Strand = "+" | "-" | ".";

/**
 * GFF3 strand orientation; `?` marks a stranded feature with unknown strand
 */
export type GffStrand = Strand | "?";

/**
 * GFF3 CDS phase
 */
export type Phase = 0 | 1 | 2;

/**
 * Supported line-oriented interval formats
 */
export type FormatTag = "bed" | "gff";

/**
 * RGB colour with channels in [0, 255]
 */
export interface Rgb {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/**
 * An enumerated column whose text matched none of the allowed values.
 * Kept verbatim so a record can be written back unchanged.
 */
export interface UnrecognizedValue {
  readonly unrecognized: string;
}

export const BED_STRANDS: readonly Strand[] = ["+", "-", "."];
export const GFF_STRANDS: readonly GffStrand[] = ["+", "-", ".", "?"];

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Skip the final schema check on built records */
  skipValidation?: boolean;
  /** Lines longer than this are rejected with a LineTooLong diagnostic */
  maxLineLength?: number;
  /** Whether to attach source line numbers to records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling a load */
  signal?: AbortSignal;
  /** Called once per rejected line */
  onError?: (error: string, lineNumber?: number) => void;
  /** Called once per record kept in degraded form */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

export function isUnrecognized(value: unknown): value is UnrecognizedValue {
  return typeof value === "object" && value !== null && "unrecognized" in value;
}
