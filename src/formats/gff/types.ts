/**
 * GFF3 record types and schema
 *
 * @module gff/types
 */

import { type } from "arktype";
import type { GffStrand, ParserOptions, Phase, UnrecognizedValue } from "../../types";
import { AttributeMap } from "../attributes";

/**
 * A GFF3 feature: 1-based, closed `[start, end]`
 *
 * @public
 */
export interface FeatureRecord {
  /** Landmark for the coordinate system (e.g. "chr1", "ctg123") */
  readonly sequenceId: string;
  /** Producer of the feature (e.g. "Ensembl"); "." when unknown */
  readonly source: string;
  /** Feature type (e.g. "gene", "mRNA", "exon") */
  readonly type: string;
  /** Absent when the column is "." */
  readonly start?: number;
  readonly end?: number;
  /** Unbounded; absent when the column is "." */
  readonly score?: number;
  readonly strand: GffStrand | UnrecognizedValue;
  /** null when the column is "." */
  readonly phase: Phase | null | UnrecognizedValue;
  readonly attributes: AttributeMap;
  readonly lineNumber?: number;
}

export type GffParserOptions = ParserOptions;

/**
 * Final structural check on a built feature
 */
export const FeatureRecordSchema = type({
  sequenceId: "string>0",
  source: "string>0",
  type: "string>0",
  "start?": "number.integer>=1",
  "end?": "number.integer>=1",
  "score?": "number",
  strand: type('"+" | "-" | "." | "?"').or({ unrecognized: "string" }),
  phase: type("0 | 1 | 2 | null").or({ unrecognized: "string" }),
  attributes: type.instanceOf(AttributeMap),
  "lineNumber?": "number.integer>=1",
}).narrow((feature, ctx) => {
  if (feature.start !== undefined && feature.end !== undefined && feature.end < feature.start) {
    return ctx.reject(`end at least start (was ${feature.start}..${feature.end})`);
  }
  return true;
});
