/**
 * GFF3 record builder and parser
 *
 * GFF3 is treated as less strict than BED: only the coordinate columns can
 * reject a line. Unknown strand or phase values are reported and kept as
 * written, and the attribute column is not parsed until it is read.
 *
 * @module gff/parser
 */

import { type } from "arktype";
import type { FieldDefect } from "../../diagnostics";
import { GffError } from "../../errors";
import { GFF_STRANDS, type FormatTag, type GffStrand, type Phase, type UnrecognizedValue } from "../../types";
import { AbstractParser, type BuildResult, type BuildStage } from "../abstract-parser";
import { AttributeMap, GFF_ATTRIBUTE_SYNTAX } from "../attributes";
import {
  enumColumn,
  floatColumn,
  integerColumn,
  readColumn,
  stringColumn,
} from "../fields";
import { MINIMUM_FIELDS } from "../lines";
import { FeatureRecordSchema, type FeatureRecord, type GffParserOptions } from "./types";

/** Placeholder GFF3 uses for an absent column */
export const ABSENT = ".";

const PHASES = ["0", "1", "2"] as const;

/**
 * Column-schema table for the nine GFF3 columns
 */
export const GFF_COLUMNS = {
  sequenceId: stringColumn("sequenceId", 0),
  source: stringColumn("source", 1),
  type: stringColumn("type", 2),
  start: integerColumn("start", 3, [ABSENT]),
  end: integerColumn("end", 4, [ABSENT]),
  score: floatColumn("score", 5, [ABSENT]),
  strand: enumColumn("strand", 6, { type: "enum", values: GFF_STRANDS }),
  phase: enumColumn("phase", 7, { type: "enum", values: PHASES }, [ABSENT]),
  attributes: stringColumn("attributes", 8),
} as const;

export const GFF_COLUMN_COUNT = 9;

/**
 * Validate GFF3 strand annotation
 */
export function validateGffStrand(strand: string): strand is GffStrand {
  return GFF_STRANDS.some((value) => value === strand);
}

/**
 * The first nine columns with empty ones replaced by "."
 */
export function normalizeColumns(fields: readonly string[]): string[] {
  return fields.slice(0, GFF_COLUMN_COUNT).map((field) => (field === "" ? ABSENT : field));
}

export interface GffBuildContext {
  skipValidation: boolean;
  lineNumber?: number;
}

/**
 * Assemble a GFF3 feature from the fields of one data line
 */
export function buildFeatureRecord(
  rawFields: readonly string[],
  context: GffBuildContext
): BuildResult<FeatureRecord> {
  const warnings: FieldDefect[] = [];
  let stage: BuildStage = "init";
  const reject = (defect: FieldDefect): BuildResult<FeatureRecord> => ({
    status: "rejected",
    stage,
    defect,
    warnings,
  });

  if (rawFields.length < MINIMUM_FIELDS.gff) {
    return reject({
      kind: "TooFewFields",
      message: `GFF3 requires ${GFF_COLUMN_COUNT} tab-separated fields, got ${rawFields.length}`,
    });
  }
  if ((rawFields[0] ?? "").trim() === "") {
    return reject({ kind: "EmptySequenceName", message: "seqid is empty", field: "sequenceId" });
  }

  const fields = normalizeColumns(rawFields);
  stage = "fields-split";

  const startRead = readColumn(fields, GFF_COLUMNS.start);
  const endRead = readColumn(fields, GFF_COLUMNS.end);
  if (startRead.status === "invalid") {
    return reject({ ...startRead.defect, kind: "NonNumericCoordinate" });
  }
  if (endRead.status === "invalid") {
    return reject({ ...endRead.defect, kind: "NonNumericCoordinate" });
  }

  const start = startRead.status === "present" ? startRead.value : undefined;
  const end = endRead.status === "present" ? endRead.value : undefined;
  if (start !== undefined && start < 1) {
    return reject({ kind: "CoordinateOutOfRange", message: `start ${start} is below 1`, field: "start" });
  }
  if (end !== undefined && end < 1) {
    return reject({ kind: "CoordinateOutOfRange", message: `end ${end} is below 1`, field: "end" });
  }
  if (start !== undefined && end !== undefined && end < start) {
    return reject({
      kind: "InvalidCoordinateOrder",
      message: `end ${end} is less than start ${start}`,
      field: "end",
    });
  }
  stage = "coordinates-validated";

  const scoreRead = readColumn(fields, GFF_COLUMNS.score);
  if (scoreRead.status === "invalid") {
    warnings.push(scoreRead.defect);
  }

  const feature: FeatureRecord = {
    sequenceId: fields[GFF_COLUMNS.sequenceId.index] ?? ABSENT,
    source: fields[GFF_COLUMNS.source.index] ?? ABSENT,
    type: fields[GFF_COLUMNS.type.index] ?? ABSENT,
    ...(start !== undefined ? { start } : {}),
    ...(end !== undefined ? { end } : {}),
    ...(scoreRead.status === "present" ? { score: scoreRead.value } : {}),
    strand: readStrand(fields, warnings),
    phase: readPhase(fields, warnings),
    attributes: AttributeMap.parse(fields[GFF_COLUMNS.attributes.index] ?? ABSENT, GFF_ATTRIBUTE_SYNTAX),
    ...(context.lineNumber !== undefined ? { lineNumber: context.lineNumber } : {}),
  };
  stage = "optional-fields-attached";

  if (!context.skipValidation) {
    const validation = FeatureRecordSchema(feature);
    if (validation instanceof type.errors) {
      return reject({ kind: "SchemaViolation", message: `Invalid GFF3 feature: ${validation.summary}` });
    }
  }

  return { status: "emitted", record: feature, warnings };
}

function readStrand(fields: readonly string[], warnings: FieldDefect[]): GffStrand | UnrecognizedValue {
  const read = readColumn(fields, GFF_COLUMNS.strand);
  switch (read.status) {
    case "present":
      return read.value;
    case "absent":
      return ".";
    case "invalid":
      warnings.push({ ...read.defect, message: `${read.defect.message}; kept as written` });
      return { unrecognized: read.raw };
  }
}

function readPhase(fields: readonly string[], warnings: FieldDefect[]): Phase | null | UnrecognizedValue {
  const read = readColumn(fields, GFF_COLUMNS.phase);
  switch (read.status) {
    case "present":
      return toPhase(read.value);
    case "absent":
      return null;
    case "invalid":
      warnings.push({ ...read.defect, message: `${read.defect.message}; kept as written` });
      return { unrecognized: read.raw };
  }
}

function toPhase(value: (typeof PHASES)[number]): Phase {
  switch (value) {
    case "0":
      return 0;
    case "1":
      return 1;
    case "2":
      return 2;
  }
}

/**
 * Streaming GFF3 parser
 *
 * @example
 * ```typescript
 * const parser = new GffParser({ onWarning: () => {} });
 * const { records } = parser.parseString("##gff-version 3\nchr1\tsrc\tgene\t1\t100\t.\t+\t.\tID=g1\n");
 * records.at(0)?.attributes.get("ID"); // "g1"
 * ```
 *
 * @public
 */
export class GffParser extends AbstractParser<FeatureRecord, GffParserOptions> {
  protected override readonly format: FormatTag = "gff";

  constructor(options: GffParserOptions = {}) {
    super(options);
  }

  protected override getFormatName(): string {
    return "GFF3";
  }

  protected override createError(message: string, lineNumber?: number): GffError {
    return new GffError(message, undefined, lineNumber);
  }

  protected override buildRecord(
    fields: readonly string[],
    lineNumber?: number
  ): BuildResult<FeatureRecord> {
    return buildFeatureRecord(fields, {
      skipValidation: this.options.skipValidation,
      ...(lineNumber !== undefined ? { lineNumber } : {}),
    });
  }
}
