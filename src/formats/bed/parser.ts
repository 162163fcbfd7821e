/**
 * BED record builder and parser
 *
 * Handles BED3 through BED12 plus any number of trailing custom columns.
 * A line moves through init → fields-split → coordinates-validated →
 * optional-fields-attached → blocks-validated → emitted, and may be
 * rejected from any stage. Only the coordinate columns can reject a line;
 * problems in optional columns degrade the record and produce warnings.
 */

import { type } from "arktype";
import type { FieldDefect } from "../../diagnostics";
import { BedError } from "../../errors";
import { BED_STRANDS, type FormatTag, type Strand } from "../../types";
import { AbstractParser, type BuildResult, type BuildStage } from "../abstract-parser";
import {
  clamp,
  clampRgb,
  coerceInteger,
  coerceIntegerList,
  enumColumn,
  floatColumn,
  integerColumn,
  integerListColumn,
  readColumn,
  rgbColumn,
  stringColumn,
} from "../fields";
import { MINIMUM_FIELDS } from "../lines";
import {
  GenomicIntervalSchema,
  type BedBlock,
  type BedParserOptions,
  type GenomicInterval,
} from "./types";

export const MIN_BED_SCORE = 0;
export const MAX_BED_SCORE = 1000;

/**
 * Column-schema table for the twelve standard BED columns
 */
export const BED_COLUMNS = {
  sequenceName: stringColumn("sequenceName", 0),
  start: integerColumn("start", 1),
  end: integerColumn("end", 2),
  name: stringColumn("name", 3, [""]),
  score: floatColumn("score", 4, [".", ""]),
  strand: enumColumn("strand", 5, { type: "enum", values: BED_STRANDS }, [""]),
  thickStart: integerColumn("thickStart", 6),
  thickEnd: integerColumn("thickEnd", 7),
  itemRgb: rgbColumn("itemRgb", 8, [""]),
  blockCount: integerColumn("blockCount", 9),
  blockSizes: integerListColumn("blockSizes", 10),
  blockStarts: integerListColumn("blockStarts", 11),
} as const;

export const STANDARD_BED_COLUMNS = 12;

/**
 * Detect BED variant from the number of fields
 */
export function detectVariant(fieldCount: number): string {
  if (fieldCount < MINIMUM_FIELDS.bed) return "invalid";
  if (fieldCount > STANDARD_BED_COLUMNS) return "extended";
  return `BED${fieldCount}`;
}

export interface BedBuildContext {
  defaultStrand: Strand;
  skipValidation: boolean;
  lineNumber?: number;
}

export type BlockValidation =
  | { readonly ok: true; readonly blocks: readonly BedBlock[] }
  | { readonly ok: false; readonly message: string };

/**
 * Check a block set against its interval
 *
 * Sizes and starts must pair up and agree with the declared count, and
 * every block `[start + relativeStart, start + relativeStart + size)` must
 * lie within `[start, end]`. There is no partial result.
 *
 * @example
 * ```typescript
 * validateBlocks(100, 130, [10, 20], [0, 5], 2);
 * // { ok: true, blocks: [{ size: 10, relativeStart: 0 }, { size: 20, relativeStart: 5 }] }
 * ```
 */
export function validateBlocks(
  start: number,
  end: number,
  sizes: readonly number[],
  starts: readonly number[],
  declaredCount?: number
): BlockValidation {
  if (sizes.length !== starts.length) {
    return {
      ok: false,
      message: `${sizes.length} block sizes but ${starts.length} block starts`,
    };
  }
  if (declaredCount !== undefined && declaredCount !== sizes.length) {
    return {
      ok: false,
      message: `blockCount is ${declaredCount} but ${sizes.length} blocks are listed`,
    };
  }

  const blocks: BedBlock[] = [];
  for (let i = 0; i < sizes.length; i++) {
    const size = sizes[i] ?? 0;
    const relativeStart = starts[i] ?? 0;
    if (size < 0 || relativeStart < 0) {
      return { ok: false, message: `block ${i + 1} has a negative size or start` };
    }
    const blockEnd = start + relativeStart + size;
    if (blockEnd > end) {
      return {
        ok: false,
        message: `block ${i + 1} spans [${start + relativeStart}, ${blockEnd}) outside [${start}, ${end})`,
      };
    }
    blocks.push(Object.freeze({ size, relativeStart }));
  }
  return { ok: true, blocks };
}

/**
 * Assemble a BED record from the fields of one data line
 */
export function buildBedInterval(
  fields: readonly string[],
  context: BedBuildContext
): BuildResult<GenomicInterval> {
  const warnings: FieldDefect[] = [];
  let stage: BuildStage = "init";
  const reject = (defect: FieldDefect): BuildResult<GenomicInterval> => ({
    status: "rejected",
    stage,
    defect,
    warnings,
  });

  if (fields.length < MINIMUM_FIELDS.bed) {
    return reject({
      kind: "TooFewFields",
      message: `BED requires at least ${MINIMUM_FIELDS.bed} tab-separated fields, got ${fields.length}`,
    });
  }
  stage = "fields-split";

  // Coordinates: the only columns that can reject a line
  const sequenceName = fields[0] ?? "";
  if (sequenceName.trim() === "") {
    return reject({ kind: "EmptySequenceName", message: "sequence name is empty", field: "sequenceName" });
  }

  const startRead = readColumn(fields, BED_COLUMNS.start);
  const endRead = readColumn(fields, BED_COLUMNS.end);
  if (startRead.status !== "present") {
    return reject({
      kind: "NonNumericCoordinate",
      message: `start '${fields[1] ?? ""}' is not an integer`,
      field: "start",
    });
  }
  if (endRead.status !== "present") {
    return reject({
      kind: "NonNumericCoordinate",
      message: `end '${fields[2] ?? ""}' is not an integer`,
      field: "end",
    });
  }

  const start = startRead.value;
  const end = endRead.value;
  if (start < 0) {
    return reject({ kind: "CoordinateOutOfRange", message: `start ${start} is negative`, field: "start" });
  }
  if (end <= start) {
    return reject({
      kind: "InvalidCoordinateOrder",
      message: `end ${end} must be greater than start ${start}`,
      field: "end",
    });
  }
  stage = "coordinates-validated";

  const rawName = fields[BED_COLUMNS.name.index];
  const name = rawName !== undefined && rawName !== "" ? rawName : undefined;
  const score = readScore(fields, warnings);
  const strand = readStrand(fields, context.defaultStrand, warnings);
  const thick = readThick(fields, start, end, warnings);

  const rgbRead = readColumn(fields, BED_COLUMNS.itemRgb);
  if (rgbRead.status === "present" && rgbRead.warning !== undefined) {
    warnings.push(rgbRead.warning);
  }
  const itemRgb = rgbRead.status === "present" ? clampRgb(rgbRead.value) : undefined;
  stage = "optional-fields-attached";

  const blocks = fields.length > BED_COLUMNS.blockCount.index ? readBlocks(fields, start, end, warnings) : undefined;
  stage = "blocks-validated";

  const extraFields = fields.length > STANDARD_BED_COLUMNS ? fields.slice(STANDARD_BED_COLUMNS) : undefined;

  const interval: GenomicInterval = {
    sequenceName,
    start,
    end,
    ...(name !== undefined ? { name } : {}),
    ...(score !== undefined ? { score } : {}),
    strand,
    ...(thick !== undefined ? thick : {}),
    ...(itemRgb !== undefined ? { itemRgb: Object.freeze(itemRgb) } : {}),
    ...(blocks !== undefined ? { blocks: Object.freeze(blocks) } : {}),
    ...(extraFields !== undefined ? { extraFields: Object.freeze(extraFields) } : {}),
    ...(context.lineNumber !== undefined ? { lineNumber: context.lineNumber } : {}),
  };

  if (!context.skipValidation) {
    const validation = GenomicIntervalSchema(interval);
    if (validation instanceof type.errors) {
      return reject({ kind: "SchemaViolation", message: `Invalid BED interval: ${validation.summary}` });
    }
  }

  return { status: "emitted", record: interval, warnings };
}

function readScore(fields: readonly string[], warnings: FieldDefect[]): number | undefined {
  const read = readColumn(fields, BED_COLUMNS.score);
  if (read.status === "invalid") {
    warnings.push(read.defect);
    return undefined;
  }
  return read.status === "present" ? clamp(read.value, MIN_BED_SCORE, MAX_BED_SCORE) : undefined;
}

function readStrand(fields: readonly string[], defaultStrand: Strand, warnings: FieldDefect[]): Strand {
  const read = readColumn(fields, BED_COLUMNS.strand);
  switch (read.status) {
    case "present":
      return read.value;
    case "absent":
      return defaultStrand;
    case "invalid":
      warnings.push({ ...read.defect, message: `${read.defect.message}; using '${defaultStrand}'` });
      return defaultStrand;
  }
}

/**
 * thickStart/thickEnd: clamped into [start, end]. With only thickStart
 * present, thickEnd is `end`. A non-numeric value resets both.
 */
function readThick(
  fields: readonly string[],
  start: number,
  end: number,
  warnings: FieldDefect[]
): { thickStart: number; thickEnd: number } | undefined {
  const thickStartRaw = fields[BED_COLUMNS.thickStart.index];
  if (thickStartRaw === undefined) return undefined;
  const thickEndRaw = fields[BED_COLUMNS.thickEnd.index];

  const thickStart = coerceInteger(thickStartRaw);
  const thickEnd = thickEndRaw === undefined ? undefined : coerceInteger(thickEndRaw);

  if (!thickStart.ok || (thickEnd !== undefined && !thickEnd.ok)) {
    warnings.push({
      kind: "NotNumeric",
      message: `thickStart/thickEnd '${thickStartRaw}'/'${thickEndRaw ?? ""}' are not integers; using start/end`,
      field: "thickStart",
    });
    return { thickStart: start, thickEnd: end };
  }

  return {
    thickStart: clamp(thickStart.value, start, end),
    thickEnd: thickEnd === undefined ? end : clamp(thickEnd.value, start, end),
  };
}

/**
 * Any inconsistency drops every block; the record itself is kept
 */
function readBlocks(
  fields: readonly string[],
  start: number,
  end: number,
  warnings: FieldDefect[]
): readonly BedBlock[] {
  const degrade = (message: string): readonly BedBlock[] => {
    warnings.push({ kind: "InvalidBlockStructure", message: `${message}; blocks dropped`, field: "blocks" });
    return [];
  };

  const count = coerceInteger(fields[BED_COLUMNS.blockCount.index] ?? "");
  if (!count.ok) {
    return degrade(`blockCount '${fields[BED_COLUMNS.blockCount.index] ?? ""}' is not an integer`);
  }
  const sizes = coerceIntegerList(fields[BED_COLUMNS.blockSizes.index] ?? "");
  if (!sizes.ok) {
    return degrade(sizes.defect.message);
  }
  const starts = coerceIntegerList(fields[BED_COLUMNS.blockStarts.index] ?? "");
  if (!starts.ok) {
    return degrade(starts.defect.message);
  }

  const validation = validateBlocks(start, end, sizes.value, starts.value, count.value);
  return validation.ok ? validation.blocks : degrade(validation.message);
}

/**
 * Streaming BED parser
 *
 * @example
 * ```typescript
 * const parser = new BedParser({ onWarning: () => {} });
 * const { records, diagnostics } = parser.parseString("chr1\t100\t200\tpeak1\n");
 * ```
 */
export class BedParser extends AbstractParser<GenomicInterval, BedParserOptions> {
  protected override readonly format: FormatTag = "bed";
  private readonly defaultStrand: Strand;

  constructor(options: BedParserOptions = {}) {
    super(options);
    this.defaultStrand = options.defaultStrand ?? ".";
  }

  protected override getFormatName(): string {
    return "BED";
  }

  protected override createError(message: string, lineNumber?: number): BedError {
    return new BedError(message, undefined, undefined, undefined, lineNumber);
  }

  protected override buildRecord(
    fields: readonly string[],
    lineNumber?: number
  ): BuildResult<GenomicInterval> {
    return buildBedInterval(fields, {
      defaultStrand: this.defaultStrand,
      skipValidation: this.options.skipValidation,
      ...(lineNumber !== undefined ? { lineNumber } : {}),
    });
  }
}
