/**
 * BED ↔ GFF3 conversion
 *
 * BED is 0-based half-open, GFF3 1-based closed, so only the start moves:
 * `gff.start = bed.start + 1` and `gff.end = bed.end`. BED columns with no
 * GFF3 counterpart travel as attributes. The round trip is not an identity:
 * fields without an attribute convention are lost, and the configured
 * name/score keys may collide with attributes already present.
 *
 * @module operations/convert
 */

import { type } from "arktype";
import { DEFAULT_CONFIG, type IntervalConfig } from "../config";
import { statusOf, type BedDataset, type Dataset, type GffDataset } from "../dataset";
import type { Diagnostic, FieldDefect } from "../diagnostics";
import { validateBlocks } from "../formats/bed/parser";
import { GenomicIntervalSchema, type BedBlock, type GenomicInterval } from "../formats/bed/types";
import { AttributeMap, GFF_ATTRIBUTE_SYNTAX } from "../formats/attributes";
import {
  clamp,
  clampRgb,
  coerceFloat,
  coerceInteger,
  coerceIntegerList,
  coerceRgb,
  formatRgb,
} from "../formats/fields";
import type { FeatureRecord } from "../formats/gff/types";
import { HeaderMetadata } from "../formats/headers";
import { RecordStream } from "../record-stream";
import { BED_STRANDS, isUnrecognized, type FormatTag, type Strand } from "../types";

/** Attribute keys carrying BED columns through GFF3 */
export const BED_ATTRIBUTE_KEYS = {
  thickStart: "thick_start",
  thickEnd: "thick_end",
  rgb: "rgb",
  blockCount: "block_count",
  blockSizes: "block_sizes",
  blockStarts: "block_starts",
} as const;

export interface ConversionResult<T> {
  readonly records: T[];
  readonly diagnostics: Diagnostic[];
}

// =============================================================================
// BED → GFF3
// =============================================================================

/**
 * Convert one BED interval to a GFF3 feature
 *
 * @example
 * ```typescript
 * intervalToFeature({ sequenceName: "chr1", start: 0, end: 10, strand: "+" });
 * // start 1, end 10, type "region", source "bed2gff"
 * ```
 */
export function intervalToFeature(
  interval: GenomicInterval,
  config: IntervalConfig = DEFAULT_CONFIG
): FeatureRecord {
  const start = interval.start + 1;
  const attributes: [string, string][] = [];

  if (interval.name !== undefined && interval.name !== config.defaultName) {
    attributes.push([config.gffNameAttributeKey, interval.name]);
  }
  if (interval.score !== undefined) {
    attributes.push([config.gffScoreAttributeKey, interval.score.toString()]);
  }
  if (interval.thickStart !== undefined) {
    attributes.push([BED_ATTRIBUTE_KEYS.thickStart, (interval.thickStart + 1).toString()]);
  }
  if (interval.thickEnd !== undefined) {
    attributes.push([BED_ATTRIBUTE_KEYS.thickEnd, interval.thickEnd.toString()]);
  }
  const rgb = interval.itemRgb;
  if (rgb !== undefined && (rgb.r !== 0 || rgb.g !== 0 || rgb.b !== 0)) {
    attributes.push([BED_ATTRIBUTE_KEYS.rgb, formatRgb(rgb)]);
  }

  const blocks = interval.blocks ?? [];
  if (blocks.length > 0) {
    const base = config.blockStartsBase === "absolute" ? start : 0;
    attributes.push(
      [BED_ATTRIBUTE_KEYS.blockCount, blocks.length.toString()],
      [BED_ATTRIBUTE_KEYS.blockSizes, blocks.map((block) => block.size).join(",")],
      [BED_ATTRIBUTE_KEYS.blockStarts, blocks.map((block) => base + block.relativeStart).join(",")]
    );
  }

  return Object.freeze({
    sequenceId: interval.sequenceName,
    source: config.gffSource,
    type: config.gffFeatureType,
    start,
    end: interval.end,
    ...(interval.score !== undefined ? { score: interval.score } : {}),
    strand: interval.strand,
    phase: null,
    attributes: AttributeMap.from(attributes, GFF_ATTRIBUTE_SYNTAX),
    ...(interval.lineNumber !== undefined ? { lineNumber: interval.lineNumber } : {}),
  });
}

export function bedToGff(
  records: Iterable<GenomicInterval>,
  config: IntervalConfig = DEFAULT_CONFIG
): ConversionResult<FeatureRecord> {
  const converted: FeatureRecord[] = [];
  for (const interval of records) {
    converted.push(intervalToFeature(interval, config));
  }
  return { records: converted, diagnostics: [] };
}

// =============================================================================
// GFF3 → BED
// =============================================================================

export type FeatureConversion =
  | { readonly ok: true; readonly record: GenomicInterval; readonly warnings: readonly FieldDefect[] }
  | { readonly ok: false; readonly defect: FieldDefect; readonly warnings: readonly FieldDefect[] };

function attribute(attributes: AttributeMap, key: string): string | undefined {
  const value = attributes.get(key);
  return value === undefined || value === "" ? undefined : value;
}

function toBedStrand(strand: FeatureRecord["strand"], defaultStrand: Strand): Strand {
  if (isUnrecognized(strand)) return defaultStrand;
  return BED_STRANDS.find((value) => value === strand) ?? defaultStrand;
}

function resolveName(feature: FeatureRecord, config: IntervalConfig): string {
  const { attributes } = feature;
  const fromType = feature.type !== "." ? feature.type : undefined;
  return (
    attribute(attributes, config.gffNameAttributeKey) ??
    attribute(attributes, "ID") ??
    fromType ??
    config.defaultName
  );
}

function resolveScore(
  feature: FeatureRecord,
  config: IntervalConfig,
  warnings: FieldDefect[]
): number | undefined {
  const text =
    attribute(feature.attributes, config.gffScoreAttributeKey) ??
    feature.score?.toString() ??
    config.defaultScore;

  const parsed = coerceFloat(text);
  if (parsed.ok) return clamp(parsed.value, 0, 1000);

  warnings.push({
    kind: "NotNumeric",
    message: `score '${text}' is not a number; using '${config.defaultScore}'`,
    field: config.gffScoreAttributeKey,
  });
  const fallback = coerceFloat(config.defaultScore);
  return fallback.ok ? clamp(fallback.value, 0, 1000) : undefined;
}

function readIntegerAttribute(
  attributes: AttributeMap,
  key: string,
  warnings: FieldDefect[]
): number | undefined {
  const text = attribute(attributes, key);
  if (text === undefined) return undefined;
  const parsed = coerceInteger(text);
  if (parsed.ok) return parsed.value;
  warnings.push({ kind: "NotNumeric", message: `${key} '${text}' is not an integer; dropped`, field: key });
  return undefined;
}

function resolveThick(
  attributes: AttributeMap,
  start: number,
  end: number,
  warnings: FieldDefect[]
): { thickStart: number; thickEnd: number } | undefined {
  const thickStart = readIntegerAttribute(attributes, BED_ATTRIBUTE_KEYS.thickStart, warnings);
  const thickEnd = readIntegerAttribute(attributes, BED_ATTRIBUTE_KEYS.thickEnd, warnings);
  if (thickStart === undefined && thickEnd === undefined) return undefined;

  return {
    thickStart: thickStart === undefined ? start : clamp(thickStart - 1, start, end),
    thickEnd: thickEnd === undefined ? end : clamp(thickEnd, start, end),
  };
}

function resolveRgb(attributes: AttributeMap, warnings: FieldDefect[]): GenomicInterval["itemRgb"] {
  const text = attribute(attributes, BED_ATTRIBUTE_KEYS.rgb);
  if (text === undefined) return undefined;
  const parsed = coerceRgb(text);
  if (!parsed.ok || parsed.warning !== undefined) {
    warnings.push({
      kind: "NotNumeric",
      message: `${BED_ATTRIBUTE_KEYS.rgb} '${text}' is not an RGB colour; dropped`,
      field: BED_ATTRIBUTE_KEYS.rgb,
    });
    return undefined;
  }
  return clampRgb(parsed.value);
}

/**
 * Rebuild BED blocks from attributes. All three block attributes are
 * required together; block starts are re-based from the configured base.
 */
function resolveBlocks(
  feature: FeatureRecord,
  start: number,
  end: number,
  config: IntervalConfig,
  warnings: FieldDefect[]
): readonly BedBlock[] | undefined {
  const { attributes } = feature;
  const countText = attribute(attributes, BED_ATTRIBUTE_KEYS.blockCount);
  const sizesText = attribute(attributes, BED_ATTRIBUTE_KEYS.blockSizes);
  const startsText = attribute(attributes, BED_ATTRIBUTE_KEYS.blockStarts);

  if (countText === undefined && sizesText === undefined && startsText === undefined) {
    return undefined;
  }
  if (countText === undefined || sizesText === undefined || startsText === undefined) {
    const missing: string[] = [];
    if (countText === undefined) missing.push(BED_ATTRIBUTE_KEYS.blockCount);
    if (sizesText === undefined) missing.push(BED_ATTRIBUTE_KEYS.blockSizes);
    if (startsText === undefined) missing.push(BED_ATTRIBUTE_KEYS.blockStarts);
    warnings.push({
      kind: "ConversionMissingRequiredAttribute",
      message: `block attributes need ${missing.join(", ")}; blocks dropped`,
      field: "blocks",
    });
    return undefined;
  }

  const count = coerceInteger(countText);
  const sizes = coerceIntegerList(sizesText);
  const starts = coerceIntegerList(startsText);
  if (!count.ok || !sizes.ok || !starts.ok) {
    warnings.push({ kind: "NotNumeric", message: "block attributes are not integers; blocks dropped", field: "blocks" });
    return undefined;
  }

  const base = config.blockStartsBase === "absolute" ? start + 1 : 0;
  const validation = validateBlocks(
    start,
    end,
    sizes.value,
    starts.value.map((value) => value - base),
    count.value
  );
  if (!validation.ok) {
    warnings.push({
      kind: "InvalidBlockStructure",
      message: `${validation.message}; blocks dropped`,
      field: "blocks",
    });
    return [];
  }
  return validation.blocks;
}

/**
 * Convert one GFF3 feature to a BED interval
 */
export function featureToInterval(
  feature: FeatureRecord,
  config: IntervalConfig = DEFAULT_CONFIG
): FeatureConversion {
  const warnings: FieldDefect[] = [];
  const start = feature.start !== undefined ? feature.start - 1 : 0;
  const end = feature.end ?? start + 1;

  if (end <= start) {
    return {
      ok: false,
      defect: {
        kind: "InvalidCoordinateOrder",
        message: `end ${end} must be greater than start ${start} after conversion`,
      },
      warnings,
    };
  }

  const score = resolveScore(feature, config, warnings);
  const thick = resolveThick(feature.attributes, start, end, warnings);
  const itemRgb = resolveRgb(feature.attributes, warnings);
  const blocks = resolveBlocks(feature, start, end, config, warnings);

  const interval: GenomicInterval = Object.freeze({
    sequenceName: feature.sequenceId,
    start,
    end,
    name: resolveName(feature, config),
    ...(score !== undefined ? { score } : {}),
    strand: toBedStrand(feature.strand, config.defaultStrand),
    ...(thick !== undefined ? thick : {}),
    ...(itemRgb !== undefined ? { itemRgb } : {}),
    ...(blocks !== undefined ? { blocks } : {}),
    ...(feature.lineNumber !== undefined ? { lineNumber: feature.lineNumber } : {}),
  });

  if (!config.skipValidation) {
    const validation = GenomicIntervalSchema(interval);
    if (validation instanceof type.errors) {
      return {
        ok: false,
        defect: { kind: "SchemaViolation", message: `Invalid BED interval: ${validation.summary}` },
        warnings,
      };
    }
  }

  return { ok: true, record: interval, warnings };
}

export function gffToBed(
  records: Iterable<FeatureRecord>,
  config: IntervalConfig = DEFAULT_CONFIG
): ConversionResult<GenomicInterval> {
  const converted: GenomicInterval[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const feature of records) {
    const result = featureToInterval(feature, config);
    const lineNumber = feature.lineNumber !== undefined ? { lineNumber: feature.lineNumber } : {};
    for (const warning of result.warnings) {
      diagnostics.push({ ...warning, severity: "warning", ...lineNumber });
    }
    if (result.ok) {
      converted.push(result.record);
    } else {
      diagnostics.push({ ...result.defect, severity: "error", ...lineNumber });
    }
  }

  return { records: converted, diagnostics };
}

// =============================================================================
// DATASETS
// =============================================================================

/**
 * Plain comment lines survive conversion; `##` directives and track or
 * browser lines belong to the source format
 */
function portableHeaders(headers: HeaderMetadata): HeaderMetadata {
  return HeaderMetadata.from(
    Array.from(headers).filter((line) => line.kind === "comment" && !line.text.startsWith("##"))
  );
}

/**
 * Convert a dataset to the target format. Converting to the dataset's own
 * format returns a copy.
 */
export function convertDataset(dataset: Dataset, target: "bed", config?: IntervalConfig): BedDataset;
export function convertDataset(dataset: Dataset, target: "gff", config?: IntervalConfig): GffDataset;
export function convertDataset(dataset: Dataset, target: FormatTag, config?: IntervalConfig): Dataset;
export function convertDataset(
  dataset: Dataset,
  target: FormatTag,
  config: IntervalConfig = DEFAULT_CONFIG
): Dataset {
  if (target === "bed") {
    if (dataset.format === "bed") return copyDataset(dataset);
    const result = gffToBed(dataset.records, config);
    const records = new RecordStream(result.records).seal();
    return {
      format: "bed",
      records,
      headers: portableHeaders(dataset.headers),
      diagnostics: result.diagnostics,
      status: statusOf(records),
    };
  }

  if (dataset.format === "gff") return copyDataset(dataset);
  const result = bedToGff(dataset.records, config);
  const records = new RecordStream(result.records).seal();
  return {
    format: "gff",
    records,
    headers: portableHeaders(dataset.headers),
    diagnostics: result.diagnostics,
    status: statusOf(records),
  };
}

function copyDataset(dataset: BedDataset): BedDataset;
function copyDataset(dataset: GffDataset): GffDataset;
function copyDataset(dataset: Dataset): Dataset {
  const headers = HeaderMetadata.from(dataset.headers);
  const diagnostics = [...dataset.diagnostics];
  if (dataset.format === "bed") {
    return { ...dataset, records: new RecordStream(dataset.records).seal(), headers, diagnostics };
  }
  return { ...dataset, records: new RecordStream(dataset.records).seal(), headers, diagnostics };
}
