/**
 * Central format module exports
 *
 * One import point for the BED and GFF3 parsers, writers and the shared
 * line, field, attribute and header machinery they are built on.
 *
 * @example
 * ```typescript
 * import { BedParser, GffWriter, AttributeMap } from "../formats";
 * ```
 */

// Shared parser skeleton
export {
  AbstractParser,
  type BuildResult,
  type BuildStage,
  type LoadStatus,
  type LoadTarget,
  type ParseOutcome,
} from "./abstract-parser";
// Attribute lists (GFF3 column 9, track line key=value pairs)
export {
  AttributeMap,
  encodeAttributeValue,
  GFF_ATTRIBUTE_SYNTAX,
  parseAttributes,
  TRACK_ATTRIBUTE_SYNTAX,
  type AttributeSyntax,
  type ParsedAttributes,
} from "./attributes";
// BED format exports
export {
  BED_COLUMNS,
  BedParser,
  BedWriter,
  buildBedInterval,
  detectVariant,
  GenomicIntervalSchema,
  MAX_BED_SCORE,
  MIN_BED_SCORE,
  STANDARD_BED_COLUMNS,
  validateBlocks,
  type BedBlock,
  type BedBuildContext,
  type BedParserOptions,
  type BedWriterOptions,
  type BlockValidation,
  type GenomicInterval,
} from "./bed";
// Format detection
export {
  detect,
  detectText,
  DETECTION_SAMPLE_SIZE,
  HEADER_CONFIDENCE,
  HEADER_ONLY_CONFIDENCE,
  type DetectionResult,
} from "./detection";
// Column coercion
export {
  clamp,
  clampRgb,
  coerce,
  coerceEnum,
  coerceFloat,
  coerceInteger,
  coerceIntegerList,
  coerceRgb,
  coerceString,
  enumColumn,
  floatColumn,
  formatRgb,
  integerColumn,
  integerListColumn,
  NEUTRAL_RGB,
  readColumn,
  rgbColumn,
  stringColumn,
  type CoercionResult,
  type ColumnRead,
  type ColumnSpec,
  type EnumKind,
  type FieldKind,
  type FieldValue,
} from "./fields";
// GFF3 format exports
export {
  ABSENT,
  buildFeatureRecord,
  countGffFeatures,
  FeatureRecordSchema,
  featureLength,
  filterFeaturesByType,
  GFF_COLUMN_COUNT,
  GFF_COLUMNS,
  GFF_VERSION_HEADER,
  GffParser,
  GffWriter,
  normalizeColumns,
  validateGffStrand,
  type FeatureRecord,
  type GffBuildContext,
  type GffParserOptions,
} from "./gff";
// Header lines
export { HeaderMetadata, isGffVersionPragma, type HeaderKind, type HeaderLine } from "./headers";
// Line classification
export {
  classifyLine,
  FIELD_DELIMITER,
  MINIMUM_FIELDS,
  splitLines,
  stripLineEnding,
  type ClassifiedLine,
} from "./lines";
