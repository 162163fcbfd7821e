/**
 * GFF3 format module
 *
 * @module gff
 */

export {
  ABSENT,
  buildFeatureRecord,
  GFF_COLUMN_COUNT,
  GFF_COLUMNS,
  GffParser,
  normalizeColumns,
  validateGffStrand,
  type GffBuildContext,
} from "./parser";
export { FeatureRecordSchema, type FeatureRecord, type GffParserOptions } from "./types";
export { countGffFeatures, featureLength, filterFeaturesByType } from "./utils";
export { GFF_VERSION_HEADER, GffWriter } from "./writer";
