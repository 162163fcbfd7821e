/**
 * BED format module
 *
 * @module formats/bed
 */

export {
  BED_COLUMNS,
  BedParser,
  buildBedInterval,
  detectVariant,
  MAX_BED_SCORE,
  MIN_BED_SCORE,
  STANDARD_BED_COLUMNS,
  validateBlocks,
  type BedBuildContext,
  type BlockValidation,
} from "./parser";
export {
  GenomicIntervalSchema,
  type BedBlock,
  type BedParserOptions,
  type BedWriterOptions,
  type GenomicInterval,
} from "./types";
export { BedWriter } from "./writer";
