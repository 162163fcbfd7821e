/**
 * Configuration surface shared by the loaders, writers, merge and converter
 *
 * Defaults follow the conventions of the UCSC BED and GFF3 ecosystems.
 * User overrides are validated with ArkType before use.
 *
 * @module config
 */

import { type } from "arktype";
import { ValidationError } from "./errors";

const IntervalConfigSchema = type({
  skipValidation: "boolean",
  defaultScore: "string",
  defaultName: "string",
  defaultStrand: '"+" | "-" | "."',
  maxRegionSize: "number>=0",
  minRegionSize: "number>=0",
  gffNameAttributeKey: "string>0",
  gffScoreAttributeKey: "string>0",
  gffFeatureType: "string>0",
  gffSource: "string>0",
  chromosomeOrder: '"lexical" | "natural"',
  blockStartsBase: '"absolute" | "relative"',
}).narrow((config, ctx) => {
  if (!Number.isInteger(config.maxRegionSize) || !Number.isInteger(config.minRegionSize)) {
    return ctx.reject("region size thresholds must be whole numbers of bases");
  }
  if (config.minRegionSize > config.maxRegionSize) {
    return ctx.reject("minRegionSize cannot exceed maxRegionSize");
  }
  return true;
});

export type IntervalConfig = typeof IntervalConfigSchema.infer;

export const DEFAULT_CONFIG: Readonly<IntervalConfig> = Object.freeze({
  skipValidation: false,
  defaultScore: "0",
  defaultName: ".",
  defaultStrand: ".",
  maxRegionSize: 1_000_000,
  minRegionSize: 0,
  gffNameAttributeKey: "Name",
  gffScoreAttributeKey: "score",
  gffFeatureType: "region",
  gffSource: "bed2gff",
  chromosomeOrder: "lexical",
  blockStartsBase: "absolute",
});

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws {ValidationError} When any value is out of range or of the wrong type
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ gffFeatureType: "exon", maxRegionSize: 50_000 });
 * ```
 */
export function resolveConfig(overrides: Partial<IntervalConfig> = {}): IntervalConfig {
  const provided = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = IntervalConfigSchema({ ...DEFAULT_CONFIG, ...provided });

  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid configuration: ${result.summary}`);
  }
  return result;
}
