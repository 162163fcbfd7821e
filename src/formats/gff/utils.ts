/**
 * GFF3 feature helpers
 *
 * @module gff/utils
 */

import type { FeatureRecord } from "./types";

/**
 * Length in bases of a 1-based closed feature, or undefined when either
 * coordinate is absent
 *
 * @example
 * ```typescript
 * featureLength({ ...feature, start: 1, end: 10 }); // 10
 * ```
 */
function featureLength(feature: FeatureRecord): number | undefined {
  if (feature.start === undefined || feature.end === undefined) return undefined;
  return feature.end - feature.start + 1;
}

/**
 * Keep features whose type is one of `featureTypes`, in stream order
 *
 * @example
 * ```typescript
 * const exons = filterFeaturesByType(records, ["exon"]);
 * ```
 */
function filterFeaturesByType(
  features: Iterable<FeatureRecord>,
  featureTypes: readonly string[]
): FeatureRecord[] {
  const typeSet = new Set(featureTypes);
  const selected: FeatureRecord[] = [];
  for (const feature of features) {
    if (typeSet.has(feature.type)) {
      selected.push(feature);
    }
  }
  return selected;
}

/**
 * Count data lines in GFF3 text without building records
 */
function countGffFeatures(data: string): number {
  return data.split(/\r?\n/).filter((line) => {
    const trimmed = line.trim();
    return trimmed !== "" && !trimmed.startsWith("#");
  }).length;
}

export { featureLength, filterFeaturesByType, countGffFeatures };
