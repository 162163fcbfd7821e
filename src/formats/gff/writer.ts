/**
 * GFF3 format writer
 *
 * @module gff/writer
 */

import { isUnrecognized } from "../../types";
import { isGffVersionPragma, type HeaderMetadata } from "../headers";
import { ABSENT } from "./parser";
import type { FeatureRecord } from "./types";

export const GFF_VERSION_HEADER = "##gff-version 3";

/**
 * GFF3 format writer
 *
 * @example
 * ```typescript
 * const writer = new GffWriter();
 * writer.formatFeature(feature);
 * // "chr1\tbed2gff\tregion\t1\t10\t.\t+\t.\tName=peak1"
 * ```
 *
 * @public
 */
export class GffWriter {
  /**
   * Format a single feature as a tab-separated line, without terminator
   */
  formatFeature(feature: FeatureRecord): string {
    const attributes = feature.attributes.format();
    const fields: string[] = [
      feature.sequenceId,
      feature.source,
      feature.type,
      feature.start !== undefined ? feature.start.toString() : ABSENT,
      feature.end !== undefined ? feature.end.toString() : ABSENT,
      feature.score !== undefined ? feature.score.toString() : ABSENT,
      isUnrecognized(feature.strand) ? feature.strand.unrecognized : feature.strand,
      formatPhase(feature.phase),
      attributes === "" ? ABSENT : attributes,
    ];

    return fields.join("\t");
  }

  /**
   * Format a complete document: the version pragma, any other retained
   * header lines, then one line per feature
   */
  formatDocument(features: Iterable<FeatureRecord>, headers?: HeaderMetadata): string {
    const lines: string[] = [GFF_VERSION_HEADER];
    for (const header of headers ?? []) {
      if (!isGffVersionPragma(header.text)) {
        lines.push(header.text);
      }
    }
    for (const feature of features) {
      lines.push(this.formatFeature(feature));
    }
    return lines.map((line) => `${line}\n`).join("");
  }
}

function formatPhase(phase: FeatureRecord["phase"]): string {
  if (phase === null) return ABSENT;
  if (isUnrecognized(phase)) return phase.unrecognized;
  return phase.toString();
}
