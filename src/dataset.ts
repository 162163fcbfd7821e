/**
 * A loaded document: records of one format plus what travelled with them
 *
 * @module dataset
 */

import type { Diagnostic } from "./diagnostics";
import type { GenomicInterval } from "./formats/bed/types";
import type { FeatureRecord } from "./formats/gff/types";
import type { HeaderMetadata } from "./formats/headers";
import type { LoadStatus } from "./formats/abstract-parser";
import type { RecordStream } from "./record-stream";

interface DatasetBase<TFormat extends string, TRecord> {
  readonly format: TFormat;
  readonly records: RecordStream<TRecord>;
  readonly headers: HeaderMetadata;
  readonly diagnostics: readonly Diagnostic[];
  /** "no-valid-records" lets a host fall back to a plain table view */
  readonly status: LoadStatus;
}

export type BedDataset = DatasetBase<"bed", GenomicInterval>;
export type GffDataset = DatasetBase<"gff", FeatureRecord>;
export type Dataset = BedDataset | GffDataset;

export function statusOf(records: RecordStream<unknown>): LoadStatus {
  return records.length > 0 ? "loaded" : "no-valid-records";
}
