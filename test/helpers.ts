/**
 * Shared test fixtures
 */

import type { ParserOptions } from "../src/types";

/** Parser hooks that keep console output quiet */
export const quiet: Pick<ParserOptions, "onError" | "onWarning"> = {
  onError: () => {},
  onWarning: () => {},
};

/** Node 20 has no Array.fromAsync */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export const BED6 = [
  "track name=peaks description=\"Test peaks\"",
  "chr1\t100\t200\tpeak1\t500\t+",
  "chr1\t150\t300\tpeak2\t900\t-",
  "chr2\t0\t50\tpeak3\t10\t.",
].join("\n");

export const GFF3 = [
  "##gff-version 3",
  "# generated for tests",
  "chr1\tsrc\tgene\t1\t1000\t.\t+\t.\tID=gene1;Name=BRCA1",
  "chr1\tsrc\texon\t101\t200\t12.5\t+\t0\tID=exon1;Parent=gene1",
].join("\n");
