import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { GenomicInterval } from "../../src/formats/bed/types";
import { IntervalOps, intervalOps } from "../../src/operations";
import { collect, quiet } from "../helpers";

const records: GenomicInterval[] = [
  { sequenceName: "chr2", start: 0, end: 10, strand: "-" },
  { sequenceName: "chr1", start: 5, end: 20, strand: "+" },
  { sequenceName: "chr1", start: 0, end: 10, strand: "+" },
  { sequenceName: "chr1", start: 100, end: 400, strand: "+" },
];

describe("IntervalOps", () => {
  test("filters by declarative criteria", async () => {
    const kept = await IntervalOps.from(records).filter({ strand: "+", maxSize: 20 }).collect();
    expect(kept.map((record) => record.start)).toEqual([5, 0]);
  });

  test("filters by predicate and sequence name", async () => {
    expect(await IntervalOps.from(records).filter({ sequenceNames: ["chr2"] }).count()).toBe(1);
    expect(await IntervalOps.from(records).filter((record) => record.start >= 100).count()).toBe(1);
  });

  test("head takes the first n", async () => {
    expect(await IntervalOps.from(records).head(2).count()).toBe(2);
    expect(await IntervalOps.from(records).head(0).count()).toBe(0);
  });

  test("sorts and merges", async () => {
    const sorted = await IntervalOps.from(records).sort().collect();
    expect(sorted.map((record) => `${record.sequenceName}:${record.start}`)).toEqual([
      "chr1:0",
      "chr1:5",
      "chr1:100",
      "chr2:0",
    ]);

    const merged = await IntervalOps.from(records).merge().collect();
    expect(merged.map((record) => [record.sequenceName, record.start, record.end])).toEqual([
      ["chr1", 0, 20],
      ["chr1", 100, 400],
      ["chr2", 0, 10],
    ]);
  });

  test("summarize", async () => {
    const summary = await IntervalOps.from(records).summarize();
    expect(summary.count).toBe(4);
    expect(summary.strandCounts).toEqual({ "+": 3, "-": 1, ".": 0 });
  });

  test("is async iterable and wraps other async sources", async () => {
    const pipeline = intervalOps(IntervalOps.from(records)).filter({ strand: "-" });
    expect(await collect(pipeline)).toEqual([records[0]]);
  });
});

describe("IntervalOps file stages", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "interval-ops-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("reads a BED file, merges and writes the result", async () => {
    const input = join(dir, "in.bed");
    const output = join(dir, "out", "merged.bed");
    await writeFile(input, "chr1\t0\t10\nchr1\t10\t20\nchr1\t30\t40\n");

    await IntervalOps.fromBed(input, quiet).merge().writeBed(output);

    expect(await readFile(output, "utf8")).toBe("chr1\t0\t20\nchr1\t30\t40\n");
  });
});
