import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import type { GenomicInterval } from "../../src/formats/bed/types";
import {
  distanceToNext,
  filterBySize,
  regionLength,
  selectByStrand,
  selectLargeRegions,
  summarizeByChromosome,
  summarizeRegions,
} from "../../src/operations/regions";

const records: GenomicInterval[] = [
  { sequenceName: "chr1", start: 0, end: 100, strand: "+" },
  { sequenceName: "chr1", start: 150, end: 400, strand: "+" },
  { sequenceName: "chr1", start: 350, end: 360, strand: "-" },
  { sequenceName: "chr2", start: 0, end: 2_000_000, strand: "." },
];

describe("region summaries", () => {
  test("regionLength is end - start", () => {
    expect(regionLength({ sequenceName: "chr1", start: 10, end: 25, strand: "." })).toBe(15);
  });

  test("summarizeRegions", () => {
    expect(summarizeRegions(records)).toEqual({
      count: 4,
      totalBases: 2_000_360,
      sequenceCount: 2,
      strandCounts: { "+": 2, "-": 1, ".": 1 },
    });
  });

  test("summarizeByChromosome in order of first appearance", () => {
    expect(summarizeByChromosome(records)).toEqual([
      { sequenceName: "chr1", count: 3, totalBases: 360, minLength: 10, maxLength: 250, meanLength: 120 },
      {
        sequenceName: "chr2",
        count: 1,
        totalBases: 2_000_000,
        minLength: 2_000_000,
        maxLength: 2_000_000,
        meanLength: 2_000_000,
      },
    ]);
  });

  test("empty input", () => {
    expect(summarizeRegions([]).count).toBe(0);
    expect(summarizeByChromosome([])).toEqual([]);
  });
});

describe("region selections", () => {
  test("filterBySize is inclusive and defaults to the configured bounds", () => {
    expect(filterBySize(records, { minRegionSize: 100, maxRegionSize: 250 }).map(regionLength)).toEqual([100, 250]);
    expect(filterBySize(records).map(regionLength)).toEqual([100, 250, 10]);
  });

  test("selectLargeRegions is strictly greater than maxRegionSize", () => {
    expect(selectLargeRegions(records, { maxRegionSize: 250 }).map(regionLength)).toEqual([2_000_000]);
    expect(selectLargeRegions(records)).toHaveLength(1);
  });

  test("a configured threshold changes the selection", () => {
    expect(selectLargeRegions(records, { maxRegionSize: 99 }).map(regionLength)).toEqual([100, 250, 2_000_000]);
    expect(filterBySize(records, { minRegionSize: 50 }).map(regionLength)).toEqual([100, 250]);
  });

  test("crossed thresholds are rejected", () => {
    expect(() => filterBySize(records, { minRegionSize: 500, maxRegionSize: 100 })).toThrow(ValidationError);
  });

  test("selectByStrand", () => {
    expect(selectByStrand(records, "-")).toEqual([records[2]]);
  });

  test("distanceToNext measures to the next interval on the same sequence", () => {
    expect(distanceToNext(records)).toEqual([50, -50, undefined, undefined]);
  });

  test("distanceToNext skips intervals on other sequences", () => {
    const interleaved: GenomicInterval[] = [
      { sequenceName: "chr1", start: 0, end: 10, strand: "." },
      { sequenceName: "chr2", start: 0, end: 10, strand: "." },
      { sequenceName: "chr1", start: 20, end: 30, strand: "." },
    ];
    expect(distanceToNext(interleaved)).toEqual([10, undefined, undefined]);
  });
});
