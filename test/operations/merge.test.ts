import { describe, expect, test } from "vitest";
import type { GenomicInterval } from "../../src/formats/bed/types";
import {
  compareSequenceNames,
  mergeIntervals,
  overlaps,
  sortIntervals,
  touchesOrOverlaps,
} from "../../src/operations/merge";

function interval(sequenceName: string, start: number, end: number, name?: string): GenomicInterval {
  return { sequenceName, start, end, strand: ".", ...(name !== undefined ? { name } : {}) };
}

function spans(records: readonly GenomicInterval[]): [string, number, number][] {
  return records.map((record) => [record.sequenceName, record.start, record.end]);
}

describe("compareSequenceNames", () => {
  test("lexical order compares code units", () => {
    expect(compareSequenceNames("chr10", "chr2")).toBeLessThan(0);
    expect(compareSequenceNames("chrX", "chr1")).toBeGreaterThan(0);
    expect(compareSequenceNames("chr1", "chr1")).toBe(0);
  });

  test("natural order compares numeric runs by value", () => {
    expect(compareSequenceNames("chr10", "chr2", "natural")).toBeGreaterThan(0);
    expect(compareSequenceNames("chr2", "chr2_random", "natural")).toBeLessThan(0);
    expect(compareSequenceNames("chr01", "chr1", "natural")).toBeGreaterThan(0);
  });
});

describe("overlap tests", () => {
  test("half-open intervals that only touch do not overlap", () => {
    const a = interval("chr1", 0, 10);
    const b = interval("chr1", 10, 20);
    expect(overlaps(a, b)).toBe(false);
    expect(touchesOrOverlaps(a, b)).toBe(true);
    expect(touchesOrOverlaps(a, interval("chr2", 10, 20))).toBe(false);
  });
});

describe("sortIntervals", () => {
  test("sorts by sequence then start, keeping ties in input order", () => {
    const sorted = sortIntervals([
      interval("chr2", 5, 10),
      interval("chr1", 50, 60, "b"),
      interval("chr1", 50, 55, "a"),
      interval("chr1", 0, 10),
    ]);
    expect(sorted.map((record) => record.name ?? record.start)).toEqual([0, "b", "a", 5]);
  });
});

describe("mergeIntervals", () => {
  const input = [
    interval("chr1", 20, 30, "c"),
    interval("chr1", 0, 10, "a"),
    interval("chr1", 5, 15, "b"),
    interval("chr2", 0, 5),
    interval("chr1", 30, 40, "d"),
    interval("chr1", 100, 110, "e"),
  ];

  test("merges overlapping and book-ended intervals per sequence", () => {
    expect(spans(mergeIntervals(input))).toEqual([
      ["chr1", 0, 15],
      ["chr1", 20, 40],
      ["chr1", 100, 110],
      ["chr2", 0, 5],
    ]);
  });

  test("a merged run keeps the first record's name and strand", () => {
    const [first, second] = mergeIntervals(input);
    expect(first).toEqual({ sequenceName: "chr1", start: 0, end: 15, name: "a", strand: "." });
    expect(second?.name).toBe("c");
  });

  test("a lone interval comes back as is", () => {
    const lone = interval("chr3", 0, 10);
    expect(mergeIntervals([lone])[0]).toBe(lone);
  });

  test("is idempotent", () => {
    const once = mergeIntervals(input);
    expect(mergeIntervals(once)).toEqual(once);
  });

  test("never returns more intervals than it was given and leaves none touching", () => {
    const merged = mergeIntervals(input);
    expect(merged.length).toBeLessThanOrEqual(input.length);
    for (let i = 1; i < merged.length; i++) {
      const previous = merged[i - 1];
      const current = merged[i];
      if (previous !== undefined && current !== undefined) {
        expect(touchesOrOverlaps(previous, current)).toBe(false);
      }
    }
  });

  test("does not modify its input", () => {
    const copy = input.map((record) => ({ ...record }));
    mergeIntervals(input);
    expect(input).toEqual(copy);
  });

  test("a contained interval does not shrink the run", () => {
    expect(spans(mergeIntervals([interval("chr1", 0, 100), interval("chr1", 10, 20)]))).toEqual([["chr1", 0, 100]]);
  });

  test("natural order puts chr2 before chr10", () => {
    const merged = mergeIntervals([interval("chr10", 0, 5), interval("chr2", 0, 5)], { chromosomeOrder: "natural" });
    expect(merged.map((record) => record.sequenceName)).toEqual(["chr2", "chr10"]);
  });

  test("empty input", () => {
    expect(mergeIntervals([])).toEqual([]);
  });
});
