import { describe, expect, test } from "vitest";
import { detect, detectText } from "../../src/formats/detection";
import { BED6, GFF3 } from "../helpers";

describe("detect", () => {
  test("BED data", () => {
    expect(detect(["chr1\t0\t10", "chr2\t5\t50"])).toEqual({ format: "bed", confidence: 1 });
    expect(detectText(BED6)).toEqual({ format: "bed", confidence: 1 });
  });

  test("GFF3 data", () => {
    expect(detectText(GFF3)).toEqual({ format: "gff", confidence: 1 });
  });

  test("confidence is the share of data lines that fit", () => {
    expect(detect(["chr1\t0\t10", "chr1\t5\t3", "chr2\t1\t2"])).toEqual({ format: "bed", confidence: 2 / 3 });
  });

  test("an agreeing header raises confidence to at least 0.9", () => {
    expect(detect(["track name=x", "chr1\t0\t10", "junk"])).toEqual({ format: "bed", confidence: 0.9 });
  });

  test("headers alone give a weak guess", () => {
    expect(detect(["track name=x"])).toEqual({ format: "bed", confidence: 0.5 });
    expect(detect(["##gff-version 3"])).toEqual({ format: "gff", confidence: 0.5 });
  });

  test("a line fitting both formats is settled by a pragma", () => {
    const ambiguous = "chr1\t1\t10\t1\t10\t.\t+\t.\tx";
    expect(detect([ambiguous])).toEqual({ format: "unknown", confidence: 0 });
    expect(detect(["##gff-version 3", ambiguous])).toEqual({ format: "gff", confidence: 1 });
  });

  test("unrecognisable input", () => {
    expect(detect([])).toEqual({ format: "unknown", confidence: 0 });
    expect(detectText("hello world\nsecond line\n")).toEqual({ format: "unknown", confidence: 0 });
  });
});
