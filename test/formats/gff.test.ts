import { beforeEach, describe, expect, test } from "vitest";
import { GffError } from "../../src/errors";
import { AttributeMap } from "../../src/formats/attributes";
import {
  buildFeatureRecord,
  countGffFeatures,
  featureLength,
  filterFeaturesByType,
  GffParser,
  GffWriter,
  normalizeColumns,
  type FeatureRecord,
} from "../../src/formats/gff";
import { HeaderMetadata } from "../../src/formats/headers";
import { GFF3, quiet } from "../helpers";

const context = { skipValidation: false };

function build(line: string): FeatureRecord {
  const result = buildFeatureRecord(line.split("\t"), context);
  if (result.status !== "emitted") {
    throw new Error(`expected a feature, got ${result.defect.kind}`);
  }
  return result.record;
}

describe("buildFeatureRecord", () => {
  test("reads all nine columns", () => {
    const feature = build("chr1\tsrc\texon\t101\t200\t12.5\t-\t2\tID=exon1;Parent=gene1");

    expect(feature.sequenceId).toBe("chr1");
    expect(feature.source).toBe("src");
    expect(feature.type).toBe("exon");
    expect(feature.start).toBe(101);
    expect(feature.end).toBe(200);
    expect(feature.score).toBe(12.5);
    expect(feature.strand).toBe("-");
    expect(feature.phase).toBe(2);
    expect(feature.attributes.get("Parent")).toBe("gene1");
  });

  test("absent columns", () => {
    const feature = build("chr1\t.\tregion\t.\t.\t.\t.\t.\t.");
    expect(feature.start).toBeUndefined();
    expect(feature.end).toBeUndefined();
    expect(feature.score).toBeUndefined();
    expect(feature.strand).toBe(".");
    expect(feature.phase).toBeNull();
    expect(feature.attributes.size).toBe(0);
  });

  test("the unknown-strand marker is a valid strand", () => {
    expect(build("chr1\tsrc\tgene\t1\t10\t.\t?\t.\t.").strand).toBe("?");
  });

  test("unrecognised strand and phase are kept as written with warnings", () => {
    const result = buildFeatureRecord("chr1\tsrc\tCDS\t1\t10\t.\tx\t5\t.".split("\t"), context);
    expect(result.status).toBe("emitted");
    if (result.status === "emitted") {
      expect(result.record.strand).toEqual({ unrecognized: "x" });
      expect(result.record.phase).toEqual({ unrecognized: "5" });
      expect(result.warnings.map((warning) => warning.kind)).toEqual(["UnrecognizedEnum", "UnrecognizedEnum"]);
    }
  });

  test("a bad score is a warning", () => {
    const result = buildFeatureRecord("chr1\tsrc\tgene\t1\t10\thigh\t+\t.\t.".split("\t"), context);
    expect(result.status).toBe("emitted");
    if (result.status === "emitted") {
      expect(result.record.score).toBeUndefined();
      expect(result.warnings[0]?.kind).toBe("NotNumeric");
    }
  });

  test("empty columns read as absent", () => {
    const feature = build("chr1\t\tgene\t1\t10\t\t\t\t");
    expect(feature.source).toBe(".");
    expect(feature.strand).toBe(".");
    expect(feature.phase).toBeNull();
  });

  test("a single-base feature is valid", () => {
    expect(featureLength(build("chr1\tsrc\tSNP\t5\t5\t.\t+\t.\t."))).toBe(1);
  });

  test.each([
    ["chr1\tsrc\tgene\t1\t10", "TooFewFields"],
    [" \tsrc\tgene\t1\t10\t.\t+\t.\t.", "EmptySequenceName"],
    ["chr1\tsrc\tgene\tone\t10\t.\t+\t.\t.", "NonNumericCoordinate"],
    ["chr1\tsrc\tgene\t0\t10\t.\t+\t.\t.", "CoordinateOutOfRange"],
    ["chr1\tsrc\tgene\t20\t10\t.\t+\t.\t.", "InvalidCoordinateOrder"],
  ])("rejects %j with %s", (line, kind) => {
    const result = buildFeatureRecord(line.split("\t"), context);
    expect(result.status === "rejected" ? result.defect.kind : undefined).toBe(kind);
  });
});

describe("normalizeColumns", () => {
  test("keeps nine columns and fills empty ones", () => {
    expect(normalizeColumns(["a", "", "c", "1", "2", "", "+", "", "", "extra"])).toEqual([
      "a", ".", "c", "1", "2", ".", "+", ".", ".",
    ]);
  });
});

describe("GffParser", () => {
  let parser: GffParser;

  beforeEach(() => {
    parser = new GffParser(quiet);
  });

  test("parses features and keeps the pragma and comments as headers", () => {
    const { records, headers, diagnostics, status } = parser.parseString(GFF3);

    expect(status).toBe("loaded");
    expect(diagnostics).toEqual([]);
    expect(records.length).toBe(2);
    expect(records.at(0)?.attributes.get("Name")).toBe("BRCA1");
    expect(records.at(1)?.lineNumber).toBe(4);
    expect(Array.from(headers).map((line) => line.text)).toEqual(["##gff-version 3", "# generated for tests"]);
  });

  test("attributes are parsed only when read", () => {
    const { records } = parser.parseString(GFF3);
    const attributes = records.at(0)?.attributes;
    expect(attributes?.isParsed).toBe(false);
    expect(attributes?.get("ID")).toBe("gene1");
    expect(attributes?.isParsed).toBe(true);
  });

  test("an aborted signal stops the load with a GffError", () => {
    const controller = new AbortController();
    controller.abort();
    expect(() => new GffParser({ ...quiet, signal: controller.signal }).parseString(GFF3)).toThrow(GffError);
  });

  test("BED-shaped lines are too short for GFF3", () => {
    const { records, diagnostics, status } = parser.parseString("chr1\t0\t10\n");
    expect(records.length).toBe(0);
    expect(status).toBe("no-valid-records");
    expect(diagnostics.map((diagnostic) => diagnostic.kind)).toEqual(["TooFewFields"]);
  });
});

describe("GffWriter", () => {
  const writer = new GffWriter();

  test("formats a feature, writing absent values as '.'", () => {
    const feature: FeatureRecord = {
      sequenceId: "chr1",
      source: "bed2gff",
      type: "region",
      start: 1,
      end: 10,
      strand: "+",
      phase: null,
      attributes: AttributeMap.from({ Name: "peak1" }),
    };
    expect(writer.formatFeature(feature)).toBe("chr1\tbed2gff\tregion\t1\t10\t.\t+\t.\tName=peak1");
  });

  test("unrecognised values and empty attributes", () => {
    const feature: FeatureRecord = {
      sequenceId: "chr1",
      source: "src",
      type: "CDS",
      strand: { unrecognized: "x" },
      phase: { unrecognized: "5" },
      attributes: AttributeMap.empty(),
    };
    expect(writer.formatFeature(feature)).toBe("chr1\tsrc\tCDS\t.\t.\t.\tx\t5\t.");
  });

  test("writes one version pragma followed by retained headers", () => {
    const headers = new HeaderMetadata();
    headers.add("comment", "##gff-version 3");
    headers.add("comment", "##sequence-region chr1 1 1000");

    expect(writer.formatDocument([], headers)).toBe("##gff-version 3\n##sequence-region chr1 1 1000\n");
  });

  test("a parsed document is written back line for line", () => {
    const { records, headers } = new GffParser(quiet).parseString(GFF3);
    expect(writer.formatDocument(records, headers)).toBe(`${GFF3}\n`);
  });
});

describe("GFF3 helpers", () => {
  test("filterFeaturesByType and countGffFeatures", () => {
    const { records } = new GffParser(quiet).parseString(GFF3);
    expect(filterFeaturesByType(records, ["exon"]).map((feature) => feature.type)).toEqual(["exon"]);
    expect(countGffFeatures(GFF3)).toBe(2);
  });
});
