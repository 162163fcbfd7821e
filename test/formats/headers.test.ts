import { describe, expect, test } from "vitest";
import { HeaderMetadata, isGffVersionPragma } from "../../src/formats/headers";

describe("HeaderMetadata", () => {
  test("keeps header lines in order with line numbers", () => {
    const headers = new HeaderMetadata();
    headers.add("browser", "browser position chr1:1-100", 1);
    headers.add("track", 'track name="Peaks" color=255,0,0', 2);
    headers.add("comment", "# note");

    expect(headers.length).toBe(3);
    expect(headers.at(0)).toEqual({ kind: "browser", text: "browser position chr1:1-100", lineNumber: 1 });
    expect(headers.at(2)).toEqual({ kind: "comment", text: "# note" });
    expect(Array.from(headers).map((line) => line.kind)).toEqual(["browser", "track", "comment"]);
  });

  test("parses track attributes on demand", () => {
    const headers = new HeaderMetadata();
    headers.add("track", 'track name="Peaks" color=255,0,0');

    const track = headers.track(0);
    expect(track?.get("name")).toBe("Peaks");
    expect(track?.get("color")).toBe("255,0,0");
    expect(headers.track(0)).toBe(track);
    expect(headers.track(1)).toBeUndefined();
  });

  test("non-track lines have no attributes", () => {
    const headers = new HeaderMetadata();
    const line = headers.add("comment", "# name=x");
    expect(headers.attributesOf(line).size).toBe(0);
  });

  test("from copies lines", () => {
    const source = new HeaderMetadata();
    source.add("comment", "# a");
    const copy = HeaderMetadata.from(source);
    source.add("comment", "# b");
    expect(copy.length).toBe(1);
  });
});

describe("isGffVersionPragma", () => {
  test("matches the version directive only", () => {
    expect(isGffVersionPragma("##gff-version 3")).toBe(true);
    expect(isGffVersionPragma("##gff-version")).toBe(true);
    expect(isGffVersionPragma("##gff-version3.1")).toBe(false);
    expect(isGffVersionPragma("##sequence-region chr1 1 100")).toBe(false);
  });
});
