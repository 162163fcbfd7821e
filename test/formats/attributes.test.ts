import { describe, expect, test } from "vitest";
import {
  AttributeMap,
  encodeAttributeValue,
  GFF_ATTRIBUTE_SYNTAX,
  parseAttributes,
  TRACK_ATTRIBUTE_SYNTAX,
} from "../../src/formats/attributes";

describe("parseAttributes", () => {
  test("GFF3 key=value pairs in order", () => {
    const { entries, defects } = parseAttributes("ID=gene1;Name=BRCA1");
    expect(Array.from(entries)).toEqual([
      ["ID", "gene1"],
      ["Name", "BRCA1"],
    ]);
    expect(defects).toEqual([]);
  });

  test("a bare key becomes an empty value with a defect", () => {
    const { entries, defects } = parseAttributes("lonelykey");
    expect(entries.get("lonelykey")).toBe("");
    expect(defects).toHaveLength(1);
    expect(defects[0]?.kind).toBe("MalformedAttribute");
    expect(defects[0]?.field).toBe("lonelykey");
  });

  test("empty text and the absent marker give no entries", () => {
    expect(parseAttributes("").entries.size).toBe(0);
    expect(parseAttributes(".").entries.size).toBe(0);
  });

  test("skips empty segments and empty keys", () => {
    const { entries, defects } = parseAttributes("ID=a;; =b;Note=x ");
    expect(Array.from(entries.keys())).toEqual(["ID", "Note"]);
    expect(entries.get("Note")).toBe("x");
    expect(defects.map((defect) => defect.kind)).toEqual(["MalformedAttribute"]);
  });

  test("a value may itself contain the key/value separator", () => {
    expect(parseAttributes("Note=a=b").entries.get("Note")).toBe("a=b");
  });

  test("track syntax splits on whitespace outside quotes", () => {
    const { entries } = parseAttributes(
      ' name="My Track" description=\'two words\' visibility=2',
      TRACK_ATTRIBUTE_SYNTAX
    );
    expect(Object.fromEntries(entries)).toEqual({
      name: "My Track",
      description: "two words",
      visibility: "2",
    });
  });
});

describe("encodeAttributeValue", () => {
  test("percent-encodes reserved characters", () => {
    expect(encodeAttributeValue("a;b=c&d\te")).toBe("a%3Bb%3Dc%26d%09e");
    expect(encodeAttributeValue("plain value")).toBe("plain value");
  });
});

describe("AttributeMap", () => {
  test("parses lazily and formats the source verbatim", () => {
    const map = AttributeMap.parse("ID=g1; Name=x");
    expect(map.isParsed).toBe(false);
    expect(map.get("Name")).toBe("x");
    expect(map.isParsed).toBe(true);
    expect(map.format()).toBe("ID=g1; Name=x");
  });

  test("with and without return new maps", () => {
    const original = AttributeMap.parse("ID=g1;Name=x");
    const renamed = original.with("Name", "y");
    const trimmed = original.without("ID");

    expect(original.get("Name")).toBe("x");
    expect(renamed.format()).toBe("ID=g1;Name=y");
    expect(trimmed.format()).toBe("Name=x");
    expect(renamed.with("Note", "a;b").format()).toBe("ID=g1;Name=y;Note=a%3Bb");
  });

  test("from records and entry lists", () => {
    expect(AttributeMap.from({ ID: "a", flag: "" }).format()).toBe("ID=a;flag");
    expect(AttributeMap.from([["k", "v"]], GFF_ATTRIBUTE_SYNTAX).toObject()).toEqual({ k: "v" });
    expect(AttributeMap.empty().format()).toBe("");
    expect(AttributeMap.empty().size).toBe(0);
  });

  test("track maps quote values with whitespace", () => {
    const map = AttributeMap.from({ name: "My Track", visibility: "2" }, TRACK_ATTRIBUTE_SYNTAX);
    expect(map.format()).toBe('name="My Track" visibility=2');
  });

  test("exposes parse defects", () => {
    expect(AttributeMap.parse("ID=a;oops").defects).toHaveLength(1);
  });
});
