import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "../src/config";
import { ValidationError } from "../src/errors";

describe("resolveConfig", () => {
  test("defaults", () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.gffFeatureType).toBe("region");
    expect(DEFAULT_CONFIG.maxRegionSize).toBe(1_000_000);
  });

  test("overrides replace defaults and undefined is ignored", () => {
    const config = resolveConfig({ gffFeatureType: "exon", defaultName: undefined });
    expect(config.gffFeatureType).toBe("exon");
    expect(config.defaultName).toBe(".");
  });

  test.each([
    [{ maxRegionSize: -1 }],
    [{ minRegionSize: 10, maxRegionSize: 5 }],
    [{ maxRegionSize: 1.5 }],
    [{ gffFeatureType: "" }],
  ])("rejects %j", (overrides) => {
    expect(() => resolveConfig(overrides)).toThrow(ValidationError);
  });
});
