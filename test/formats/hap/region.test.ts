/**
 * Tests for region strings
 */

import { describe, expect, test } from "vitest";
import { RegionError } from "../../../src/errors";
import { formatRegion, parseRegion, validateRegion } from "../../../src/formats/hap/region";

describe("parseRegion", () => {
  test("reads contig and closed interval", () => {
    expect(parseRegion("chr1:100-200")).toEqual({ contig: "chr1", start: 100, end: 200 });
  });

  test("accepts thousands separators", () => {
    expect(parseRegion("chr1:10,000-20,000")).toEqual({ contig: "chr1", start: 10000, end: 20000 });
  });

  test("a bare name covers the whole contig", () => {
    expect(parseRegion("hap1")).toEqual({ contig: "hap1", start: 0, end: Number.MAX_SAFE_INTEGER });
  });

  test("only a trailing coordinate part is split off", () => {
    expect(parseRegion("HLA:A:5-10")).toEqual({ contig: "HLA:A", start: 5, end: 10 });
    expect(parseRegion("HLA:A")).toEqual({ contig: "HLA:A", start: 0, end: Number.MAX_SAFE_INTEGER });
    expect(parseRegion("chr1:-5").contig).toBe("chr1:-5");
  });

  test("single-base regions are allowed", () => {
    expect(parseRegion("chr1:7-7")).toEqual({ contig: "chr1", start: 7, end: 7 });
  });

  test.each(["", ":1-2", "chr1:20-10", "chr1:1-99999999999999999"])("rejects %j", (region) => {
    expect(() => parseRegion(region)).toThrow(RegionError);
  });

  test("errors carry the region text", () => {
    try {
      parseRegion("chr1:20-10");
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ region: "chr1:20-10", message: "Region start 20 is after end 10" });
    }
  });
});

describe("validateRegion", () => {
  test("returns valid regions unchanged", () => {
    const region = { contig: "chr1", start: 0, end: 0 };

    expect(validateRegion(region)).toBe(region);
  });

  test("rejects negative and fractional coordinates", () => {
    expect(() => validateRegion({ contig: "chr1", start: -1, end: 5 })).toThrow(/non-negative integers/);
    expect(() => validateRegion({ contig: "chr1", start: 0, end: 1.5 })).toThrow(RegionError);
    expect(() => validateRegion({ contig: "chr\t1", start: 0, end: 1 })).toThrow(/contig name/);
  });

  test("formatRegion writes contig:start-end", () => {
    expect(formatRegion({ contig: "hap1", start: 10, end: 20 })).toBe("hap1:10-20");
  });
});
