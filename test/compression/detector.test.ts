/**
 * Tests for compression format detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";
import { compress } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";
import { BGZFCompressor } from "../../src/formats/bgzf";

const encoder = new TextEncoder();

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test.each([
      ["cohort.hap.gz", "gzip"],
      ["COHORT.HAP.GZ", "gzip"],
      ["cohort.hap.bgz", "gzip"],
      ["archive.gzip", "gzip"],
      ["cohort.hap", "none"],
      ["C:\\data\\cohort.hap.gz", "gzip"],
    ])("%s -> %s", (path, expected) => {
      expect(CompressionDetector.fromExtension(path)).toBe(expected);
    });

    test("rejects an empty path", () => {
      expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
    });
  });

  describe("fromMagicBytes", () => {
    test("plain text is uncompressed", () => {
      expect(CompressionDetector.fromMagicBytes(encoder.encode("H\tchr1\t1\t2\thap1\n"))).toEqual({
        format: "none",
        blockCompressed: false,
      });
    });

    test("plain gzip is not block compressed", async () => {
      const bytes = await compress(encoder.encode("H\tchr1\t1\t2\thap1\n"));

      expect(CompressionDetector.fromMagicBytes(bytes)).toEqual({
        format: "gzip",
        blockCompressed: false,
      });
    });

    test("BGZF output is block compressed", () => {
      const bytes = new BGZFCompressor().compress(encoder.encode("H\tchr1\t1\t2\thap1\n"));

      expect(CompressionDetector.fromMagicBytes(bytes)).toEqual({
        format: "gzip",
        blockCompressed: true,
      });
    });

    test("a truncated BGZF header is not block compressed", () => {
      const bytes = new BGZFCompressor().compress(encoder.encode("x")).subarray(0, 12);

      expect(CompressionDetector.fromMagicBytes(bytes).blockCompressed).toBe(false);
    });
  });
});
