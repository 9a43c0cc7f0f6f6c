/**
 * Tests for gzip compression on top of zlib
 */

import { describe, expect, test } from "vitest";
import { compress, decompress, GzipDecompressor, wrapStream } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";
import { concatBytes } from "../../src/formats/bgzf";
import { readLines } from "../../src/io/stream-utils";
import { collect } from "../utils/hap-fixtures";

const encoder = new TextEncoder();
const decoder = new TextDecoder();
const HAP_TEXT = "#H\tbeta\t.2f\tEffect size\nH\tchr1\t100\t200\thap1\t0.50\n";

function streamOf(bytes: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(bytes);
      controller.close();
    },
  });
}

describe("GzipDecompressor", () => {
  describe("decompress", () => {
    test("restores compressed text", async () => {
      const compressed = await compress(encoder.encode(HAP_TEXT));

      expect(compressed[0]).toBe(0x1f);
      expect(compressed[1]).toBe(0x8b);
      expect(decoder.decode(await decompress(compressed))).toBe(HAP_TEXT);
    });

    test("should reject invalid magic bytes", async () => {
      const zipMagic = new Uint8Array([0x50, 0x4b, 0x03, 0x04]);

      await expect(GzipDecompressor.decompress(zipMagic)).rejects.toThrow(CompressionError);
      await expect(GzipDecompressor.decompress(zipMagic)).rejects.toThrow(/Invalid gzip magic bytes/);
    });

    test("should reject empty data", async () => {
      await expect(decompress(new Uint8Array(0))).rejects.toThrow(/must not be empty/);
    });

    test("reports corrupt members as compression errors", async () => {
      const compressed = await compress(encoder.encode(HAP_TEXT));
      const corrupt = compressed.slice(0, 12);

      await expect(decompress(corrupt)).rejects.toBeInstanceOf(CompressionError);
    });
  });

  describe("compress", () => {
    test("should reject levels outside 0-9", async () => {
      await expect(compress(encoder.encode(HAP_TEXT), { level: 10 })).rejects.toThrow(
        /between 0 and 9, got 10/
      );
    });
  });

  describe("wrapStream", () => {
    test("decompresses concatenated members as one stream", async () => {
      const first = await compress(encoder.encode("H\tchr1\t1\t2\thap1\n"));
      const second = await compress(encoder.encode("H\tchr1\t3\t4\thap2\n"));

      const lines = await collect(readLines(wrapStream(streamOf(concatBytes([first, second])))));

      expect(lines).toEqual(["H\tchr1\t1\t2\thap1", "H\tchr1\t3\t4\thap2"]);
    });
  });
});
