/**
 * Tests for BGZF block compression, block reading and offset-addressed lines
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { gunzipSync, gzipSync } from "node:zlib";
import { afterEach, describe, expect, test } from "vitest";
import { CompressionError } from "../../src/errors";
import {
  BGZF_BLOCK_DATA_SIZE,
  BGZF_EOF_BLOCK,
  BGZFBlockWriter,
  BGZFCompressor,
  BGZFLineCursor,
  BGZFReader,
  concatBytes,
  crc32,
  VirtualOffsetUtils,
} from "../../src/formats/bgzf";
import { RandomAccessFile } from "../../src/io/random-access";
import { collect, TempDirs } from "../utils/hap-fixtures";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Deterministic bytes that deflate cannot shrink */
function noise(length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = 12345;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    bytes[i] = state >>> 24;
  }
  return bytes;
}

function blockSizes(data: Uint8Array): number[] {
  const sizes: number[] = [];
  for (let offset = 0; offset < data.length; ) {
    const block = BGZFReader.readBlockHeader(data, offset);
    sizes.push(block.uncompressedSize);
    offset += block.compressedSize;
  }
  return sizes;
}

describe("crc32", () => {
  test("matches the standard check value", () => {
    expect(crc32(encoder.encode("123456789"))).toBe(0xcbf43926);
    expect(crc32(new Uint8Array(0))).toBe(0);
  });
});

describe("BGZFCompressor", () => {
  test("output is valid multi-member gzip ending with the EOF block", () => {
    const text = "H\tchr1\t100\t200\thap1\n".repeat(10);
    const compressed = new BGZFCompressor().compress(encoder.encode(text));

    expect(gunzipSync(compressed).toString("utf8")).toBe(text);
    expect([...compressed.subarray(compressed.length - 28)]).toEqual([...BGZF_EOF_BLOCK]);
  });

  test("splits data into blocks of at most BGZF_BLOCK_DATA_SIZE bytes", () => {
    const data = noise(200_000);
    const compressed = new BGZFCompressor({ compressionLevel: 1 }).compress(data);

    expect(blockSizes(compressed)).toEqual([65280, 65280, 65280, 4160, 0]);
    expect(BGZFReader.decompressAll(compressed)).toEqual(data);
  });

  test("incompressible blocks still fit the 64 KiB block limit", () => {
    const block = new BGZFCompressor({ compressionLevel: 9 }).compressBlock(noise(BGZF_BLOCK_DATA_SIZE));

    expect(block.length).toBeLessThanOrEqual(65536);
    expect(BGZFReader.decompressBlock(block)).toEqual(noise(BGZF_BLOCK_DATA_SIZE));
  });

  test("rejects oversized blocks and invalid levels", () => {
    expect(() => new BGZFCompressor().compressBlock(new Uint8Array(BGZF_BLOCK_DATA_SIZE + 1))).toThrow(
      /too large/
    );
    expect(() => new BGZFCompressor({ compressionLevel: 11 })).toThrow(CompressionError);
  });
});

describe("BGZFReader", () => {
  test("detects a corrupted checksum", () => {
    const block = new BGZFCompressor().compressBlock(encoder.encode("H\tchr1\t1\t2\thap1\n"));
    const index = block.length - 8;
    block[index] = (block[index] ?? 0) ^ 0xff;

    expect(() => BGZFReader.decompressBlock(block)).toThrow(/CRC32 mismatch/);
  });

  test("rejects plain gzip members", () => {
    const plain = new Uint8Array(gzipSync("H\tchr1\t1\t2\thap1\n"));

    expect(() => BGZFReader.readBlockHeader(plain, 0)).toThrow(/lacks the BGZF extra field/);
  });

  test("rejects truncated blocks", () => {
    const block = new BGZFCompressor().compressBlock(encoder.encode("some text"));

    expect(() => BGZFReader.readBlockHeader(block.subarray(0, block.length - 1), 0)).toThrow(
      /Truncated BGZF block/
    );
  });
});

describe("BGZFBlockWriter", () => {
  test("emits full blocks as data arrives and the EOF block on close", async () => {
    const emitted: Uint8Array[] = [];
    const writer = new BGZFBlockWriter(async (block) => {
      emitted.push(block);
    });
    const data = noise(70_000);

    await writer.write(data.subarray(0, 30_000));
    expect(emitted).toHaveLength(0);
    await writer.write(data.subarray(30_000));
    expect(emitted).toHaveLength(1);
    await writer.close();

    const output = concatBytes(emitted);
    expect(blockSizes(output)).toEqual([65280, 4720, 0]);
    expect(BGZFReader.decompressAll(output)).toEqual(data);
    expect(writer.bytesWritten).toBe(output.length);
    await expect(writer.write(data)).rejects.toThrow(/closed/);
  });
});

describe("VirtualOffsetUtils", () => {
  test("packs block and in-block offsets", () => {
    const offset = VirtualOffsetUtils.pack(1024, 512);

    expect(offset).toBe((1024n << 16n) | 512n);
    expect(VirtualOffsetUtils.unpack(offset)).toEqual({ blockOffset: 1024, uncompressedOffset: 512 });
    expect(VirtualOffsetUtils.format(offset)).toBe("1024:512");
  });

  test("orders offsets by block, then position", () => {
    const a = VirtualOffsetUtils.pack(10, 65535);
    const b = VirtualOffsetUtils.pack(11, 0);

    expect(VirtualOffsetUtils.compare(a, b)).toBe(-1);
    expect(VirtualOffsetUtils.compare(b, a)).toBe(1);
    expect(VirtualOffsetUtils.compare(a, a)).toBe(0);
  });

  test("rejects out-of-range parts", () => {
    expect(() => VirtualOffsetUtils.pack(0, 65536)).toThrow(CompressionError);
    expect(() => VirtualOffsetUtils.pack(-1, 0)).toThrow(CompressionError);
    expect(() => VirtualOffsetUtils.fromBigInt(-1n)).toThrow(CompressionError);
    expect(() => VirtualOffsetUtils.fromBigInt(1n << 64n)).toThrow(CompressionError);
  });
});

describe("BGZFLineCursor", () => {
  const temp = new TempDirs();

  afterEach(async () => {
    await temp.cleanup();
  });

  async function withFile<T>(bytes: Uint8Array, use: (file: RandomAccessFile) => Promise<T>): Promise<T> {
    const path = join(await temp.create(), "lines.gz");
    await writeFile(path, bytes);
    const file = await RandomAccessFile.open(path);
    try {
      return await use(file);
    } finally {
      await file.close();
    }
  }

  // 255 lines of 256 bytes fill one block exactly
  const lines = Array.from({ length: 600 }, (_, i) => `line-${String(i).padStart(4, "0")}`.padEnd(255, "."));
  const compressed = new BGZFCompressor().compress(encoder.encode(lines.map((l) => `${l}\n`).join("")));

  test("reads every line across block boundaries", async () => {
    const located = await withFile(compressed, (file) => collect(new BGZFLineCursor(file).lines()));

    expect(located.map((line) => line.text)).toEqual(lines);
  });

  test("reports offsets that seek back to the same line", async () => {
    await withFile(compressed, async (file) => {
      const cursor = new BGZFLineCursor(file);
      const located = await collect(cursor.lines());
      const target = located[400];
      expect(target).toBeDefined();
      if (target === undefined) return;

      const [first, second] = await collect(cursor.lines(target.offset));

      expect(first?.text).toBe(lines[400]);
      expect(second?.text).toBe(lines[401]);
    });
  });

  test("a line starting on a block boundary points at the next block", async () => {
    const firstBlock = BGZFReader.readBlockHeader(compressed, 0);
    const located = await withFile(compressed, (file) => collect(new BGZFLineCursor(file).lines()));

    expect(VirtualOffsetUtils.unpack(located[255]?.offset ?? VirtualOffsetUtils.pack(0, 0))).toEqual({
      blockOffset: firstBlock.compressedSize,
      uncompressedOffset: 0,
    });
  });

  test("strips CR and yields an unterminated last line", async () => {
    const bytes = new BGZFCompressor().compress(encoder.encode("a\r\nb\n\nlast"));

    const located = await withFile(bytes, (file) => collect(new BGZFLineCursor(file).lines()));

    expect(located.map((line) => line.text)).toEqual(["a", "b", "", "last"]);
    expect(decoder.decode(BGZFReader.decompressAll(bytes))).toBe("a\r\nb\n\nlast");
  });
});
