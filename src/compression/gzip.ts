/**
 * Gzip compression and decompression on top of Node's zlib
 *
 * Multi-member gzip input is accepted, so BGZF-compressed haplotype files
 * decompress here as ordinary gzip.
 */

import { promisify } from "node:util";
import { DecompressionStream } from "node:stream/web";
import { gunzip, gzip } from "node:zlib";
import { CompressionError } from "../errors";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const GZIP_MAGIC_BYTE1 = 0x1f;
const GZIP_MAGIC_BYTE2 = 0x8b;

export interface GzipOptions {
  /** zlib compression level, 0-9 */
  level?: number;
}

function validateGzipFormat(compressed: Uint8Array): void {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "gzip", "decompress");
  }
  if (
    compressed.length < 2 ||
    compressed[0] !== GZIP_MAGIC_BYTE1 ||
    compressed[1] !== GZIP_MAGIC_BYTE2
  ) {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }
}

/**
 * Compress a buffer into a single gzip member
 *
 * @throws {CompressionError} If the level is out of range or zlib fails
 */
export async function compress(data: Uint8Array, options: GzipOptions = {}): Promise<Uint8Array> {
  const level = options.level ?? 6;
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw new CompressionError(
      `Compression level must be an integer between 0 and 9, got ${level}`,
      "gzip",
      "compress"
    );
  }

  try {
    return new Uint8Array(await gzipAsync(data, { level }));
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "compress", error, data.length);
  }
}

/**
 * Decompress an entire gzip buffer in memory
 *
 * @throws {CompressionError} If the data is not gzip or is corrupt
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  validateGzipFormat(compressed);

  try {
    return new Uint8Array(await gunzipAsync(compressed));
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "decompress", error, compressed.length);
  }
}

/**
 * Wrap a compressed byte stream with gzip decompression
 *
 * @example
 * ```typescript
 * const stream = await createStream("haplotypes.hap.gz", { autoDecompress: false });
 * for await (const line of readLines(wrapStream(stream))) {
 *   console.log(line);
 * }
 * ```
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  try {
    return input.pipeThrough(new DecompressionStream("gzip"));
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "stream", error);
  }
}

export const GzipDecompressor = {
  compress,
  decompress,
  wrapStream,
} as const;
