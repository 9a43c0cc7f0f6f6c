/**
 * BGZF (Block GZIP Format) compressor
 *
 * BGZF output is a series of independent gzip members, each holding at most
 * 64 KiB of data and announcing its own compressed size in a `BC` extra
 * subfield. Every block can therefore be located and inflated on its own,
 * which is what region queries rely on. Ordinary gzip readers see the file
 * as multi-member gzip.
 *
 * Block layout:
 * - 18-byte gzip header with the `BC` subfield (block size minus 1)
 * - raw deflate data
 * - CRC32 and ISIZE of the uncompressed data (8 bytes)
 */

import { deflateRawSync } from "node:zlib";
import { CompressionError } from "../../errors";
import { crc32 } from "./crc32";

/** Uncompressed bytes per block, leaving room for incompressible data */
export const BGZF_BLOCK_DATA_SIZE = 0xff00;
export const BGZF_MAX_BLOCK_SIZE = 65536;
export const BGZF_HEADER_SIZE = 18;
export const BGZF_FOOTER_SIZE = 8;

/**
 * Empty block that marks the end of a BGZF file
 */
export const BGZF_EOF_BLOCK: Uint8Array = new Uint8Array([
  0x1f, 0x8b, 0x08, 0x04, 0x00, 0x00, 0x00, 0x00, 0x00, 0xff, 0x06, 0x00, 0x42, 0x43, 0x02, 0x00,
  0x1b, 0x00, 0x03, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
]);

export interface BGZFCompressorOptions {
  /** zlib compression level, 0-9 */
  compressionLevel?: number;
}

/**
 * Compresses data into BGZF blocks
 *
 * @example
 * ```typescript
 * const compressor = new BGZFCompressor({ compressionLevel: 6 });
 * const bytes = compressor.compress(new TextEncoder().encode(text));
 * ```
 */
export class BGZFCompressor {
  private readonly compressionLevel: number;

  constructor(options: BGZFCompressorOptions = {}) {
    this.compressionLevel = options.compressionLevel ?? 6;
    if (
      !Number.isInteger(this.compressionLevel) ||
      this.compressionLevel < 0 ||
      this.compressionLevel > 9
    ) {
      throw new CompressionError(
        `Compression level must be an integer between 0 and 9, got ${this.compressionLevel}`,
        "bgzf",
        "compress"
      );
    }
  }

  /**
   * Compress one block of at most {@link BGZF_BLOCK_DATA_SIZE} bytes
   *
   * @throws {CompressionError} If the data does not fit in one block
   */
  compressBlock(data: Uint8Array): Uint8Array {
    if (data.length > BGZF_BLOCK_DATA_SIZE) {
      throw new CompressionError(
        `Data block too large: ${data.length} bytes (max ${BGZF_BLOCK_DATA_SIZE})`,
        "bgzf",
        "compress",
        data.length
      );
    }

    let deflated = this.deflate(data, this.compressionLevel);
    if (deflated.length + BGZF_HEADER_SIZE + BGZF_FOOTER_SIZE > BGZF_MAX_BLOCK_SIZE) {
      // Stored blocks only add a few bytes of framing
      deflated = this.deflate(data, 0);
    }

    const blockSize = BGZF_HEADER_SIZE + deflated.length + BGZF_FOOTER_SIZE;
    const block = new Uint8Array(blockSize);
    const view = new DataView(block.buffer);

    block.set([0x1f, 0x8b, 0x08, 0x04, 0, 0, 0, 0, 0, 0xff], 0);
    view.setUint16(10, 6, true); // XLEN
    block[12] = 0x42; // 'B'
    block[13] = 0x43; // 'C'
    view.setUint16(14, 2, true); // SLEN
    view.setUint16(16, blockSize - 1, true);

    block.set(deflated, BGZF_HEADER_SIZE);
    view.setUint32(blockSize - 8, crc32(data), true);
    view.setUint32(blockSize - 4, data.length, true);

    return block;
  }

  /**
   * Compress a whole buffer, ending with the EOF marker block
   */
  compress(data: Uint8Array): Uint8Array {
    const blocks: Uint8Array[] = [];
    for (let offset = 0; offset < data.length; offset += BGZF_BLOCK_DATA_SIZE) {
      blocks.push(this.compressBlock(data.subarray(offset, offset + BGZF_BLOCK_DATA_SIZE)));
    }
    blocks.push(BGZF_EOF_BLOCK);
    return concatBytes(blocks);
  }

  private deflate(data: Uint8Array, level: number): Uint8Array {
    try {
      return new Uint8Array(deflateRawSync(data, { level }));
    } catch (error) {
      throw CompressionError.fromSystemError("bgzf", "compress", error, data.length);
    }
  }
}

/**
 * Buffers written bytes and emits full BGZF blocks to a sink
 *
 * Block boundaries fall every {@link BGZF_BLOCK_DATA_SIZE} uncompressed
 * bytes regardless of line boundaries; readers join lines across blocks.
 */
export class BGZFBlockWriter {
  private readonly buffer = new Uint8Array(BGZF_BLOCK_DATA_SIZE);
  private buffered = 0;
  private compressedBytes = 0;
  private closed = false;

  constructor(
    private readonly sink: (block: Uint8Array) => Promise<void>,
    private readonly compressor: BGZFCompressor = new BGZFCompressor()
  ) {}

  /** Compressed bytes handed to the sink so far */
  get bytesWritten(): number {
    return this.compressedBytes;
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new CompressionError("BGZF writer is closed", "bgzf", "compress");
    }

    let offset = 0;
    while (offset < data.length) {
      const take = Math.min(data.length - offset, BGZF_BLOCK_DATA_SIZE - this.buffered);
      this.buffer.set(data.subarray(offset, offset + take), this.buffered);
      this.buffered += take;
      offset += take;

      if (this.buffered === BGZF_BLOCK_DATA_SIZE) {
        await this.flushBlock();
      }
    }
  }

  /**
   * Flush buffered data and append the EOF marker block
   */
  async close(): Promise<void> {
    if (this.closed) return;
    if (this.buffered > 0) {
      await this.flushBlock();
    }
    this.closed = true;
    await this.emit(BGZF_EOF_BLOCK);
  }

  private async flushBlock(): Promise<void> {
    const block = this.compressor.compressBlock(this.buffer.subarray(0, this.buffered));
    this.buffered = 0;
    await this.emit(block);
  }

  private async emit(block: Uint8Array): Promise<void> {
    await this.sink(block);
    this.compressedBytes += block.length;
  }
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const result = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}
