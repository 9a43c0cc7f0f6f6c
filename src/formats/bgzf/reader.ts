/**
 * BGZF block reader
 *
 * Locates and inflates single BGZF blocks so readers can start at any block
 * boundary named by a virtual offset.
 */

import { inflateRawSync } from "node:zlib";
import { CompressionError } from "../../errors";
import type { BGZFBlock } from "../../types";
import {
  BGZF_FOOTER_SIZE,
  BGZF_HEADER_SIZE,
  BGZF_MAX_BLOCK_SIZE,
  concatBytes,
} from "./compressor";
import { crc32 } from "./crc32";

const MIN_BLOCK_SIZE = BGZF_HEADER_SIZE + BGZF_FOOTER_SIZE;

export class BGZFReader {
  /**
   * Read and validate the header of the block starting at `offset`
   *
   * `offset` is relative to `buffer`; the returned block offset is the same
   * value. The buffer must hold the complete block.
   *
   * @throws {CompressionError} If the bytes are not a complete BGZF block
   */
  static readBlockHeader(buffer: Uint8Array, offset: number): BGZFBlock {
    if (buffer.length < offset + BGZF_HEADER_SIZE) {
      throw new CompressionError(
        `Truncated BGZF header: need ${BGZF_HEADER_SIZE} bytes at offset ${offset}, have ${Math.max(0, buffer.length - offset)}`,
        "bgzf",
        "validate",
        offset
      );
    }

    const view = new DataView(buffer.buffer, buffer.byteOffset + offset);

    if (view.getUint8(0) !== 0x1f || view.getUint8(1) !== 0x8b) {
      throw new CompressionError(
        `Invalid gzip magic bytes at offset ${offset}: not a BGZF block`,
        "bgzf",
        "validate",
        offset
      );
    }
    if (view.getUint8(2) !== 0x08 || (view.getUint8(3) & 0x04) === 0) {
      throw new CompressionError(
        `Block at offset ${offset} is gzip but lacks the BGZF extra field; compress with bgzip`,
        "bgzf",
        "validate",
        offset
      );
    }
    if (
      view.getUint16(10, true) !== 6 ||
      view.getUint8(12) !== 0x42 ||
      view.getUint8(13) !== 0x43 ||
      view.getUint16(14, true) !== 2
    ) {
      throw new CompressionError(
        `Block at offset ${offset} has no BC subfield; compress with bgzip`,
        "bgzf",
        "validate",
        offset
      );
    }

    const compressedSize = view.getUint16(16, true) + 1;
    if (compressedSize < MIN_BLOCK_SIZE || compressedSize > BGZF_MAX_BLOCK_SIZE) {
      throw new CompressionError(
        `Invalid BGZF block size ${compressedSize} at offset ${offset}`,
        "bgzf",
        "validate",
        offset
      );
    }
    if (buffer.length < offset + compressedSize) {
      throw new CompressionError(
        `Truncated BGZF block at offset ${offset}: need ${compressedSize} bytes, have ${buffer.length - offset}`,
        "bgzf",
        "validate",
        offset
      );
    }

    return {
      offset,
      compressedSize,
      crc32: view.getUint32(compressedSize - 8, true),
      uncompressedSize: view.getUint32(compressedSize - 4, true),
    };
  }

  /**
   * Inflate one complete BGZF block and verify its size and CRC32
   *
   * @throws {CompressionError} If the block is corrupt
   */
  static decompressBlock(blockData: Uint8Array): Uint8Array {
    const block = BGZFReader.readBlockHeader(blockData, 0);
    const deflated = blockData.subarray(BGZF_HEADER_SIZE, block.compressedSize - BGZF_FOOTER_SIZE);

    let data: Uint8Array;
    try {
      data = new Uint8Array(inflateRawSync(deflated));
    } catch (error) {
      throw CompressionError.fromSystemError("bgzf", "decompress", error, blockData.length);
    }

    if (data.length !== block.uncompressedSize) {
      throw new CompressionError(
        `Size mismatch: expected ${block.uncompressedSize}, got ${data.length}`,
        "bgzf",
        "validate"
      );
    }
    const checksum = crc32(data);
    if (checksum !== block.crc32) {
      throw new CompressionError(
        `CRC32 mismatch: expected 0x${block.crc32.toString(16)}, got 0x${checksum.toString(16)}`,
        "bgzf",
        "validate"
      );
    }

    return data;
  }

  /**
   * Inflate every block of an in-memory BGZF file
   */
  static decompressAll(data: Uint8Array): Uint8Array {
    const parts: Uint8Array[] = [];
    let offset = 0;
    while (offset < data.length) {
      const block = BGZFReader.readBlockHeader(data, offset);
      parts.push(BGZFReader.decompressBlock(data.subarray(offset, offset + block.compressedSize)));
      offset += block.compressedSize;
    }
    return concatBytes(parts);
  }
}
