/**
 * BGZF virtual offset packing
 *
 * A virtual offset addresses one byte of decompressed data: the compressed
 * offset of its block in the high 48 bits and the position inside the
 * decompressed block in the low 16 bits. Virtual offsets order the same way
 * as the bytes they address.
 */

import { type } from "arktype";
import { CompressionError } from "../../errors";
import type { VirtualOffset } from "../../types";
import { VirtualOffsetSchema } from "../../types";

const MAX_BLOCK_OFFSET = 2 ** 48;
const UNCOMPRESSED_OFFSET_LIMIT = 65536;

/**
 * Pack a block offset and an offset inside the decompressed block
 *
 * @throws {CompressionError} If either part is outside its bit range
 *
 * @example
 * ```typescript
 * const offset = pack(1024, 512);
 * unpack(offset); // { blockOffset: 1024, uncompressedOffset: 512 }
 * ```
 */
export function pack(blockOffset: number, uncompressedOffset: number): VirtualOffset {
  if (!Number.isInteger(blockOffset) || blockOffset < 0 || blockOffset >= MAX_BLOCK_OFFSET) {
    throw new CompressionError(
      `Block offset ${blockOffset} is outside the 48-bit range`,
      "bgzf",
      "validate"
    );
  }
  if (
    !Number.isInteger(uncompressedOffset) ||
    uncompressedOffset < 0 ||
    uncompressedOffset >= UNCOMPRESSED_OFFSET_LIMIT
  ) {
    throw new CompressionError(
      `Uncompressed offset ${uncompressedOffset} is outside the 16-bit range`,
      "bgzf",
      "validate"
    );
  }

  return fromBigInt((BigInt(blockOffset) << 16n) | BigInt(uncompressedOffset));
}

export function unpack(virtualOffset: VirtualOffset): {
  blockOffset: number;
  uncompressedOffset: number;
} {
  return {
    blockOffset: Number(virtualOffset >> 16n),
    uncompressedOffset: Number(virtualOffset & 0xffffn),
  };
}

/**
 * Validate a raw 64-bit value, as read from an index file, as a virtual offset
 *
 * @throws {CompressionError} If the value is negative or wider than 64 bits
 */
export function fromBigInt(value: bigint): VirtualOffset {
  const result = VirtualOffsetSchema(value);
  if (result instanceof type.errors) {
    throw new CompressionError(`Invalid virtual offset: ${result.summary}`, "bgzf", "validate");
  }
  return result;
}

export function compare(a: VirtualOffset, b: VirtualOffset): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function format(virtualOffset: VirtualOffset): string {
  const { blockOffset, uncompressedOffset } = unpack(virtualOffset);
  return `${blockOffset}:${uncompressedOffset}`;
}

export const VirtualOffsetUtils = {
  pack,
  unpack,
  fromBigInt,
  compare,
  format,
} as const;
