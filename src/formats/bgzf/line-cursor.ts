/**
 * Forward-only, offset-seekable line iteration over a BGZF file
 */

import type { RandomAccessFile } from "../../io/random-access";
import type { VirtualOffset } from "../../types";
import { BGZF_MAX_BLOCK_SIZE, concatBytes } from "./compressor";
import { BGZFReader } from "./reader";
import { pack, unpack } from "./virtual-offset";

/**
 * A decoded line and the virtual offset of its first byte
 */
export interface LocatedLine {
  readonly text: string;
  readonly offset: VirtualOffset;
}

interface LoadedBlock {
  readonly offset: number;
  readonly data: Uint8Array;
  readonly next: number;
}

const NEWLINE = 0x0a;

/**
 * Iterates lines of a BGZF file starting at any virtual offset
 *
 * The offset reported for a line that begins exactly at the end of a block
 * is normalized to the start of the next non-empty block, so offsets are
 * always reachable by seeking.
 *
 * @example
 * ```typescript
 * const file = await RandomAccessFile.open("cohort.hap.gz");
 * try {
 *   for await (const { text, offset } of new BGZFLineCursor(file).lines()) {
 *     console.log(VirtualOffsetUtils.format(offset), text);
 *   }
 * } finally {
 *   await file.close();
 * }
 * ```
 */
export class BGZFLineCursor {
  private readonly decoder = new TextDecoder("utf-8");

  constructor(private readonly file: RandomAccessFile) {}

  async *lines(start: VirtualOffset = pack(0, 0)): AsyncIterable<LocatedLine> {
    const { blockOffset, uncompressedOffset } = unpack(start);
    let block = await this.loadBlock(blockOffset);
    let position = uncompressedOffset;
    let lineStart: VirtualOffset | undefined;
    let pieces: Uint8Array[] = [];

    while (block !== undefined) {
      if (position >= block.data.length) {
        block = await this.loadBlock(block.next);
        position = 0;
        continue;
      }

      lineStart ??= pack(block.offset, position);
      const newline = block.data.indexOf(NEWLINE, position);
      if (newline === -1) {
        pieces.push(block.data.subarray(position));
        position = block.data.length;
        continue;
      }

      pieces.push(block.data.subarray(position, newline));
      yield { text: this.decode(pieces), offset: lineStart };
      pieces = [];
      lineStart = undefined;
      position = newline + 1;
    }

    if (lineStart !== undefined) {
      yield { text: this.decode(pieces), offset: lineStart };
    }
  }

  private decode(pieces: readonly Uint8Array[]): string {
    const bytes = pieces.length === 1 ? (pieces[0] ?? new Uint8Array(0)) : concatBytes(pieces);
    const text = this.decoder.decode(bytes);
    return text.endsWith("\r") ? text.slice(0, -1) : text;
  }

  private async loadBlock(offset: number): Promise<LoadedBlock | undefined> {
    if (offset >= this.file.size) {
      return undefined;
    }

    const bytes = await this.file.read(offset, BGZF_MAX_BLOCK_SIZE);
    const header = BGZFReader.readBlockHeader(bytes, 0);
    const data = BGZFReader.decompressBlock(bytes.subarray(0, header.compressedSize));

    return { offset, data, next: offset + header.compressedSize };
  }
}
