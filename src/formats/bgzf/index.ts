/**
 * BGZF block compression and virtual offsets
 *
 * @module bgzf
 */

export {
  BGZF_BLOCK_DATA_SIZE,
  BGZF_EOF_BLOCK,
  BGZFBlockWriter,
  BGZFCompressor,
  type BGZFCompressorOptions,
  concatBytes,
} from "./compressor";
export { crc32 } from "./crc32";
export { BGZFLineCursor, type LocatedLine } from "./line-cursor";
export { BGZFReader } from "./reader";
export { VirtualOffsetUtils } from "./virtual-offset";
