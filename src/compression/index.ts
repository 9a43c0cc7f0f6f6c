/**
 * Compression support for haplotype files
 *
 * @module compression
 */

export { type CompressionDetection, CompressionDetector } from "./detector";
export { compress, decompress, GzipDecompressor, type GzipOptions, wrapStream } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";
