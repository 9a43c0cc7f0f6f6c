/**
 * hapkit - read, write, validate and index `.hap` haplotype files
 *
 * A `.hap` file describes haplotypes (named genomic intervals) and the
 * variant alleles that make them up, with typed extra fields declared in
 * the header. BGZF-compressed files can be indexed and queried by region.
 */

// Compression infrastructure
export {
  type CompressionDetection,
  CompressionDetector,
  CompressionService,
  GzipDecompressor,
} from "./compression";
// Error types
export {
  BufferError,
  CompressionError,
  type DanglingReference,
  DanglingVariantError,
  DuplicateFieldError,
  DuplicateHaplotypeError,
  FileError,
  HapkitError,
  HaplotypeIdCollisionError,
  IndexFormatError,
  MalformedLineError,
  ParseError,
  RegionError,
  SchemaFrozenError,
  StreamError,
  TypeCoercionError,
  UndeclaredFieldError,
  UnsortedFileError,
  ValidationError,
} from "./errors";
// BGZF block compression
export {
  BGZFBlockWriter,
  BGZFCompressor,
  BGZFLineCursor,
  BGZFReader,
  VirtualOffsetUtils,
} from "./formats/bgzf";
// HAP format
export * from "./formats/hap";
// File I/O
export { FileReader } from "./io/file-reader";
export { deleteFile, openForWriting, writeBytes, writeString } from "./io/file-writer";
export { RandomAccessFile } from "./io/random-access";
export { StreamUtils } from "./io/stream-utils";
// Core types
export type {
  ExtraFields,
  ExtraValue,
  FieldDeclaration,
  FieldDeclarationInput,
  FieldKind,
  FormatTag,
  HapHeader,
  HapRecord,
  HapRegion,
  Haplotype,
  HaplotypeWithVariants,
  LineType,
  ParserOptions,
  Variant,
  VirtualOffset,
} from "./types";
