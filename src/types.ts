/**
 * Core type definitions for haplotype records and their schema
 *
 * A `.hap` file holds haplotype (`H`) lines and variant (`V`) lines. Each line
 * type has fixed mandatory columns plus the extra fields declared for it in
 * the file header.
 */

import { type } from "arktype";

// =============================================================================
// LINE TYPES AND EXTRA FIELDS
// =============================================================================

/**
 * Data line type symbols
 */
export type LineType = "H" | "V";

/**
 * Parsed format tag of an extra field
 *
 * `d` reads integers, `s` reads strings, `.Nf` reads floats written with N
 * decimals and a bare `f` means six decimals.
 */
export type FormatTag =
  | { readonly kind: "integer"; readonly tag: string }
  | { readonly kind: "float"; readonly tag: string; readonly precision: number }
  | { readonly kind: "string"; readonly tag: string };

export type FieldKind = FormatTag["kind"];

/**
 * Value of an extra field after coercion
 */
export type ExtraValue = number | string;

/**
 * Extra fields of one record, keyed by declared name
 */
export type ExtraFields = Readonly<Record<string, ExtraValue>>;

/**
 * Declaration of one extra field, from a `#H`/`#V` header line or built by a caller
 */
export interface FieldDeclaration {
  readonly lineType: LineType;
  readonly name: string;
  readonly format: FormatTag;
  readonly description: string;
}

/**
 * Caller-side shape of a declaration, with the format tag still as text
 */
export interface FieldDeclarationInput {
  readonly lineType: LineType;
  readonly name: string;
  readonly formatTag: string;
  readonly description?: string;
}

// =============================================================================
// RECORDS
// =============================================================================

/**
 * Haplotype record: a named genomic interval
 */
export interface Haplotype {
  readonly type: "H";
  /** Chromosome or contig name */
  readonly chromosome: string;
  readonly start: number;
  readonly end: number;
  /** Unique within a file */
  readonly id: string;
  readonly extras: ExtraFields;
  /** Source line number for diagnostics */
  readonly lineNumber?: number;
}

/**
 * Variant record belonging to exactly one haplotype
 */
export interface Variant {
  readonly type: "V";
  /** Weak reference to {@link Haplotype.id} */
  readonly haplotypeId: string;
  readonly start: number;
  readonly end: number;
  readonly id: string;
  readonly allele: string;
  readonly extras: ExtraFields;
  readonly lineNumber?: number;
}

export type HapRecord = Haplotype | Variant;

/**
 * Haplotype together with the variants that reference it
 */
export interface HaplotypeWithVariants extends Haplotype {
  readonly variants: readonly Variant[];
}

/**
 * Header of a `.hap` file
 *
 * `comments` are the plain comment lines, verbatim with their leading `#`;
 * declarations are kept separately because writers regenerate them.
 */
export interface HapHeader {
  readonly comments: readonly string[];
  readonly declarations: readonly FieldDeclaration[];
}

/**
 * Closed genomic interval on one contig
 *
 * For haplotypes the contig is the chromosome; for variants it is the
 * haplotype ID.
 */
export interface HapRegion {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
}

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Base parser configuration shared by every reader
 */
export interface ParserOptions {
  /** Skip cross-record validation (line-level checks always run) */
  skipValidation?: boolean;
  /** Maximum line length to accept */
  maxLineLength?: number;
  /**
   * Attach source line numbers to records (default true)
   *
   * `lineNumber` is the only field a parsed record has that the written
   * record did not, so `parse(write(records))` equals `records` once it is
   * left out, or with this option set to false.
   */
  trackLineNumbers?: boolean;
  /** Abort signal for long-running parses */
  signal?: AbortSignal;
  /** Warning callback, defaults to console.warn */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Supported compression formats
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Branded file path type for validated paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => (path.includes("\0") ? ctx.reject("a path without null bytes") : true))
  .pipe((path) => path as FilePath);

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Chunk size in bytes for streamed reads */
  bufferSize?: number;
  /** Text encoding */
  encoding?: "utf8" | "ascii";
  /** Maximum file size to read */
  maxFileSize?: number;
  /** Decompress `.gz` files while reading */
  autoDecompress?: boolean;
  /** Explicit compression format, detected from extension when "none" */
  compressionFormat?: CompressionFormat;
}

export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "encoding?": "'utf8' | 'ascii'",
  "maxFileSize?": "number>0",
  "autoDecompress?": "boolean",
  "compressionFormat?": "'gzip' | 'none'",
});

/**
 * File writing options
 */
export interface WriteOptions {
  /** Compress based on the file extension */
  autoCompress?: boolean;
  /** Explicit compression format */
  compressionFormat?: CompressionFormat;
  /** Compression level, 0-9 */
  compressionLevel?: number;
}

export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly extension: string;
}

export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

// =============================================================================
// BGZF AND INDEX TYPES
// =============================================================================

/**
 * BGZF virtual file offset: compressed block offset in the high 48 bits,
 * offset inside the uncompressed block in the low 16 bits
 */
export type VirtualOffset = bigint & {
  readonly __brand: "VirtualOffset";
};

export const VirtualOffsetSchema = type("bigint")
  .narrow((offset, ctx) =>
    offset >= 0n && offset < 1n << 64n ? true : ctx.reject("an unsigned 64-bit offset")
  )
  .pipe((offset) => offset as VirtualOffset);

/**
 * BGZF block information
 */
export interface BGZFBlock {
  /** Offset of the block in the compressed file */
  readonly offset: number;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
  readonly crc32: number;
}
