/**
 * Options and index types for `.hap` reading, writing and indexing
 */

import { type } from "arktype";
import type {
  FieldDeclaration,
  FieldDeclarationInput,
  HapHeader,
  Haplotype,
  ParserOptions,
  Variant,
  VirtualOffset,
} from "../../types";
import type { SchemaRegistry } from "./schema";
import type { ReferenceCheckMode } from "./validator";

/** Default width of an index window, in coordinate units */
export const DEFAULT_WINDOW_SIZE = 16_384;

/** Suffix appended to a data file path to name its index */
export const INDEX_EXTENSION = ".hti";

// =============================================================================
// PARSER
// =============================================================================

export interface HapParserOptions extends ParserOptions {
  /** Expected schema; the header must declare exactly these fields */
  schema?: SchemaRegistry;
  /** Only yield these haplotypes and the variants that reference them */
  haplotypeIds?: readonly string[];
  /** When dangling variant references are reported, default `deferred` */
  referenceCheck?: ReferenceCheckMode;
  /** Require index order while reading */
  requireSorted?: boolean;
  /** Called once when the header is complete, before the first record */
  onHeader?: (header: HapHeader, registry: SchemaRegistry) => void;
}

export const HapParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "haplotypeIds?": "string[]",
  "referenceCheck?": "'deferred' | 'streaming'",
  "requireSorted?": "boolean",
});

/**
 * Everything read from one file
 */
export interface HapRecordSet {
  readonly header: HapHeader;
  readonly registry: SchemaRegistry;
  readonly haplotypes: Haplotype[];
  readonly variants: Variant[];
}

// =============================================================================
// WRITER
// =============================================================================

export interface HapWriterOptions {
  /** Comment lines written before the declarations, each starting with `#` */
  comments?: readonly string[];
  /**
   * Write all haplotypes, then all variants, and require index order.
   * Otherwise each haplotype is followed by its variants.
   */
  indexable?: boolean;
  /** Compression level for `.gz` output, 0-9 */
  compressionLevel?: number;
  /** Skip cross-record checks; line-level checks always run */
  skipValidation?: boolean;
}

export const HapWriterOptionsSchema = type({
  "comments?": "string[]",
  "indexable?": "boolean",
  "compressionLevel?": "0<=number.integer<=9",
  "skipValidation?": "boolean",
});

export type SchemaInput = SchemaRegistry | readonly (FieldDeclarationInput | FieldDeclaration)[];

export interface WriteSummary {
  readonly haplotypes: number;
  readonly variants: number;
  /** Bytes written to disk */
  readonly bytesWritten: number;
}

// =============================================================================
// INDEX
// =============================================================================

/**
 * Index entries of one contig
 *
 * `windows[w]` is the offset of the first record, in file order, whose end
 * reaches window `w` (coordinates `w * windowSize` onward).
 */
export interface ContigIndex {
  readonly name: string;
  readonly recordCount: number;
  readonly firstOffset: VirtualOffset;
  readonly windows: readonly VirtualOffset[];
}

export interface HapIndex {
  readonly windowSize: number;
  readonly contigs: ReadonlyMap<string, ContigIndex>;
}

export interface HapIndexOptions {
  /** Window width, default {@link DEFAULT_WINDOW_SIZE} */
  windowSize?: number;
  /** Write the index next to the data file */
  persist?: boolean;
  /** Index file path, default `<data path>.hti` */
  indexPath?: string;
  signal?: AbortSignal;
  /** Called with the number of records scanned so far, every {@link PROGRESS_INTERVAL} records */
  onProgress?: (recordsScanned: number) => void;
}

export const PROGRESS_INTERVAL = 10_000;

export const HapIndexOptionsSchema = type({
  "windowSize?": "number.integer>0",
  "persist?": "boolean",
  "indexPath?": "string>0",
});

export interface IndexedReaderOptions extends HapIndexOptions {
  /** Build the index when no index file exists, default true */
  buildIndex?: boolean;
}

export interface FetchHaplotypesOptions {
  /** Only return these haplotypes */
  haplotypeIds?: readonly string[];
}
