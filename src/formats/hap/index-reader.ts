/**
 * Region queries over BGZF-compressed `.hap` files
 *
 * @example
 * ```typescript
 * const reader = await IndexedHapReader.open("cohort.hap.gz");
 * for await (const record of reader.query("chr1:10,000-20,000")) {
 *   console.log(record.id);
 * }
 * for await (const haplotype of reader.fetchHaplotypes("chr1:10000-20000")) {
 *   console.log(haplotype.id, haplotype.variants.length);
 * }
 * ```
 */

import { type } from "arktype";
import {
  CompressionError,
  FileError,
  HapkitError,
  IndexFormatError,
  MalformedLineError,
  UnsortedFileError,
  ValidationError,
} from "../../errors";
import { exists, readByteRange, getSize } from "../../io/file-reader";
import { RandomAccessFile } from "../../io/random-access";
import type {
  HapHeader,
  HapRecord,
  HapRegion,
  Haplotype,
  HaplotypeWithVariants,
  Variant,
  VirtualOffset,
} from "../../types";
import { BGZFLineCursor, VirtualOffsetUtils } from "../bgzf";
import { HapCodec } from "./codec";
import { HeaderBuilder } from "./header";
import { assertBlockCompressed, buildHapIndex, INDEX_MAGIC } from "./index-writer";
import { parseRegion, validateRegion } from "./region";
import type { SchemaRegistry } from "./schema";
import {
  type ContigIndex,
  type FetchHaplotypesOptions,
  type HapIndex,
  HapIndexOptionsSchema,
  INDEX_EXTENSION,
  type IndexedReaderOptions,
} from "./types";
import { recordContig } from "./validator";

/**
 * Decode an index from its `.hti` bytes
 *
 * @param filePath - Reported in errors
 * @throws {IndexFormatError} If the bytes are not a well-formed index
 */
export function deserializeHapIndex(bytes: Uint8Array, filePath: string): HapIndex {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const decoder = new TextDecoder("utf-8", { fatal: true });
  let offset = 0;

  const need = (count: number, what: string): void => {
    if (offset + count > bytes.length) {
      throw new IndexFormatError(`Index is truncated while reading ${what}`, filePath, offset);
    }
  };
  const readInt32 = (what: string): number => {
    need(4, what);
    const value = view.getInt32(offset, true);
    offset += 4;
    if (value < 0) {
      throw new IndexFormatError(`Negative ${what}: ${value}`, filePath, offset - 4);
    }
    return value;
  };
  const readUint64 = (what: string): bigint => {
    need(8, what);
    const value = view.getBigUint64(offset, true);
    offset += 8;
    return value;
  };

  need(INDEX_MAGIC.length, "magic bytes");
  if (!INDEX_MAGIC.every((byte, i) => bytes[i] === byte)) {
    throw new IndexFormatError("Not a haplotype index: bad magic bytes", filePath, 0);
  }
  offset = INDEX_MAGIC.length;

  const windowSize = readInt32("window size");
  if (windowSize === 0) {
    throw new IndexFormatError("Window size must be positive", filePath, offset - 4);
  }
  const contigCount = readInt32("contig count");
  const contigs = new Map<string, ContigIndex>();

  for (let c = 0; c < contigCount; c++) {
    const nameLength = readInt32("contig name length");
    need(nameLength, "contig name");
    let name: string;
    try {
      name = decoder.decode(bytes.subarray(offset, offset + nameLength));
    } catch {
      throw new IndexFormatError("Contig name is not valid UTF-8", filePath, offset);
    }
    offset += nameLength;
    if (contigs.has(name)) {
      throw new IndexFormatError(`Contig '${name}' appears twice`, filePath, offset);
    }

    const recordCount = Number(readUint64("record count"));
    if (!Number.isSafeInteger(recordCount)) {
      throw new IndexFormatError(`Record count of '${name}' is too large`, filePath, offset - 8);
    }
    const firstOffset = VirtualOffsetUtils.fromBigInt(readUint64("first record offset"));
    const windowCount = readInt32("window count");
    need(windowCount * 8, "window offsets");
    const windows: VirtualOffset[] = [];
    for (let w = 0; w < windowCount; w++) {
      windows.push(VirtualOffsetUtils.fromBigInt(readUint64("window offset")));
    }

    contigs.set(name, { name, recordCount, firstOffset, windows: Object.freeze(windows) });
  }

  if (offset !== bytes.length) {
    throw new IndexFormatError(
      `${bytes.length - offset} unexpected trailing byte(s)`,
      filePath,
      offset
    );
  }
  return { windowSize, contigs };
}

/**
 * Read an index file
 *
 * @throws {FileError} If the file cannot be read
 * @throws {IndexFormatError} If the file is not a well-formed index
 */
export async function readHapIndex(indexPath: string): Promise<HapIndex> {
  const size = await getSize(indexPath);
  const bytes = size === 0 ? new Uint8Array(0) : await readByteRange(indexPath, 0, size);
  return deserializeHapIndex(bytes, indexPath);
}

/**
 * Random-access reader for an indexed `.hap.gz` file
 *
 * Opening loads (or builds) the index and reads the header. Each query opens
 * its own file handle and closes it when iteration ends, so queries may run
 * concurrently and the reader itself holds no open handles.
 */
export class IndexedHapReader {
  private readonly codec: HapCodec;

  private constructor(
    readonly path: string,
    readonly index: HapIndex,
    readonly header: HapHeader,
    readonly registry: SchemaRegistry
  ) {
    this.codec = new HapCodec(registry);
  }

  /**
   * Open a BGZF `.hap` file for region queries
   *
   * Uses `<path>.hti` (or `indexPath`) when present; otherwise builds the
   * index in memory, writing it out only when `persist` is set.
   *
   * @throws {CompressionError} If the file is not BGZF-compressed
   * @throws {FileError} If no index exists and `buildIndex` is false
   */
  static async open(filePath: string, options: IndexedReaderOptions = {}): Promise<IndexedHapReader> {
    const validationResult = HapIndexOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid index options: ${validationResult.summary}`);
    }

    const indexPath = options.indexPath ?? `${filePath}${INDEX_EXTENSION}`;
    let index: HapIndex;
    if (await exists(indexPath)) {
      index = await readHapIndex(indexPath);
    } else if (options.buildIndex ?? true) {
      index = await buildHapIndex(filePath, { ...options, indexPath });
    } else {
      throw new FileError(`No index found at '${indexPath}'`, indexPath, "open");
    }

    const { header, registry } = await readHeader(filePath);
    return new IndexedHapReader(filePath, index, header, registry);
  }

  /**
   * Contig names in file order: chromosomes, then haplotype IDs
   */
  get contigs(): string[] {
    return [...this.index.contigs.keys()];
  }

  /**
   * Records of one contig overlapping a closed interval
   *
   * A region names either a chromosome (yielding haplotypes) or a haplotype
   * ID (yielding its variants). Unknown contigs yield nothing.
   *
   * @throws {RegionError} If the region is invalid
   * @throws {UnsortedFileError} If the file turns out not to be sorted
   */
  async *query(region: string | HapRegion): AsyncIterable<HapRecord> {
    const { contig, start, end } = typeof region === "string" ? parseRegion(region) : validateRegion(region);
    const entry = this.index.contigs.get(contig);
    if (entry === undefined) return;

    const firstWindow = Math.floor(start / this.index.windowSize);
    const seek = entry.windows[firstWindow];
    if (seek === undefined) return;

    const file = await RandomAccessFile.open(this.path);
    try {
      let previousStart = -1;
      for await (const { text, offset } of new BGZFLineCursor(file).lines(seek)) {
        if (text.trim() === "") continue;
        if (text.startsWith("#")) {
          throw new MalformedLineError(
            `Header line found among records at ${VirtualOffsetUtils.format(offset)}`,
            undefined,
            undefined,
            text
          );
        }

        const record = this.codec.parseLine(text);
        if (recordContig(record) !== contig) break;
        if (record.start < previousStart) {
          throw new UnsortedFileError(
            `Records of '${contig}' are not sorted by start at ${VirtualOffsetUtils.format(offset)}; rebuild the index from a sorted file`,
            undefined,
            text
          );
        }
        previousStart = record.start;

        if (record.start > end) break;
        if (record.end >= start) yield record;
      }
    } finally {
      await file.close();
    }
  }

  /**
   * Haplotypes overlapping a chromosome region, each with all of its variants
   */
  async *fetchHaplotypes(
    region: string | HapRegion,
    options: FetchHaplotypesOptions = {}
  ): AsyncIterable<HaplotypeWithVariants> {
    const wanted = options.haplotypeIds !== undefined ? new Set(options.haplotypeIds) : undefined;

    const haplotypes: Haplotype[] = [];
    for await (const record of this.query(region)) {
      if (record.type === "H" && (wanted === undefined || wanted.has(record.id))) {
        haplotypes.push(record);
      }
    }

    for (const haplotype of haplotypes) {
      const variants: Variant[] = [];
      const wholeContig: HapRegion = { contig: haplotype.id, start: 0, end: Number.MAX_SAFE_INTEGER };
      for await (const record of this.query(wholeContig)) {
        if (record.type === "V") variants.push(record);
      }
      yield { ...haplotype, variants };
    }
  }
}

/**
 * Read the header block at the start of a BGZF `.hap` file
 */
async function readHeader(filePath: string): Promise<{ header: HapHeader; registry: SchemaRegistry }> {
  const file = await RandomAccessFile.open(filePath);
  try {
    await assertBlockCompressed(file);
    const builder = new HeaderBuilder();
    let lineNumber = 0;
    for await (const { text } of new BGZFLineCursor(file).lines()) {
      lineNumber++;
      if (text.trim() === "") continue;
      if (!text.startsWith("#")) break;
      builder.addLine(text, lineNumber);
    }
    return builder.finish();
  } catch (error) {
    if (error instanceof HapkitError) throw error;
    throw new CompressionError(
      `Failed to read header of '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
      "bgzf",
      "decompress"
    );
  } finally {
    await file.close();
  }
}
