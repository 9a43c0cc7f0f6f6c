/**
 * Region index construction for BGZF-compressed `.hap` files
 *
 * The index splits each contig into fixed-width windows. For window `w` it
 * stores the virtual offset of the first record, in file order, whose end
 * reaches `w * windowSize`. Records are sorted by start within a contig, so
 * every record overlapping a query that begins in window `w` lies at or
 * after that offset, and the scan can stop at the first record that starts
 * past the query.
 *
 * Index file layout (little-endian):
 *
 * ```text
 * magic        "HTI\1"
 * int32        window size
 * int32        contig count
 * per contig:
 *   int32      name length, then UTF-8 name
 *   uint64     record count
 *   uint64     virtual offset of the first record
 *   int32      window count, then one uint64 virtual offset per window
 * ```
 */

import { type } from "arktype";
import { CompressionDetector } from "../../compression";
import { CompressionError, MalformedLineError, ParseError, ValidationError } from "../../errors";
import { writeBytes } from "../../io/file-writer";
import { RandomAccessFile } from "../../io/random-access";
import type { VirtualOffset } from "../../types";
import { BGZFLineCursor } from "../bgzf";
import { HapCodec } from "./codec";
import { HeaderBuilder } from "./header";
import {
  type ContigIndex,
  DEFAULT_WINDOW_SIZE,
  type HapIndex,
  type HapIndexOptions,
  HapIndexOptionsSchema,
  INDEX_EXTENSION,
  PROGRESS_INTERVAL,
} from "./types";
import { HapValidator, recordContig } from "./validator";

export const INDEX_MAGIC: Uint8Array = new Uint8Array([0x48, 0x54, 0x49, 0x01]);

const ABORT_CHECK_INTERVAL = 1000;

interface ContigAccumulator {
  readonly name: string;
  readonly firstOffset: VirtualOffset;
  readonly windows: VirtualOffset[];
  recordCount: number;
}

/**
 * Scan a BGZF `.hap` file and build its region index
 *
 * The scan also validates the file: records must be in index order, haplotype
 * IDs unique and distinct from chromosome names, and every variant must
 * follow its haplotype.
 *
 * @throws {CompressionError} If the file is not BGZF-compressed
 * @throws {UnsortedFileError} If records are out of index order
 * @throws {HaplotypeIdCollisionError} If a haplotype ID is also a chromosome name
 *
 * @example
 * ```typescript
 * const index = await buildHapIndex("cohort.hap.gz", { persist: true });
 * console.log([...index.contigs.keys()]);
 * ```
 */
export async function buildHapIndex(
  filePath: string,
  options: HapIndexOptions = {}
): Promise<HapIndex> {
  const validationResult = HapIndexOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid index options: ${validationResult.summary}`);
  }
  const windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;

  const file = await RandomAccessFile.open(filePath);
  let index: HapIndex;
  try {
    await assertBlockCompressed(file);
    index = await scanRecords(file, windowSize, options);
  } finally {
    await file.close();
  }

  if (options.persist === true) {
    await writeHapIndex(options.indexPath ?? `${filePath}${INDEX_EXTENSION}`, index);
  }
  return index;
}

/**
 * @throws {CompressionError} If the file does not start with a BGZF block
 */
export async function assertBlockCompressed(file: RandomAccessFile): Promise<void> {
  const head = await file.read(0, 18);
  const detection = CompressionDetector.fromMagicBytes(head);
  if (!detection.blockCompressed) {
    throw new CompressionError(
      detection.format === "gzip"
        ? `'${file.path}' is plain gzip; region queries need BGZF, recompress it with bgzip`
        : `'${file.path}' is not BGZF-compressed; region queries need BGZF input`,
      "bgzf",
      "validate"
    );
  }
}

async function scanRecords(
  file: RandomAccessFile,
  windowSize: number,
  { signal, onProgress }: HapIndexOptions
): Promise<HapIndex> {
  const headerBuilder = new HeaderBuilder();
  const validator = new HapValidator({ referenceCheck: "streaming", requireSorted: true });
  const contigs = new Map<string, ContigAccumulator>();
  let current: ContigAccumulator | undefined;
  let codec: HapCodec | undefined;
  let lineNumber = 0;
  let scanned = 0;

  for await (const { text, offset } of new BGZFLineCursor(file).lines()) {
    lineNumber++;
    if (lineNumber % ABORT_CHECK_INTERVAL === 0 && signal?.aborted === true) {
      throw new ParseError(`Operation aborted during index build at line ${lineNumber}`, "ABORTED");
    }
    if (text.trim() === "") continue;

    if (text.startsWith("#")) {
      if (codec !== undefined) {
        throw new MalformedLineError(
          "Header lines must come before the first data line",
          undefined,
          lineNumber,
          text
        );
      }
      headerBuilder.addLine(text, lineNumber);
      continue;
    }

    codec ??= new HapCodec(headerBuilder.finish().registry);
    const record = codec.parseLine(text, lineNumber);
    validator.observe(record, lineNumber, text);

    const contig = recordContig(record);
    if (current?.name !== contig) {
      console.assert(!contigs.has(contig), "sorted input never revisits a contig");
      current = { name: contig, firstOffset: offset, windows: [], recordCount: 0 };
      contigs.set(contig, current);
    }
    current.recordCount++;
    scanned++;
    if (scanned % PROGRESS_INTERVAL === 0) {
      onProgress?.(scanned);
    }

    const lastWindow = Math.floor(record.end / windowSize);
    while (current.windows.length <= lastWindow) {
      current.windows.push(offset);
    }
  }

  validator.finish();

  const frozen = new Map<string, ContigIndex>();
  for (const [name, contig] of contigs) {
    frozen.set(name, {
      name,
      recordCount: contig.recordCount,
      firstOffset: contig.firstOffset,
      windows: Object.freeze([...contig.windows]),
    });
  }
  return { windowSize, contigs: frozen };
}

/**
 * Encode an index in the `.hti` layout
 */
export function serializeHapIndex(index: HapIndex): Uint8Array {
  const encoder = new TextEncoder();
  const names = new Map([...index.contigs.keys()].map((name) => [name, encoder.encode(name)]));

  let size = INDEX_MAGIC.length + 8;
  for (const contig of index.contigs.values()) {
    size += 4 + (names.get(contig.name)?.length ?? 0) + 8 + 8 + 4 + 8 * contig.windows.length;
  }

  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);
  bytes.set(INDEX_MAGIC, 0);
  let offset = INDEX_MAGIC.length;

  view.setInt32(offset, index.windowSize, true);
  view.setInt32(offset + 4, index.contigs.size, true);
  offset += 8;

  for (const contig of index.contigs.values()) {
    const name = names.get(contig.name) ?? new Uint8Array(0);
    view.setInt32(offset, name.length, true);
    bytes.set(name, offset + 4);
    offset += 4 + name.length;

    view.setBigUint64(offset, BigInt(contig.recordCount), true);
    view.setBigUint64(offset + 8, contig.firstOffset, true);
    view.setInt32(offset + 16, contig.windows.length, true);
    offset += 20;

    for (const window of contig.windows) {
      view.setBigUint64(offset, window, true);
      offset += 8;
    }
  }

  console.assert(offset === size, "index size must match the computed layout");
  return bytes;
}

/**
 * Write an index file, uncompressed whatever its extension
 */
export async function writeHapIndex(indexPath: string, index: HapIndex): Promise<void> {
  await writeBytes(indexPath, serializeHapIndex(index), { autoCompress: false });
}
