/**
 * `.hap` writer
 *
 * Writes the header (comments, then one declaration per extra field) and one
 * line per record. Paths ending in `.gz` are written as BGZF so the output
 * can be indexed and queried by region.
 *
 * Two layouts:
 * - default: each haplotype followed by its variants
 * - `indexable`: all haplotypes, then all variants, in index order; input
 *   that is not already sorted is rejected rather than reordered
 */

import { type } from "arktype";
import { CompressionDetector } from "../../compression";
import { ValidationError } from "../../errors";
import { validatePath } from "../../io/file-reader";
import { deleteFile, openForWriting } from "../../io/file-writer";
import type { HapRecord, Haplotype, Variant } from "../../types";
import { BGZFBlockWriter, BGZFCompressor } from "../bgzf";
import { HapCodec } from "./codec";
import { formatHeaderLines } from "./header";
import { SchemaRegistry } from "./schema";
import {
  type HapWriterOptions,
  HapWriterOptionsSchema,
  type SchemaInput,
  type WriteSummary,
} from "./types";
import { groupVariants } from "./utils";
import { HapValidator, type ValidationSummary, validateRecords } from "./validator";

/**
 * Haplotypes and variants given as separate collections
 */
export interface HapRecordCollections {
  readonly haplotypes: readonly Haplotype[];
  readonly variants: readonly Variant[];
}

export type HapWriteInput = Iterable<HapRecord> | AsyncIterable<HapRecord> | HapRecordCollections;

type PreparedRecords =
  | { readonly kind: "buffered"; readonly records: readonly HapRecord[] }
  | { readonly kind: "streamed"; readonly records: AsyncIterable<HapRecord> };

/** Text accumulated before each write to disk */
const FLUSH_THRESHOLD = 64 * 1024;

/**
 * @example
 * ```typescript
 * const writer = new HapWriter(
 *   [{ lineType: "H", name: "beta", formatTag: ".2f", description: "Effect size" }],
 *   { comments: ["# simulated cohort"] }
 * );
 * await writer.writeFile("cohort.hap.gz", { haplotypes, variants });
 * ```
 */
export class HapWriter {
  readonly registry: SchemaRegistry;
  private readonly codec: HapCodec;
  private readonly options: Required<HapWriterOptions>;

  constructor(schema: SchemaInput = [], options: HapWriterOptions = {}) {
    const validationResult = HapWriterOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid HAP writer options: ${validationResult.summary}`);
    }

    this.registry =
      schema instanceof SchemaRegistry ? schema.freeze() : SchemaRegistry.fromDeclarations(schema);
    this.codec = new HapCodec(this.registry);
    this.options = {
      comments: options.comments ?? [],
      indexable: options.indexable ?? false,
      compressionLevel: options.compressionLevel ?? 6,
      skipValidation: options.skipValidation ?? false,
    };
  }

  /**
   * Render one record as a data line, without the line terminator
   */
  formatRecord(record: HapRecord): string {
    return this.codec.formatRecord(record);
  }

  /**
   * Header lines: comments, then declarations
   */
  formatHeader(): string[] {
    return formatHeaderLines(this.options.comments, this.registry);
  }

  /**
   * Render complete file content, each line ending in `\n`
   *
   * @throws {HapkitError} If the records fail line-level or cross-record validation
   */
  format(input: Iterable<HapRecord> | HapRecordCollections): string {
    const prepared = this.prepareBuffered(input);
    const lines = [...this.formatHeader(), ...prepared.map((record) => this.formatRecord(record))];
    return lines.map((line) => `${line}\n`).join("");
  }

  /**
   * Write records to a file, BGZF-compressed when the path ends in `.gz`
   *
   * Collections and synchronous iterables are validated before the file is
   * opened. Async iterables are validated as they are written; on any error
   * the partial file is removed.
   */
  async writeFile(filePath: string, input: HapWriteInput): Promise<WriteSummary> {
    const path = validatePath(filePath);
    const prepared = this.prepare(input);
    const compressed = CompressionDetector.fromExtension(path) === "gzip";
    const encoder = new TextEncoder();

    try {
      return await openForWriting(
        path,
        async (handle) => {
          const bgzf = compressed
            ? new BGZFBlockWriter(
                (block) => handle.writeBytes(block),
                new BGZFCompressor({ compressionLevel: this.options.compressionLevel })
              )
            : undefined;
          let plainBytes = 0;

          const sink = async (text: string): Promise<void> => {
            const bytes = encoder.encode(text);
            if (bgzf !== undefined) {
              await bgzf.write(bytes);
            } else {
              plainBytes += bytes.length;
              await handle.writeBytes(bytes);
            }
          };

          const summary = await this.emit(prepared, sink);
          await bgzf?.close();
          return { ...summary, bytesWritten: bgzf?.bytesWritten ?? plainBytes };
        },
        { autoCompress: false }
      );
    } catch (error) {
      await deleteFile(path);
      throw error;
    }
  }

  /**
   * Write uncompressed records to a stream
   */
  async writeToStream(input: HapWriteInput, stream: WritableStream<Uint8Array>): Promise<ValidationSummary> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();

    try {
      return await this.emit(this.prepare(input), (text) => writer.write(encoder.encode(text)));
    } finally {
      writer.releaseLock();
    }
  }

  private async emit(
    prepared: PreparedRecords,
    sink: (text: string) => Promise<void>
  ): Promise<ValidationSummary> {
    const validator =
      prepared.kind === "streamed" && !this.options.skipValidation
        ? new HapValidator({ referenceCheck: "deferred", requireSorted: this.options.indexable })
        : undefined;

    let pending = this.formatHeader().map((line) => `${line}\n`).join("");
    let haplotypes = 0;
    let variants = 0;

    for await (const record of prepared.records) {
      validator?.observe(record);
      pending += `${this.formatRecord(record)}\n`;
      if (record.type === "H") haplotypes++;
      else variants++;

      if (pending.length >= FLUSH_THRESHOLD) {
        await sink(pending);
        pending = "";
      }
    }

    validator?.finish();
    if (pending.length > 0) {
      await sink(pending);
    }
    return { haplotypes, variants };
  }

  private prepare(input: HapWriteInput): PreparedRecords {
    if (isCollections(input) || !isAsyncIterable(input)) {
      return { kind: "buffered", records: this.prepareBuffered(input) };
    }
    return { kind: "streamed", records: input };
  }

  /**
   * Arrange buffered input into output order and validate it as a whole
   */
  private prepareBuffered(input: Iterable<HapRecord> | HapRecordCollections): HapRecord[] {
    let records: HapRecord[];
    if (this.options.indexable) {
      // A flat sequence keeps its given order so that interleaving is caught
      records = isCollections(input) ? [...input.haplotypes, ...input.variants] : [...input];
    } else {
      const { haplotypes, variants } = isCollections(input) ? input : partition(input);
      const { grouped, orphans } = groupVariants(haplotypes, variants);
      records = [];
      for (const { variants: owned, ...haplotype } of grouped) {
        records.push(haplotype, ...owned);
      }
      records.push(...orphans);
    }

    if (!this.options.skipValidation) {
      validateRecords(records, { referenceCheck: "deferred", requireSorted: this.options.indexable });
    }
    return records;
  }
}

function isCollections(input: HapWriteInput): input is HapRecordCollections {
  return "haplotypes" in input && "variants" in input;
}

function isAsyncIterable(
  input: Iterable<HapRecord> | AsyncIterable<HapRecord>
): input is AsyncIterable<HapRecord> {
  return Symbol.asyncIterator in input;
}

function partition(records: Iterable<HapRecord>): HapRecordCollections {
  const haplotypes: Haplotype[] = [];
  const variants: Variant[] = [];
  for (const record of records) {
    if (record.type === "H") haplotypes.push(record);
    else variants.push(record);
  }
  return { haplotypes, variants };
}

/**
 * Write records to a `.hap` or `.hap.gz` file in one call
 */
export async function writeHapFile(
  filePath: string,
  schema: SchemaInput,
  input: HapWriteInput,
  options: HapWriterOptions = {}
): Promise<WriteSummary> {
  return new HapWriter(schema, options).writeFile(filePath, input);
}
