/**
 * Streaming `.hap` reader
 *
 * Reads the header, freezes the schema, then yields one record per data
 * line. Line-level errors (column counts, positions, format tags) always
 * raise; cross-record checks (unique haplotype IDs, variant references,
 * optional ordering) can be skipped with `skipValidation`.
 *
 * @example
 * ```typescript
 * const parser = new HapParser({ onHeader: (header) => console.log(header.declarations) });
 * for await (const record of parser.parseFile("cohort.hap.gz")) {
 *   if (record.type === "H") console.log(record.id, record.extras);
 * }
 * ```
 */

import { type } from "arktype";
import { HapkitError, MalformedLineError, ParseError, ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines, splitLines } from "../../io/stream-utils";
import type { HapHeader, HapRecord, Haplotype, Variant } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { HapCodec } from "./codec";
import { HeaderBuilder } from "./header";
import type { SchemaRegistry } from "./schema";
import { type HapParserOptions, HapParserOptionsSchema, type HapRecordSet } from "./types";
import { HapValidator } from "./validator";

/** Lines between abort checks */
const ABORT_CHECK_INTERVAL = 1000;

export class HapParser extends AbstractParser<HapRecord, HapParserOptions> {
  protected getFormatName(): string {
    return "HAP";
  }

  constructor(options: HapParserOptions = {}) {
    const validationResult = HapParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid HAP parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  async *parseString(data: string): AsyncIterable<HapRecord> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse a `.hap` file; `.gz` files (gzip or BGZF) are decompressed on the fly
   *
   * @throws {HapkitError} Domain errors propagate unchanged
   * @throws {ParseError} If reading fails for another reason
   */
  async *parseFile(filePath: string): AsyncIterable<HapRecord> {
    try {
      const stream = await createStream(filePath);
      yield* this.parse(stream);
    } catch (error) {
      if (error instanceof HapkitError) throw error;
      throw new ParseError(
        `Failed to read HAP file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        "HAP"
      );
    }
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<HapRecord> {
    yield* this.parseLines(readLines(stream, this.options.maxLineLength));
  }

  private async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<HapRecord> {
    const headerBuilder = new HeaderBuilder();
    const validator = this.options.skipValidation
      ? undefined
      : new HapValidator({
          referenceCheck: this.options.referenceCheck ?? "deferred",
          requireSorted: this.options.requireSorted ?? false,
        });
    const wanted =
      this.options.haplotypeIds !== undefined ? new Set(this.options.haplotypeIds) : undefined;
    const found = new Set<string>();

    let codec: HapCodec | undefined;
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      if (lineNumber % ABORT_CHECK_INTERVAL === 0) {
        this.throwIfAborted(`parsing line ${lineNumber}`);
      }
      if (line.trim() === "") continue;

      if (line.startsWith("#")) {
        if (codec !== undefined) {
          throw new MalformedLineError(
            "Header lines must come before the first data line",
            undefined,
            lineNumber,
            line
          );
        }
        headerBuilder.addLine(line, lineNumber);
        continue;
      }

      codec ??= this.startBody(headerBuilder);
      const record = codec.parseLine(line, lineNumber, this.options.trackLineNumbers);
      validator?.observe(record, lineNumber, line);

      if (wanted !== undefined) {
        const owner = record.type === "H" ? record.id : record.haplotypeId;
        if (!wanted.has(owner)) continue;
        if (record.type === "H") found.add(record.id);
      }
      yield record;
    }

    this.checkAborted();
    if (codec === undefined) {
      this.startBody(headerBuilder);
    }
    validator?.finish();

    if (wanted !== undefined) {
      for (const id of wanted) {
        if (!found.has(id)) {
          this.options.onWarning(`Requested haplotype '${id}' was not found`);
        }
      }
    }
  }

  /**
   * Freeze the header and check it against the expected schema
   */
  private startBody(headerBuilder: HeaderBuilder): HapCodec {
    const { header, registry } = headerBuilder.finish();
    const expected = this.options.schema;
    if (expected !== undefined && !expected.equals(registry)) {
      throw new MalformedLineError(
        `Header declarations do not match the expected schema: expected [${describe(expected)}], found [${describe(registry)}]`
      );
    }
    this.options.onHeader?.(header, registry);
    return new HapCodec(registry);
  }
}

function describe(registry: SchemaRegistry): string {
  return registry
    .declarations()
    .map((field) => `${field.lineType}:${field.name}:${field.format.tag}`)
    .join(", ");
}

/**
 * Read a whole `.hap` text into memory
 *
 * @example
 * ```typescript
 * const { haplotypes, variants } = await parseHapString(text);
 * ```
 */
export async function parseHapString(
  text: string,
  options: HapParserOptions = {}
): Promise<HapRecordSet> {
  return collectRecordSet(options, (parser) => parser.parseString(text));
}

/**
 * Read a whole `.hap` or `.hap.gz` file into memory
 */
export async function readHapFile(
  filePath: string,
  options: HapParserOptions = {}
): Promise<HapRecordSet> {
  return collectRecordSet(options, (parser) => parser.parseFile(filePath));
}

async function collectRecordSet(
  options: HapParserOptions,
  source: (parser: HapParser) => AsyncIterable<HapRecord>
): Promise<HapRecordSet> {
  const state: { captured?: { header: HapHeader; registry: SchemaRegistry } } = {};
  const parser = new HapParser({
    ...options,
    onHeader: (header, registry) => {
      state.captured = { header, registry };
      options.onHeader?.(header, registry);
    },
  });

  const haplotypes: Haplotype[] = [];
  const variants: Variant[] = [];
  for await (const record of source(parser)) {
    if (record.type === "H") {
      haplotypes.push(record);
    } else {
      variants.push(record);
    }
  }

  if (state.captured === undefined) {
    throw new ParseError("Input ended before the header was read", "HAP");
  }
  return { ...state.captured, haplotypes, variants };
}
