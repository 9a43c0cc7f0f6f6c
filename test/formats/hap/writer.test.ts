/**
 * Tests for the .hap writer
 */

import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  DanglingVariantError,
  DuplicateHaplotypeError,
  UnsortedFileError,
  ValidationError,
} from "../../../src/errors";
import { BGZFReader } from "../../../src/formats/bgzf";
import { parseHapString, readHapFile } from "../../../src/formats/hap/parser";
import { HapWriter, writeHapFile } from "../../../src/formats/hap/writer";
import { exists } from "../../../src/io/file-reader";
import type { HapRecord } from "../../../src/types";
import { haplotype, TempDirs, variant } from "../../utils/hap-fixtures";

const SCHEMA = [
  { lineType: "H", name: "beta", formatTag: ".2f", description: "Effect size" },
  { lineType: "V", name: "depth", formatTag: "d" },
] as const;

const hap1 = haplotype("chr1", 100, 200, "hap1", { beta: 0.5 });
const hap2 = haplotype("chr1", 300, 400, "hap2", { beta: -1.25 });
const rs1 = variant("hap1", 150, 151, "rs1", "A", { depth: 30 });
const rs2 = variant("hap2", 310, 311, "rs2", "G", { depth: 12 });

const haplotypes = [hap1, hap2];
const variants = [rs2, rs1];

describe("HapWriter.format", () => {
  test("writes each haplotype followed by its variants", () => {
    const writer = new HapWriter(SCHEMA, { comments: ["# simulated cohort"] });

    expect(writer.format({ haplotypes, variants })).toBe(
      [
        "# simulated cohort",
        "#H\tbeta\t.2f\tEffect size",
        "#V\tdepth\td\t",
        "H\tchr1\t100\t200\thap1\t0.50",
        "V\thap1\t150\t151\trs1\tA\t30",
        "H\tchr1\t300\t400\thap2\t-1.25",
        "V\thap2\t310\t311\trs2\tG\t12",
        "",
      ].join("\n")
    );
  });

  test("a flat record list is grouped the same way", () => {
    const writer = new HapWriter(SCHEMA);
    const records: HapRecord[] = [...variants, ...haplotypes];

    expect(writer.format(records)).toBe(writer.format({ haplotypes, variants }));
  });

  test("indexable output lists haplotypes, then variants", () => {
    const writer = new HapWriter(SCHEMA, { indexable: true });
    const lines = writer.format({ haplotypes, variants: [rs1, rs2] }).trimEnd().split("\n");

    expect(lines.slice(2).map((line) => line.split("\t")[4])).toEqual(["hap1", "hap2", "rs1", "rs2"]);
  });

  test("indexable output is never reordered", () => {
    const writer = new HapWriter(SCHEMA, { indexable: true });

    expect(() => writer.format({ haplotypes, variants })).toThrow(UnsortedFileError);
  });

  test("a flat indexable sequence keeps its given order", () => {
    const writer = new HapWriter(SCHEMA, { indexable: true });

    expect(() => writer.format([hap1, rs1, hap2, rs2])).toThrow(UnsortedFileError);
    expect(writer.format([hap1, hap2, rs1, rs2])).toBe(
      writer.format({ haplotypes, variants: [rs1, rs2] })
    );
  });

  test("parsed output equals the input apart from line numbers", async () => {
    const text = new HapWriter(SCHEMA).format({ haplotypes, variants });

    const set = await parseHapString(text);

    expect(set.haplotypes.map(({ lineNumber, ...rest }) => rest)).toEqual(haplotypes);
    expect(set.variants.map(({ lineNumber, ...rest }) => rest)).toEqual([rs1, rs2]);
    expect(set.variants.map((v) => v.lineNumber)).toEqual([4, 6]);
  });

  test("cross-record errors are raised unless skipped", () => {
    const dangling = [...haplotypes, variant("hap9", 1, 2, "rs9", "C", { depth: 1 })];

    expect(() => new HapWriter(SCHEMA).format(dangling)).toThrow(DanglingVariantError);
    expect(new HapWriter(SCHEMA, { skipValidation: true }).format(dangling)).toContain(
      "V\thap9\t1\t2\trs9\tC\t1\n"
    );
  });

  test("orphan variants come after every haplotype", () => {
    const writer = new HapWriter([], { skipValidation: true });

    const text = writer.format([variant("hapX", 1, 1, "rsX", "T"), haplotype("chr1", 1, 2, "hap1")]);

    expect(text).toBe("H\tchr1\t1\t2\thap1\nV\thapX\t1\t1\trsX\tT\n");
  });

  test("the registry is frozen", () => {
    const writer = new HapWriter(SCHEMA);

    expect(writer.registry.isFrozen).toBe(true);
    expect(writer.formatHeader()).toEqual(["#H\tbeta\t.2f\tEffect size", "#V\tdepth\td\t"]);
  });

  test("invalid options are rejected", () => {
    expect(() => new HapWriter(SCHEMA, { compressionLevel: 12 })).toThrow(ValidationError);
    expect(() => new HapWriter(SCHEMA, { comments: ["no hash"] }).formatHeader()).toThrow(
      /single lines starting with '#'/
    );
  });
});

describe("HapWriter.writeFile", () => {
  const temp = new TempDirs();
  let dir: string;

  beforeEach(async () => {
    dir = await temp.create();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  test("plain output matches format()", async () => {
    const path = join(dir, "cohort.hap");
    const writer = new HapWriter(SCHEMA);

    const summary = await writer.writeFile(path, { haplotypes, variants });
    const text = await readFile(path, "utf8");

    expect(text).toBe(writer.format({ haplotypes, variants }));
    expect(summary).toEqual({ haplotypes: 2, variants: 2, bytesWritten: Buffer.byteLength(text) });
  });

  test(".gz paths are written as BGZF", async () => {
    const path = join(dir, "cohort.hap.gz");
    const writer = new HapWriter(SCHEMA);

    const summary = await writer.writeFile(path, { haplotypes, variants });
    const bytes = new Uint8Array(await readFile(path));

    expect(BGZFReader.readBlockHeader(bytes, 0).compressedSize).toBeGreaterThan(0);
    expect(new TextDecoder().decode(BGZFReader.decompressAll(bytes))).toBe(
      writer.format({ haplotypes, variants })
    );
    expect(summary.bytesWritten).toBe((await stat(path)).size);
  });

  test("written files read back to the same records", async () => {
    const path = join(dir, "cohort.hap.gz");
    await writeHapFile(path, SCHEMA, { haplotypes, variants }, { comments: ["# round trip"] });

    const set = await readHapFile(path, { trackLineNumbers: false });

    expect(set.header.comments).toEqual(["# round trip"]);
    expect(set.haplotypes).toEqual(haplotypes);
    expect(set.variants).toEqual([rs1, rs2]);
  });

  test("async input is written as it arrives", async () => {
    const path = join(dir, "streamed.hap");
    async function* records(): AsyncIterable<HapRecord> {
      yield* haplotypes;
      yield rs1;
    }

    const summary = await new HapWriter(SCHEMA).writeFile(path, records());

    expect(summary.haplotypes).toBe(2);
    expect(summary.variants).toBe(1);
    expect((await readFile(path, "utf8")).split("\n")[4]).toBe("V\thap1\t150\t151\trs1\tA\t30");
  });

  test("invalid buffered input never creates the file", async () => {
    const path = join(dir, "duplicate.hap");

    await expect(
      new HapWriter(SCHEMA).writeFile(path, [hap1, hap2, hap1])
    ).rejects.toThrow(DuplicateHaplotypeError);
    expect(await exists(path)).toBe(false);
  });

  test("a failure in streamed input removes the partial file", async () => {
    const path = join(dir, "partial.hap.gz");
    async function* records(): AsyncIterable<HapRecord> {
      yield* haplotypes;
      yield variant("hap9", 1, 2, "rs9", "C", { depth: 1 });
    }

    await expect(new HapWriter(SCHEMA).writeFile(path, records())).rejects.toThrow(DanglingVariantError);
    expect(await exists(path)).toBe(false);
  });
});

describe("HapWriter.writeToStream", () => {
  test("writes uncompressed text", async () => {
    const chunks: Uint8Array[] = [];
    const stream = new WritableStream<Uint8Array>({
      write(chunk) {
        chunks.push(chunk);
      },
    });
    const writer = new HapWriter(SCHEMA);

    const summary = await writer.writeToStream({ haplotypes, variants }, stream);
    const text = chunks.map((chunk) => new TextDecoder().decode(chunk)).join("");

    expect(summary).toEqual({ haplotypes: 2, variants: 2 });
    expect(text).toBe(writer.format({ haplotypes, variants }));
  });
});
