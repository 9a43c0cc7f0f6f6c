/**
 * Tests for file writing on the Effect platform FileSystem
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { exists, readToString } from "../../src/io/file-reader";
import { deleteFile, openForWriting, writeBytes, writeString } from "../../src/io/file-writer";
import { TempDirs } from "../utils/hap-fixtures";

describe("file-writer", () => {
  const temp = new TempDirs();
  let dir: string;

  beforeEach(async () => {
    dir = await temp.create();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  test("writeString creates and overwrites files", async () => {
    const file = join(dir, "out.hap");

    await writeString(file, "first\n");
    await writeString(file, "second\n");

    expect(await readFile(file, "utf8")).toBe("second\n");
  });

  test("writeString gzips .gz paths unless autoCompress is off", async () => {
    const compressed = join(dir, "out.hap.gz");
    const raw = join(dir, "raw.hap.gz");

    await writeString(compressed, "H\tchr1\t1\t2\thap1\n");
    await writeString(raw, "H\tchr1\t1\t2\thap1\n", { autoCompress: false });

    expect(gunzipSync(await readFile(compressed)).toString("utf8")).toBe("H\tchr1\t1\t2\thap1\n");
    expect(await readFile(raw, "utf8")).toBe("H\tchr1\t1\t2\thap1\n");
  });

  test("writeBytes honours an explicit compression format", async () => {
    const file = join(dir, "forced.bin");

    await writeBytes(file, new TextEncoder().encode("payload"), { compressionFormat: "gzip" });

    expect(gunzipSync(await readFile(file)).toString("utf8")).toBe("payload");
  });

  test("writeString into a missing directory is a FileError", async () => {
    await expect(writeString(join(dir, "missing", "out.hap"), "x")).rejects.toBeInstanceOf(FileError);
  });

  test("openForWriting appends each write and returns the callback value", async () => {
    const file = join(dir, "multi.hap");

    const result = await openForWriting(file, async (handle) => {
      await handle.writeString("#comment\n");
      await handle.writeBytes(new TextEncoder().encode("H\tchr1\t1\t2\thap1\n"));
      return 2;
    });

    expect(result).toBe(2);
    expect(await readToString(file)).toBe("#comment\nH\tchr1\t1\t2\thap1\n");
  });

  test("openForWriting propagates callback errors unchanged", async () => {
    const file = join(dir, "failing.hap");
    const failure = new RangeError("stop here");

    await expect(
      openForWriting(file, async (handle) => {
        await handle.writeString("partial\n");
        throw failure;
      })
    ).rejects.toBe(failure);
    expect(await readFile(file, "utf8")).toBe("partial\n");
  });

  test("openForWriting truncates previous content", async () => {
    const file = join(dir, "reused.hap");
    await writeFile(file, "old content that is longer\n");

    await openForWriting(file, (handle) => handle.writeString("new\n"));

    expect(await readFile(file, "utf8")).toBe("new\n");
  });

  test("deleteFile removes files and ignores missing ones", async () => {
    const file = join(dir, "gone.hap");
    await writeFile(file, "x");

    await deleteFile(file);
    await deleteFile(file);

    expect(await exists(file)).toBe(false);
  });
});
