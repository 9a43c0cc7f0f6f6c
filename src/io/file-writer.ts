/**
 * File writing operations using Effect Platform
 *
 * All Effect machinery stays behind Promise-based functions.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError, HapkitError } from "../errors";
import type { WriteOptions } from "../types";
import { validatePath } from "./file-reader";
import { getPlatform, runEffect } from "./runtime";

/**
 * Compress data when the options or the file extension ask for it
 */
function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions = {}
): Effect.Effect<Uint8Array, HapkitError, CompressionService> {
  const autoCompress = options.autoCompress ?? true;
  if (!autoCompress) {
    return Effect.succeed(data);
  }

  let compressionFormat = options.compressionFormat ?? "none";
  if (compressionFormat === "none") {
    compressionFormat = CompressionDetector.fromExtension(filePath);
  }

  if (compressionFormat === "none") {
    return Effect.succeed(data);
  }

  return Effect.gen(function* () {
    const compressionService = yield* CompressionService;
    return yield* compressionService.compress(
      data,
      compressionFormat,
      options.compressionLevel ?? 6
    );
  });
}

/**
 * Marks a rejection raised by caller code inside `openForWriting`
 */
class CallbackFailure {
  constructor(readonly error: unknown) {}
}

function toFileError(operation: FileError["operation"], path: string, error: unknown): unknown {
  return error instanceof HapkitError ? error : FileError.fromSystemError(operation, path, error);
}

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  writeString(content: string): Promise<void>;
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * A `.gz` path is gzip-compressed unless `autoCompress` is false.
 *
 * @throws {FileError} When the write fails or the path is invalid
 *
 * @example
 * ```typescript
 * await writeString("notes.txt", "H\tchr1\t100\t200\thap1\n");
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options?: WriteOptions
): Promise<void> {
  await writeBytes(path, new TextEncoder().encode(content), options);
}

/**
 * Write binary data to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails or the path is invalid
 */
export async function writeBytes(
  path: string,
  content: Uint8Array,
  options?: WriteOptions
): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const finalData = yield* applyCompression(content, validatedPath, options);
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(validatedPath, finalData);
  });

  try {
    await runEffect(
      program.pipe(Effect.provide(getPlatform()), Effect.provide(CompressionService.Live))
    );
  } catch (error) {
    throw toFileError("write", validatedPath, error);
  }
}

/**
 * Open a file for writing and run a callback with a write handle
 *
 * The file is opened exclusively for this call (truncating any previous
 * content) and closed through Effect's scope on every exit path. When
 * compression applies, each write becomes its own gzip member.
 *
 * @returns The callback's return value
 * @throws {FileError} When opening or writing fails; callback errors propagate unchanged
 *
 * @example
 * ```typescript
 * await openForWriting("out.hap", async (handle) => {
 *   await handle.writeString("#H\tbeta\t.2f\tEffect size\n");
 *   await handle.writeString("H\tchr1\t100\t200\thap1\t0.50\n");
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options?: WriteOptions
): Promise<T> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;

    const file = yield* fs.open(validatedPath, {
      flag: "w",
      mode: 0o644,
    });

    const writeBytesToFile = (content: Uint8Array): Promise<void> =>
      runEffect(
        applyCompression(content, validatedPath, options).pipe(
          Effect.flatMap((data) => file.writeAll(data)),
          Effect.provideService(CompressionService, compression)
        )
      ).catch((error: unknown) => {
        throw toFileError("write", validatedPath, error);
      });

    const handle: FileWriteHandle = {
      writeString: (content) => writeBytesToFile(new TextEncoder().encode(content)),
      writeBytes: writeBytesToFile,
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => new CallbackFailure(error),
    });
  });

  try {
    return await runEffect(
      program.pipe(
        Effect.scoped,
        Effect.provide(getPlatform()),
        Effect.provide(CompressionService.Live)
      )
    );
  } catch (error) {
    if (error instanceof CallbackFailure) throw error.error;
    throw toFileError("open", validatedPath, error);
  }
}

/**
 * Delete a file, doing nothing if it does not exist
 *
 * @throws {FileError} When deletion fails for another reason
 */
export async function deleteFile(path: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(validatedPath)) {
      yield* fs.remove(validatedPath);
    }
  });

  try {
    await runEffect(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}
