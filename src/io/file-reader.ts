/**
 * File reading utilities on the Effect platform FileSystem
 *
 * Plain and gzip (including BGZF) haplotype files are read through the same
 * functions; compression is detected from the file extension.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError, HapkitError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform, runEffect } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  encoding: "utf8",
  maxFileSize: 10_737_418_240, // 10GB
  autoDecompress: true,
  compressionFormat: "none",
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation or the stat call fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runEffect(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If the file cannot be accessed
 */
export async function getSize(path: string): Promise<number> {
  return (await getMetadata(path)).size;
}

/**
 * Get file metadata
 *
 * @throws {FileError} If the file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);

    return {
      path: validatedPath,
      size: Number(info.size),
      extension: validatedPath.includes(".")
        ? validatedPath.substring(validatedPath.lastIndexOf("."))
        : "",
    };
  });

  try {
    return await runEffect(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file, decompressing `.gz` input by default
 *
 * @throws {FileError} If the file does not exist, is too large or cannot be opened
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError("File does not exist or is not accessible", validatedPath, "open");
  }
  await validateFileSize(validatedPath, mergedOptions);

  const format =
    mergedOptions.compressionFormat === "none"
      ? CompressionDetector.fromExtension(validatedPath)
      : mergedOptions.compressionFormat;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;
    const stream = Stream.toReadableStream(
      fs.stream(validatedPath, { chunkSize: mergedOptions.bufferSize })
    );
    return mergedOptions.autoDecompress
      ? compression.createDecompressionStream(stream, format)
      : stream;
  });

  try {
    return await runEffect(
      program.pipe(Effect.provide(getPlatform()), Effect.provide(CompressionService.Live))
    );
  } catch (error) {
    if (error instanceof HapkitError) throw error;
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Read an entire file to a string, decompressing `.gz` input by default
 *
 * @throws {FileError} If the file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);
  await validateFileSize(validatedPath, mergedOptions);

  const format =
    mergedOptions.compressionFormat === "none"
      ? CompressionDetector.fromExtension(validatedPath)
      : mergedOptions.compressionFormat;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;
    const bytes = yield* fs.readFile(validatedPath);
    const data = mergedOptions.autoDecompress
      ? yield* compression.decompress(bytes, format)
      : bytes;
    return new TextDecoder(mergedOptions.encoding === "ascii" ? "latin1" : "utf-8").decode(data);
  });

  try {
    return await runEffect(
      program.pipe(Effect.provide(getPlatform()), Effect.provide(CompressionService.Live))
    );
  } catch (error) {
    if (error instanceof HapkitError) throw error;
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Read a byte range `[start, end)` from a file
 *
 * @example
 * ```typescript
 * // First BGZF block header
 * const header = await readByteRange("cohort.hap.gz", 0, 18);
 * ```
 */
export async function readByteRange(path: string, start: number, end: number): Promise<Uint8Array> {
  const validatedPath = validatePath(path);

  if (start < 0 || end < 0) {
    throw new FileError("Byte range must be non-negative", validatedPath, "read");
  }
  if (start >= end) {
    throw new FileError("Start byte must be less than end byte", validatedPath, "read");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const chunks = yield* Stream.runCollect(
      fs.stream(validatedPath, { offset: start, bytesToRead: end - start })
    );
    const parts = Array.from(chunks);
    const result = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
    let offset = 0;
    for (const part of parts) {
      result.set(part, offset);
      offset += part.length;
    }
    return result;
  });

  try {
    return await runEffect(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

export const FileReader = {
  exists,
  getSize,
  getMetadata,
  createStream,
  readToString,
  readByteRange,
} as const;

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Validate a file path with ArkType and return the branded type
 *
 * @throws {FileError} If the path is empty or contains a null byte
 */
export function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

async function validateFileSize(
  validatedPath: FilePath,
  mergedOptions: Required<FileReaderOptions>
): Promise<number> {
  const fileSize = await getSize(validatedPath);
  if (fileSize > mergedOptions.maxFileSize) {
    throw new FileError(
      `File too large: ${fileSize} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }
  return fileSize;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
