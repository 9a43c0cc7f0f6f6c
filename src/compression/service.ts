/**
 * Effect-based compression service
 *
 * File writing asks for a `CompressionService` instead of calling zlib
 * directly, so tests can provide a layer of their own.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const compressor = yield* CompressionService;
 *   return yield* compressor.compress(data, "gzip", 6);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip, decompress as decompressGzip, wrapStream } from "./gzip";

/**
 * Operations offered by the compression service
 */
export interface CompressionServiceShape {
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;

  readonly createDecompressionStream: (
    input: ReadableStream<Uint8Array>,
    format: CompressionFormat
  ) => ReadableStream<Uint8Array>;
}

export class CompressionService extends Context.Tag("hapkit/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip service backed by Node's zlib
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

function toCompressionError(
  operation: "compress" | "decompress",
  error: unknown
): CompressionError {
  return error instanceof CompressionError
    ? error
    : CompressionError.fromSystemError("gzip", operation, error);
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => compressGzip(data, { level: level ?? 6 }),
            catch: (error) => toCompressionError("compress", error),
          }),

    decompress: (data, format) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => decompressGzip(data),
            catch: (error) => toCompressionError("decompress", error),
          }),

    createDecompressionStream: (input, format) =>
      format === "none" ? input : wrapStream(input),
  };
}
