/**
 * Effect-based compression service
 *
 * Chunk writers ask for a `CompressionService` instead of calling gzip
 * directly, so tests can provide a layer that records or fails compression.
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
import { compress as compressGzip, createStream, decompress as decompressGzip } from "./gzip";

/**
 * Shape of the compression service
 */
export interface CompressionServiceShape {
  /**
   * Compress data using the specified format
   *
   * @param data - Uncompressed data
   * @param format - `gzip`, or `none` to pass the data through
   * @param level - Gzip level 1-9
   */
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
    format: CompressionFormat
  ) => TransformStream<Uint8Array, Uint8Array>;
}

export class CompressionService extends Context.Tag("@refseq-prep/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression layer backed by fflate
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) => {
      if (format === "none") {
        return Effect.succeed(data);
      }
      return Effect.tryPromise({
        try: () => compressGzip(data, { level: level ?? 6 }),
        catch: (error) => CompressionError.fromSystemError("gzip", "compress", error),
      });
    },

    decompress: (data, format) => {
      if (format === "none") {
        return Effect.succeed(data);
      }
      return Effect.tryPromise({
        try: () => decompressGzip(data),
        catch: (error) => CompressionError.fromSystemError("gzip", "decompress", error),
      });
    },

    createDecompressionStream: (format) =>
      format === "none" ? createPassthroughStream() : createStream(),
  };
}

/**
 * Create a passthrough stream that forwards data unchanged
 */
function createPassthroughStream(): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    },
  });
}
