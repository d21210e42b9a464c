/**
 * Gzip compression for sequence chunks and gzipped inputs
 *
 * Chunk files are compressed one at a time, so the buffer-based functions are
 * the hot path. Gzipped FASTA inputs can be many gigabytes and go through the
 * streaming decompressor instead.
 */

import { Gunzip, gunzipSync, gzipSync } from "fflate";
import { CompressionError } from "../errors";
import { CompressionDetector } from "./detector";

const DEFLATE_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

/**
 * Options for gzip compression
 */
export interface GzipOptions {
  /** Compression level 0-9 (default: 6) */
  readonly level?: number;
}

function validateGzipFormat(compressed: Uint8Array): void {
  if (CompressionDetector.fromMagicBytes(compressed) !== "gzip") {
    throw new CompressionError(
      "Invalid gzip magic bytes - data may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }
}

function deflateLevel(level: number): (typeof DEFLATE_LEVELS)[number] {
  const resolved = DEFLATE_LEVELS[level];
  if (resolved === undefined) {
    throw new CompressionError(`Compression level must be 0-9, got ${level}`, "gzip", "compress");
  }
  return resolved;
}

/**
 * Compress a buffer with gzip
 *
 * @param data - Uncompressed bytes
 * @param options - Compression level
 * @returns Promise resolving to gzip bytes
 * @throws {CompressionError} If the level is out of range or compression fails
 *
 * @example
 * ```typescript
 * const bytes = await compress(new TextEncoder().encode("ACGT"), { level: 9 });
 * ```
 */
export async function compress(data: Uint8Array, options: GzipOptions = {}): Promise<Uint8Array> {
  const level = deflateLevel(options.level ?? 6);
  try {
    return gzipSync(data, { level });
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "compress", err, data.length);
  }
}

/**
 * Decompress an entire gzip buffer in memory
 *
 * @param compressed - Gzip bytes
 * @returns Promise resolving to the decompressed bytes
 * @throws {CompressionError} If the data is not gzip or is corrupt
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  validateGzipFormat(compressed);
  try {
    return gunzipSync(compressed);
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "decompress", err, compressed.length);
  }
}

/**
 * Create a gzip decompression transform stream
 *
 * @returns TransformStream from gzip bytes to decompressed bytes
 *
 * @example
 * ```typescript
 * const plain = compressedStream.pipeThrough(createStream());
 * ```
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  let gunzip: Gunzip | undefined;
  let bytesProcessed = 0;

  const push = (chunk: Uint8Array, final: boolean): void => {
    if (gunzip === undefined) {
      throw new CompressionError("Decompressor not initialized", "gzip", "stream");
    }
    try {
      gunzip.push(chunk, final);
    } catch (err) {
      throw CompressionError.fromSystemError("gzip", "stream", err, bytesProcessed);
    }
  };

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller): void {
      gunzip = new Gunzip((data) => {
        controller.enqueue(data);
      });
    },
    transform(chunk): void {
      bytesProcessed += chunk.length;
      push(chunk, false);
    },
    flush(): void {
      push(new Uint8Array(0), true);
    },
  });
}
