/**
 * File reading utilities built on the Effect platform FileSystem
 *
 * Large inputs are streamed; only small index and size tables are read whole.
 * Gzipped inputs (`.gz`/`.gzip`) are decompressed on the fly.
 */

import { FileSystem } from "@effect/platform";
import { Effect, type Layer, Stream } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { IOError, RefseqError } from "../errors";
import { runWithPlatform } from "./runtime";
import { numberLines, readLineFragments, type NumberedLine } from "./stream-utils";

/**
 * Options for streaming a file
 */
export interface FileReaderOptions {
  /** Read buffer size in bytes (default: 64KiB) */
  readonly bufferSize?: number;
  /** Decompress `.gz`/`.gzip` files automatically (default: true) */
  readonly autoDecompress?: boolean;
  /** Longest piece of a line handed out at once (default: whole lines) */
  readonly maxLineLength?: number;
}

const DEFAULT_BUFFER_SIZE = 65_536;

/**
 * Check if a path exists and is a regular file
 *
 * @param path - File path to check
 * @returns Promise resolving to true if the path is a file
 */
export async function exists(path: string): Promise<boolean> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(path);
    if (!pathExists) return false;

    const info = yield* fs.stat(path);
    return info.type === "File";
  });

  return runWithPlatform(
    program.pipe(Effect.mapError((error) => IOError.fromSystemError("stat", path, error)))
  );
}

/**
 * Fail with IOError unless the path is a readable file
 */
async function requireFile(path: string): Promise<void> {
  if (!(await exists(path))) {
    throw IOError.fromSystemError("open", path, new Error("ENOENT: no such file"));
  }
}

/**
 * Create a byte stream for a file, decompressing by extension
 *
 * @param path - File to read
 * @param options - Buffer size and decompression switch
 * @param compression - Decompression layer (default: gzip via fflate)
 * @returns ReadableStream of file (or decompressed) bytes
 * @throws {IOError} If the file does not exist
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {},
  compression: Layer.Layer<CompressionService> = CompressionService.Live
): Promise<ReadableStream<Uint8Array>> {
  await requireFile(path);

  const autoDecompress = options.autoDecompress ?? true;
  const format = autoDecompress ? CompressionDetector.fromExtension(path) : "none";

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compressionService = yield* CompressionService;
    const stream = Stream.toReadableStream(
      fs.stream(path, { bufferSize: options.bufferSize ?? DEFAULT_BUFFER_SIZE })
    );
    return format === "none"
      ? stream
      : stream.pipeThrough(compressionService.createDecompressionStream(format));
  });
  return runWithPlatform(program.pipe(Effect.provide(compression)));
}

/**
 * Stream a text file as numbered lines
 *
 * With `maxLineLength` set, longer lines arrive in pieces (see `NumberedLine`).
 *
 * Read failures part-way through surface as IOError naming the file; our own
 * errors (e.g. a corrupt gzip member) pass through unchanged.
 *
 * @param path - Text file (optionally gzipped) to read
 * @yields Lines with their 1-based line numbers
 */
export async function* readNumberedLines(
  path: string,
  options: FileReaderOptions = {}
): AsyncGenerator<NumberedLine> {
  const stream = await createStream(path, options);
  try {
    yield* numberLines(readLineFragments(stream, options.maxLineLength));
  } catch (error) {
    if (error instanceof RefseqError) {
      throw error;
    }
    throw IOError.fromSystemError("read", path, error);
  }
}

/**
 * Read a whole text file into a string
 *
 * @throws {IOError} If the file cannot be read
 */
export async function readToString(path: string): Promise<string> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path);
  });
  return runWithPlatform(
    program.pipe(Effect.mapError((error) => IOError.fromSystemError("read", path, error)))
  );
}
