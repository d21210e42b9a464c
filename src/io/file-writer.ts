/**
 * File writing operations using Effect Platform
 *
 * Chunk writes create their parent directories on demand. JSON documents are
 * written to a temporary sibling and renamed into place, so a reader never
 * sees a truncated manifest.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect, type Layer } from "effect";
import { CompressionService } from "../compression";
import { type CompressionError, IOError } from "../errors";
import type { WriteOptions } from "../types";
import { runWithPlatform } from "./runtime";

/**
 * Compress data when the options ask for it
 *
 * Uses CompressionService dependency injection so callers (and tests) decide
 * which implementation runs.
 */
function applyCompression(
  data: Uint8Array,
  options: WriteOptions
): Effect.Effect<Uint8Array, CompressionError, CompressionService> {
  const format = options.compressionFormat ?? "none";
  if (format === "none") {
    return Effect.succeed(data);
  }
  return Effect.gen(function* () {
    const compressionService = yield* CompressionService;
    return yield* compressionService.compress(data, format, options.compressionLevel ?? 6);
  });
}

/**
 * Effect that ensures the parent directory of `path` exists
 */
const ensureParentDirectory = (
  path: string
): Effect.Effect<void, IOError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const parentDir = pathService.dirname(path);
    yield* fs
      .makeDirectory(parentDir, { recursive: true })
      .pipe(Effect.mapError((error) => IOError.fromSystemError("mkdir", parentDir, error)));
  });

/**
 * Effect that writes bytes to `path`, creating parent directories
 *
 * @param path - Destination file
 * @param content - Bytes to write (compressed first when requested)
 * @param options - Compression settings
 */
export const writeBytesEffect = (
  path: string,
  content: Uint8Array,
  options: WriteOptions = {}
): Effect.Effect<
  void,
  IOError | CompressionError,
  FileSystem.FileSystem | Path.Path | CompressionService
> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const finalData = yield* applyCompression(content, options);
    yield* ensureParentDirectory(path);
    yield* fs
      .writeFile(path, finalData)
      .pipe(Effect.mapError((error) => IOError.fromSystemError("write", path, error)));
  });

/**
 * Write binary data to a file (overwrites if exists, creates parents)
 *
 * @param path - File path to write to
 * @param content - Binary data to write
 * @param options - Compression settings
 * @param compression - Compression layer (default: gzip via fflate)
 * @throws {IOError} When the write fails
 * @throws {CompressionError} When compression fails
 *
 * @example
 * ```typescript
 * await writeBytes("data/seq/chr1/0.txt.gz", bases, { compressionFormat: "gzip" });
 * ```
 */
export async function writeBytes(
  path: string,
  content: Uint8Array,
  options: WriteOptions = {},
  compression: Layer.Layer<CompressionService> = CompressionService.Live
): Promise<void> {
  await runWithPlatform(
    writeBytesEffect(path, content, options).pipe(Effect.provide(compression))
  );
}

/**
 * Write a file atomically: write a temporary sibling, then rename over `path`
 *
 * If the process dies before the rename, `path` keeps its previous content
 * (or stays absent).
 *
 * @param path - Destination file
 * @param content - Text to write
 * @throws {IOError} When the write or rename fails
 */
export async function writeStringAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`;
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* ensureParentDirectory(path);
    yield* fs
      .writeFileString(tempPath, content)
      .pipe(Effect.mapError((error) => IOError.fromSystemError("write", tempPath, error)));
    yield* fs
      .rename(tempPath, path)
      .pipe(Effect.mapError((error) => IOError.fromSystemError("rename", path, error)));
  });

  await runWithPlatform(program);
}

/**
 * Serialise a value as compact JSON and write it atomically
 */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await writeStringAtomic(path, JSON.stringify(value));
}

/**
 * Copy a file into place, creating the destination directory
 *
 * @throws {IOError} When the source cannot be read or the copy fails
 */
export async function copyFile(from: string, to: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* ensureParentDirectory(to);
    yield* fs
      .copyFile(from, to)
      .pipe(Effect.mapError((error) => IOError.fromSystemError("copy", from, error)));
  });

  await runWithPlatform(program);
}

/**
 * Create an empty file if it does not exist; leave an existing file alone
 */
export async function touch(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* ensureParentDirectory(path);
    const fileExists = yield* fs
      .exists(path)
      .pipe(Effect.mapError((error) => IOError.fromSystemError("stat", path, error)));
    if (!fileExists) {
      yield* fs
        .writeFile(path, new Uint8Array(0))
        .pipe(Effect.mapError((error) => IOError.fromSystemError("write", path, error)));
    }
  });

  await runWithPlatform(program);
}
