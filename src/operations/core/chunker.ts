/**
 * Fixed-size chunking of streamed bases
 */

import type { Chunk } from "../../types";

/**
 * Default bases per chunk file
 */
export const DEFAULT_CHUNK_SIZE = 20_000;

/**
 * Chunk size grows by this factor when chunks are gzip-compressed
 */
export const COMPRESSED_CHUNK_FACTOR = 4;

/**
 * Number of chunks a sequence of `length` bases splits into
 *
 * @example
 * ```typescript
 * chunkCount(25_000, 20_000) // 2
 * chunkCount(0, 20_000) // 0
 * ```
 */
export function chunkCount(length: number, chunkSize: number): number {
  return Math.ceil(length / chunkSize);
}

/**
 * Split a stream of base fragments into chunks of exactly `chunkSize` bases
 *
 * Only the final chunk may be shorter. An empty stream yields nothing. At most
 * one chunk's worth of bases (plus one input fragment) is buffered.
 *
 * @param sequenceName - Name recorded on every chunk
 * @param bases - Fragments in sequence order, of any length
 * @param chunkSize - Positive integer
 *
 * @example
 * ```typescript
 * for await (const chunk of chunkBases("chr1", sequence.bases, 20_000)) {
 *   await write(shardPath(chunk.sequenceName, chunk.index, "hashed", false), chunk.bases);
 * }
 * ```
 */
export async function* chunkBases(
  sequenceName: string,
  bases: AsyncIterable<string>,
  chunkSize: number
): AsyncGenerator<Chunk> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  let buffer = "";
  let index = 0;
  let start = 0;

  for await (const fragment of bases) {
    buffer += fragment;
    while (buffer.length >= chunkSize) {
      yield { sequenceName, index, start, end: start + chunkSize, bases: buffer.slice(0, chunkSize) };
      buffer = buffer.slice(chunkSize);
      index++;
      start += chunkSize;
    }
  }

  if (buffer.length > 0) {
    yield { sequenceName, index, start, end: start + buffer.length, bases: buffer };
  }
}

/**
 * Count bases without keeping them
 */
export async function countBases(bases: AsyncIterable<string>): Promise<number> {
  let length = 0;
  for await (const fragment of bases) {
    length += fragment.length;
  }
  return length;
}
