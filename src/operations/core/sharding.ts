/**
 * Chunk file placement
 *
 * Every chunk path is relative to the output directory and lives under
 * `seq/`. The hashed scheme nests each chunk three directories deep using
 * the CRC-32 of `{name}-{index}`, which keeps any one directory small even
 * for assemblies with hundreds of thousands of scaffolds.
 */

import type { ShardScheme } from "../../types";
import { crc32Hex } from "./hashing";

export const SEQ_DIRECTORY = "seq";

const CHUNK_EXTENSION = ".txt";
const COMPRESSED_SUFFIX = ".gz";

/**
 * Split the hex CRC-32 of a chunk identity into directory levels
 *
 * @example
 * ```typescript
 * hashDirectories("chr1", 0) // e.g. ["609", "2e0", "2d"]
 * ```
 */
export function hashDirectories(name: string, index: number): string[] {
  const hex = crc32Hex(`${name}-${index}`);
  const groups: string[] = [];
  for (let i = 0; i < hex.length; i += 3) {
    groups.push(hex.slice(i, i + 3));
  }
  return groups;
}

/**
 * Output-relative path of one chunk file
 *
 * @example
 * ```typescript
 * shardPath("chr1", 3, "flat", false) // "seq/chr1/3.txt"
 * shardPath("chr1", 3, "flat", true) // "seq/chr1/3.txt.gz"
 * ```
 */
export function shardPath(
  name: string,
  index: number,
  scheme: ShardScheme,
  compressed: boolean
): string {
  const suffix = compressed ? CHUNK_EXTENSION + COMPRESSED_SUFFIX : CHUNK_EXTENSION;
  if (scheme === "flat") {
    return [SEQ_DIRECTORY, name, `${index}${suffix}`].join("/");
  }
  return [SEQ_DIRECTORY, ...hashDirectories(name, index), `${name}-${index}${suffix}`].join("/");
}

/**
 * Track `urlTemplate` telling the viewer where chunks live
 */
export function urlTemplate(scheme: ShardScheme): string {
  return scheme === "flat"
    ? `${SEQ_DIRECTORY}/{refseq}/`
    : `${SEQ_DIRECTORY}/{chunk_dirpath}/{refseq}-`;
}
