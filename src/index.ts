/**
 * refseq-prep: reference sequence preparation for static genome browser hosting
 *
 * @example
 * ```typescript
 * import { prepareRefseqs } from "refseq-prep";
 *
 * await prepareRefseqs({ fastas: ["genome.fa.gz"], out: "data/", compress: true });
 * ```
 */

export * from "./compression";
export {
  CompressionError,
  ConfigError,
  getErrorSuggestion,
  InputFormatError,
  type InputFormat,
  IOError,
  type IOOperation,
  NotFoundError,
  RefseqError,
} from "./errors";
export * from "./formats";
export { chunkBases, chunkCount, countBases, DEFAULT_CHUNK_SIZE } from "./operations/core/chunker";
export { crc32, crc32Hex } from "./operations/core/hashing";
export { precompressionHtaccess } from "./operations/core/htaccess";
export {
  buildTrackConfig,
  ManifestBuilder,
  mergeRefSeqs,
  mergeTrackList,
  type TrackOptions,
  type TrackStore,
} from "./operations/core/manifest";
export { hashDirectories, shardPath, urlTemplate } from "./operations/core/sharding";
export { resolveOptions } from "./operations/options";
export { prepareRefseqs } from "./operations/prepare-refseqs";
export type {
  PrepareOptions,
  PrepareProgress,
  PrepareSummary,
  ResolvedOptions,
  SequenceSource,
} from "./operations/types";
export type {
  Alphabet,
  Chunk,
  Manifest,
  RefSeqEntry,
  RefSequence,
  ShardScheme,
  SizedSequence,
  StreamedSequence,
  TrackConfig,
} from "./types";
