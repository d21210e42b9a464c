/**
 * Core type definitions for reference sequence preparation
 *
 * Sequences arrive from one of several input formats; the two shapes below
 * cover everything those formats can tell us. Streamed sequences carry their
 * bases lazily and learn their length as they are read. Sized sequences come
 * from index or size tables and carry no bases at all.
 */

import { type } from "arktype";

// =============================================================================
// SEQUENCES
// =============================================================================

/**
 * Alphabet of the reference sequences (the track's `seqType`)
 */
export type Alphabet = "dna" | "rna" | "protein";

/**
 * Case-insensitive alphabet validation, normalised to lower case
 */
export const AlphabetSchema = type("string")
  .pipe((value: string) => value.toLowerCase())
  .to("'dna'|'rna'|'protein'");

/**
 * A sequence read from FASTA (or the FASTA block of a GFF3 file)
 *
 * `bases` yields whitespace-free fragments (typically one per input line) and
 * shares the underlying reader: it must be consumed before the next sequence
 * is requested, or its remaining bases are skipped.
 */
export interface StreamedSequence {
  readonly kind: "streamed";
  readonly name: string;
  readonly description?: string;
  /** File the sequence was read from, for error reporting */
  readonly source: string;
  readonly bases: AsyncIterable<string>;
}

/**
 * A sequence known only by name and extent (.fai, 2bit, sizes, sequence-region)
 */
export interface SizedSequence {
  readonly kind: "sized";
  readonly name: string;
  /** 0-based start offset */
  readonly start: number;
  /** 0-based exclusive end */
  readonly end: number;
  readonly length: number;
}

export type RefSequence = StreamedSequence | SizedSequence;

// =============================================================================
// CHUNKS AND PATHS
// =============================================================================

/**
 * Directory layout for chunk files
 *
 * - `hashed`: `seq/{crc}/{crc}/{crc}/{name}-{index}.txt`
 * - `flat`: `seq/{name}/{index}.txt`
 */
export type ShardScheme = "hashed" | "flat";

/**
 * One fixed-size slice of a sequence, as handed to the writer
 */
export interface Chunk {
  readonly sequenceName: string;
  readonly index: number;
  /** 0-based start of the chunk within the sequence */
  readonly start: number;
  /** 0-based exclusive end */
  readonly end: number;
  readonly bases: string;
}

// =============================================================================
// MANIFEST
// =============================================================================

/**
 * Per-sequence manifest entry, serialised into `seq/refSeqs.json`
 */
export interface RefSeqEntry {
  readonly name: string;
  readonly start: number;
  readonly end: number;
  readonly length: number;
  /** Number of chunk files written; absent when no bases were stored */
  readonly chunkCount?: number;
  /** Bases per chunk; absent when no bases were stored */
  readonly seqChunkSize?: number;
  readonly description?: string;
}

/**
 * Schema for entries found in an existing `refSeqs.json`
 */
export const RefSeqEntrySchema = type({
  name: "string>0",
  start: "number>=0",
  end: "number>=0",
  "length?": "number>=0",
  "chunkCount?": "number>=0",
  "seqChunkSize?": "number>0",
  "description?": "string",
});

export const RefSeqListSchema = RefSeqEntrySchema.array();

/**
 * Free-form JSON object supplied by the user and merged into the track
 */
export type JsonObject = Record<string, unknown>;

export const JsonObjectSchema = type("Record<string, unknown>").narrow((value, ctx) => {
  if (Array.isArray(value)) {
    return ctx.reject({ expected: "a JSON object", actual: "an array" });
  }
  return true;
});

/**
 * Reference sequence track configuration for the viewer
 */
export interface TrackConfig {
  readonly label: string;
  readonly key: string;
  readonly type: string;
  readonly category: string;
  readonly storeClass: string;
  readonly urlTemplate: string;
  readonly seqType: string;
  readonly chunkSize?: number;
  readonly compress?: number;
  readonly showReverseStrand?: number;
  readonly showTranslation?: number;
  readonly faiUrlTemplate?: string;
  readonly useAsRefSeqStore?: number;
  readonly [extra: string]: unknown;
}

/**
 * Everything one run produces besides the chunk files
 */
export interface Manifest {
  readonly sequences: readonly RefSeqEntry[];
  /** Absent when sequence bases were not stored */
  readonly track?: TrackConfig;
}

/**
 * Schema for an existing `trackList.json`
 */
export const TrackListSchema = type({
  formatVersion: "number",
  tracks: type({ label: "string", "[string]": "unknown" }).array(),
  "[string]": "unknown",
});

export type TrackList = typeof TrackListSchema.infer;

// =============================================================================
// COMPRESSION AND WRITING
// =============================================================================

export type CompressionFormat = "gzip" | "none";

export const CompressionFormatSchema = type("'gzip'|'none'");

/**
 * Options for writing files
 */
export interface WriteOptions {
  /** Compress the bytes before writing (default: none) */
  readonly compressionFormat?: CompressionFormat;
  /** Compression level 1-9 for gzip (default: 6) */
  readonly compressionLevel?: number;
}
