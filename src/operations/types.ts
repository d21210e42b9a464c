/**
 * Options and results of the prepare-refseqs operation
 */

import type { Alphabet, JsonObject, RefSeqEntry, ShardScheme, TrackConfig } from "../types";
import type { TrackOptions } from "./core/manifest";

/**
 * Options accepted by `prepareRefseqs`
 *
 * Exactly one of the source fields must be given.
 */
export interface PrepareOptions {
  /** GFF3 file with an embedded FASTA section */
  gff?: string;
  /** FASTA files, optionally gzipped (`.gz`/`.gzip`) */
  fastas?: readonly string[];
  /** FASTA file with a samtools index at `<file>.fai` */
  indexedFasta?: string;
  /** UCSC 2bit file */
  twobit?: string;
  /** Database configuration file; not supported */
  conf?: string;
  /** Two-column `name length` files */
  sizes?: readonly string[];
  /** GFF3 files with `##sequence-region` directives */
  gffSizes?: readonly string[];

  /** Output directory (default: `data/`) */
  out?: string;
  /** Sort sequences by name (default: true); otherwise keep input order */
  sort?: boolean;
  /** Store sequence bases (default: true); otherwise only names and lengths */
  seq?: boolean;
  /** Only process these sequence names */
  refs?: readonly string[];
  /** Gzip each chunk (default: false) */
  compress?: boolean;
  /** Bases per chunk before the compression factor (default: 20000) */
  chunkSize?: number;
  /** Hash-bucketed chunk directories (default: true); otherwise one directory per sequence */
  hash?: boolean;
  /** Track label (default: derived from `seqType`) */
  trackLabel?: string;
  /** Track display name (default: "Reference sequence") */
  key?: string;
  /** Sequence alphabet, case-insensitive (default: "dna") */
  seqType?: string;
  /** Extra track configuration, as an object or a JSON string */
  trackConfig?: string | JsonObject;
  /** FASTA files processed at once (default: 1) */
  concurrency?: number;

  /** Called for recoverable oddities in the input (default: console.warn) */
  onWarning?: (message: string) => void;
  /** Called as sources and sequences are finished */
  onProgress?: (event: PrepareProgress) => void;
  /** Cancels reading between lines */
  signal?: AbortSignal;
}

/**
 * The configured sequence source
 */
export type SequenceSource =
  | { readonly kind: "gff"; readonly path: string }
  | { readonly kind: "fastas"; readonly paths: readonly string[] }
  | { readonly kind: "indexedFasta"; readonly path: string }
  | { readonly kind: "twobit"; readonly path: string }
  | { readonly kind: "sizes"; readonly paths: readonly string[] }
  | { readonly kind: "gffSizes"; readonly paths: readonly string[] };

export type SequenceSourceKind = SequenceSource["kind"];

/**
 * Options after validation and defaulting
 */
export interface ResolvedOptions {
  readonly source: SequenceSource;
  readonly out: string;
  readonly sort: boolean;
  readonly seq: boolean;
  readonly refs?: ReadonlySet<string>;
  readonly compress: boolean;
  /** Effective chunk size, compression factor applied */
  readonly chunkSize: number;
  readonly scheme: ShardScheme;
  readonly seqType: Alphabet;
  readonly track: TrackOptions;
  readonly concurrency: number;
  readonly onWarning: (message: string) => void;
  readonly onProgress: (event: PrepareProgress) => void;
  readonly signal?: AbortSignal;
}

/**
 * Progress notifications
 */
export type PrepareProgress =
  | { readonly type: "source"; readonly path: string }
  | {
      readonly type: "sequence";
      readonly name: string;
      readonly length: number;
      readonly chunkCount?: number;
    }
  | { readonly type: "manifest"; readonly path: string };

/**
 * What a run wrote
 */
export interface PrepareSummary {
  readonly out: string;
  /** Entries produced by this run, in manifest order */
  readonly sequences: readonly RefSeqEntry[];
  readonly track?: TrackConfig;
  readonly chunksWritten: number;
  /** Input files copied into `{out}/seq/` */
  readonly copiedFiles: readonly string[];
}
