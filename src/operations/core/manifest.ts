/**
 * Manifest assembly: per-sequence entries and the reference sequence track
 *
 * The builder is the single owner of sequence entries for a run. Readers and
 * chunk workers hand it finished records; ordering is only applied when the
 * manifest is built, since streamed sources cannot be reordered without
 * buffering their bases.
 */

import { type } from "arktype";
import { InputFormatError, type InputFormat } from "../../errors";
import {
  type Alphabet,
  type JsonObject,
  type Manifest,
  type RefSeqEntry,
  RefSeqListSchema,
  type ShardScheme,
  type TrackConfig,
  type TrackList,
  TrackListSchema,
} from "../../types";
import { SEQ_DIRECTORY, urlTemplate } from "./sharding";

export const DEFAULT_TRACK_KEY = "Reference sequence";
export const TRACK_CATEGORY = "Reference sequence";
export const TRACK_LIST_FORMAT_VERSION = 1;

export const STORE_CLASSES = {
  chunked: "JBrowse/Store/Sequence/StaticChunked",
  indexedFasta: "JBrowse/Store/Sequence/IndexedFasta",
  twobit: "JBrowse/Store/Sequence/TwoBit",
} as const;

/**
 * Where the track's bases are served from
 */
export type TrackStore =
  | {
      readonly kind: "chunked";
      readonly scheme: ShardScheme;
      readonly chunkSize: number;
      readonly compress: boolean;
    }
  | { readonly kind: "indexedFasta"; readonly fileName: string }
  | { readonly kind: "twobit"; readonly fileName: string };

/**
 * Track fields the user can set
 */
export interface TrackOptions {
  readonly trackLabel?: string;
  readonly key: string;
  readonly seqType: Alphabet;
  readonly trackConfig?: JsonObject;
}

/**
 * Accumulates one entry per reference sequence
 *
 * @example
 * ```typescript
 * const builder = new ManifestBuilder();
 * builder.add({ name: "chr2", start: 0, end: 5000, length: 5000 }, "SIZES", "genome.sizes");
 * builder.add({ name: "chr1", start: 0, end: 25000, length: 25000 }, "SIZES", "genome.sizes");
 * builder.build({ sort: true }).sequences.map((s) => s.name); // ["chr1", "chr2"]
 * ```
 */
export class ManifestBuilder {
  private readonly entries = new Map<string, RefSeqEntry>();

  /**
   * Record a finished sequence
   *
   * @throws {InputFormatError} If a sequence with the same name was already recorded
   */
  add(entry: RefSeqEntry, format: InputFormat, source?: string): void {
    if (this.entries.has(entry.name)) {
      throw new InputFormatError(`Duplicate reference sequence name '${entry.name}'`, format, source);
    }
    this.entries.set(entry.name, entry);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Produce the manifest
   *
   * @param options.sort - Alphabetical by name when true, first-seen order otherwise
   * @param options.track - Track configuration; omit when no bases were stored
   */
  build(options: { sort: boolean; track?: TrackConfig }): Manifest {
    const sequences = [...this.entries.values()];
    if (options.sort) {
      sequences.sort((a, b) => compareNames(a.name, b.name));
    }
    return options.track === undefined ? { sequences } : { sequences, track: options.track };
  }
}

/**
 * Code-unit order, matching how the names sort in any other tool
 */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Default label: `DNA`/`RNA` upper-cased, other alphabets as-is
 */
export function defaultTrackLabel(seqType: Alphabet): string {
  return seqType === "dna" || seqType === "rna" ? seqType.toUpperCase() : seqType;
}

/**
 * Assemble the reference sequence track
 *
 * User `trackConfig` keys override the chunked-store defaults. Indexed FASTA
 * and 2bit stores then fix the store class and URLs, since the viewer cannot
 * read those files any other way.
 *
 * @example
 * ```typescript
 * buildTrackConfig(
 *   { kind: "chunked", scheme: "flat", chunkSize: 20000, compress: false },
 *   { key: "Reference sequence", seqType: "dna" }
 * );
 * // { label: "DNA", key: "Reference sequence", type: "SequenceTrack", ...,
 * //   chunkSize: 20000, urlTemplate: "seq/{refseq}/", seqType: "dna" }
 * ```
 */
export function buildTrackConfig(store: TrackStore, options: TrackOptions): TrackConfig {
  const { seqType } = options;
  const chunked = store.kind === "chunked" ? store : undefined;

  const defaults: TrackConfig = {
    label: options.trackLabel ?? defaultTrackLabel(seqType),
    key: options.key,
    type: "SequenceTrack",
    category: TRACK_CATEGORY,
    storeClass: STORE_CLASSES.chunked,
    ...(chunked === undefined ? {} : { chunkSize: chunked.chunkSize }),
    urlTemplate: urlTemplate(chunked?.scheme ?? "hashed"),
    seqType,
    ...(chunked?.compress === true ? { compress: 1 } : {}),
    ...(seqType === "dna" ? {} : { showReverseStrand: 0 }),
    ...(seqType === "protein" ? { showTranslation: 0 } : {}),
  };
  const merged: TrackConfig = { ...defaults, ...options.trackConfig, label: labelOf(defaults, options) };

  switch (store.kind) {
    case "chunked":
      return merged;
    case "indexedFasta": {
      const url = `${SEQ_DIRECTORY}/${store.fileName}`;
      return {
        ...withoutChunkSize(merged),
        storeClass: STORE_CLASSES.indexedFasta,
        urlTemplate: url,
        faiUrlTemplate: `${url}.fai`,
        useAsRefSeqStore: 1,
      };
    }
    case "twobit":
      return {
        ...withoutChunkSize(merged),
        storeClass: STORE_CLASSES.twobit,
        urlTemplate: `${SEQ_DIRECTORY}/${store.fileName}`,
        useAsRefSeqStore: 1,
      };
  }
}

/**
 * A string `label` in the user's trackConfig replaces the default one
 */
function labelOf(defaults: TrackConfig, options: TrackOptions): string {
  const label = options.trackConfig?.["label"];
  return typeof label === "string" && label !== "" ? label : defaults.label;
}

function withoutChunkSize(track: TrackConfig): TrackConfig {
  const { chunkSize: _chunkSize, ...rest } = track;
  return rest;
}

// =============================================================================
// MERGING WITH AN EXISTING OUTPUT DIRECTORY
// =============================================================================

/**
 * Validate the contents of an existing `refSeqs.json`
 *
 * Entries written by older tools may lack `length`; it is derived from the
 * extent.
 *
 * @throws {InputFormatError} If the JSON is not a list of sequence entries
 */
export function parseRefSeqList(text: string, source: string): RefSeqEntry[] {
  const result = RefSeqListSchema(parseJson(text, source));
  if (result instanceof type.errors) {
    throw new InputFormatError(`Invalid reference sequence list: ${result.summary}`, "JSON", source);
  }
  return result.map((entry) => ({
    ...entry,
    length: entry.length ?? entry.end - entry.start,
  }));
}

/**
 * Validate the contents of an existing `trackList.json`
 *
 * @throws {InputFormatError} If the JSON lacks `formatVersion` or `tracks`
 */
export function parseTrackList(text: string, source: string): TrackList {
  const result = TrackListSchema(parseJson(text, source));
  if (result instanceof type.errors) {
    throw new InputFormatError(`Invalid track list: ${result.summary}`, "JSON", source);
  }
  return result;
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputFormatError(`Invalid JSON (${reason})`, "JSON", source);
  }
}

/**
 * Combine entries already on disk with the ones from this run
 *
 * Existing entries whose names were processed again are dropped; the rest
 * keep their order ahead of the new entries.
 */
export function mergeRefSeqs(
  existing: readonly RefSeqEntry[],
  fresh: readonly RefSeqEntry[]
): RefSeqEntry[] {
  const replaced = new Set(fresh.map((entry) => entry.name));
  return [...existing.filter((entry) => !replaced.has(entry.name)), ...fresh];
}

/**
 * Put the track into an existing track list, replacing one with the same label
 */
export function mergeTrackList(existing: TrackList | undefined, track: TrackConfig): TrackList {
  if (existing === undefined) {
    return { formatVersion: TRACK_LIST_FORMAT_VERSION, tracks: [track] };
  }
  const index = existing.tracks.findIndex((candidate) => candidate.label === track.label);
  const tracks =
    index === -1
      ? [...existing.tracks, track]
      : existing.tracks.map((candidate, i) => (i === index ? track : candidate));
  return { ...existing, tracks };
}
