/**
 * prepare-refseqs: turn reference sequences into a static, chunked store
 *
 * Reads the one configured source, splits streamed bases into fixed-size
 * chunk files under `{out}/seq/`, and writes the manifest (`seq/refSeqs.json`)
 * and the reference sequence track (`trackList.json`). Existing manifests in
 * the output directory are merged rather than overwritten.
 *
 * @example
 * ```typescript
 * const summary = await prepareRefseqs({ fastas: ["volvox.fa"], out: "data/" });
 * console.log(`${summary.sequences.length} sequences, ${summary.chunksWritten} chunks`);
 * ```
 */

import { basename, join } from "node:path";
import { Effect } from "effect";
import { type InputFormat, InputFormatError, NotFoundError } from "../errors";
import type { ParserOptions } from "../formats";
import { exists, readToString } from "../io/file-reader";
import { copyFile, touch, writeBytes, writeJsonAtomic, writeStringAtomic } from "../io/file-writer";
import { unwrapExit } from "../io/runtime";
import type { RefSeqEntry, RefSequence, StreamedSequence } from "../types";
import { chunkBases, countBases } from "./core/chunker";
import { HTACCESS_FILE, precompressionHtaccess } from "./core/htaccess";
import {
  buildTrackConfig,
  ManifestBuilder,
  mergeRefSeqs,
  mergeTrackList,
  parseRefSeqList,
  parseTrackList,
  type TrackStore,
} from "./core/manifest";
import { SEQ_DIRECTORY, shardPath } from "./core/sharding";
import { resolveOptions } from "./options";
import { faiPath, readSourceFile, requireFaiIndex, sourceFiles, sourceFormat } from "./sources";
import type { PrepareOptions, PrepareSummary, ResolvedOptions } from "./types";

export const REFSEQS_FILE = "refSeqs.json";
export const TRACK_LIST_FILE = "trackList.json";
export const TRACKS_CONF_FILE = "tracks.conf";

/**
 * Everything one input file contributed
 */
interface FileResult {
  readonly path: string;
  readonly format: InputFormat;
  readonly entries: readonly RefSeqEntry[];
  readonly chunksWritten: number;
}

/**
 * Prepare reference sequences for the viewer
 *
 * @throws {ConfigError} On invalid options, before any file is read
 * @throws {InputFormatError} On malformed input or a duplicate sequence name
 * @throws {NotFoundError} If `refs` names sequences the input does not have; no manifest is written
 * @throws {IOError} On filesystem failures
 * @throws {CompressionError} If a chunk cannot be compressed
 */
export async function prepareRefseqs(options: PrepareOptions): Promise<PrepareSummary> {
  const resolved = resolveOptions(options);
  const { source } = resolved;

  if (source.kind === "indexedFasta") {
    await requireFaiIndex(source.path);
  }

  const results = await processFiles(sourceFiles(source), resolved);

  const builder = new ManifestBuilder();
  for (const result of results) {
    for (const entry of result.entries) {
      builder.add(entry, result.format, result.path);
    }
  }

  if (resolved.refs !== undefined) {
    const missing = [...resolved.refs].filter((name) => !builder.has(name));
    if (missing.length > 0) {
      throw new NotFoundError(missing);
    }
  }

  const seqDirectory = join(resolved.out, SEQ_DIRECTORY);
  const copiedFiles: string[] = [];
  let store: TrackStore = {
    kind: "chunked",
    scheme: resolved.scheme,
    chunkSize: resolved.chunkSize,
    compress: resolved.compress,
  };

  if (source.kind === "indexedFasta") {
    for (const file of [source.path, faiPath(source.path)]) {
      await copyFile(file, join(seqDirectory, basename(file)));
      copiedFiles.push(file);
    }
    store = { kind: "indexedFasta", fileName: basename(source.path) };
  } else if (source.kind === "twobit") {
    await copyFile(source.path, join(seqDirectory, basename(source.path)));
    copiedFiles.push(source.path);
    store = { kind: "twobit", fileName: basename(source.path) };
  }

  const track = resolved.seq ? buildTrackConfig(store, resolved.track) : undefined;
  const manifest = builder.build({ sort: resolved.sort, ...(track === undefined ? {} : { track }) });

  const refSeqsPath = join(seqDirectory, REFSEQS_FILE);
  const existingRefSeqs = await readExisting(refSeqsPath, parseRefSeqList);
  await writeJsonAtomic(refSeqsPath, mergeRefSeqs(existingRefSeqs ?? [], manifest.sequences));
  resolved.onProgress({ type: "manifest", path: refSeqsPath });

  if (manifest.track !== undefined) {
    await touch(join(resolved.out, TRACKS_CONF_FILE));
    const trackListPath = join(resolved.out, TRACK_LIST_FILE);
    const existingTrackList = await readExisting(trackListPath, parseTrackList);
    await writeJsonAtomic(trackListPath, mergeTrackList(existingTrackList, manifest.track));
    resolved.onProgress({ type: "manifest", path: trackListPath });
  }

  if (resolved.compress) {
    const htaccess = precompressionHtaccess();
    await writeStringAtomic(join(resolved.out, HTACCESS_FILE), htaccess);
    await writeStringAtomic(join(seqDirectory, HTACCESS_FILE), htaccess);
  }

  return {
    out: resolved.out,
    sequences: manifest.sequences,
    ...(manifest.track === undefined ? {} : { track: manifest.track }),
    chunksWritten: results.reduce((total, result) => total + result.chunksWritten, 0),
    copiedFiles,
  };
}

/**
 * Read every input file, several FASTA files at a time when asked
 *
 * Results come back in input order whatever the concurrency. Sequence names
 * are claimed as their headers are read, so a repeated name fails before any
 * of its chunks overwrite those of the first. When one file fails, the others
 * stop at their next sequence or chunk.
 */
async function processFiles(
  paths: readonly string[],
  resolved: ResolvedOptions
): Promise<FileResult[]> {
  const concurrency = resolved.source.kind === "fastas" ? resolved.concurrency : 1;
  const claimed = new Set<string>();
  const program = Effect.forEach(
    paths,
    (path) =>
      Effect.tryPromise({
        try: (interrupted) => processFile(path, resolved, claimed, interrupted),
        catch: (error) => error,
      }),
    { concurrency }
  );
  return unwrapExit(await Effect.runPromiseExit(program));
}

async function processFile(
  path: string,
  resolved: ResolvedOptions,
  claimed: Set<string>,
  interrupted: AbortSignal
): Promise<FileResult> {
  resolved.onProgress({ type: "source", path });
  const parserOptions: ParserOptions = {
    onWarning: (warning, lineNumber) =>
      resolved.onWarning(lineNumber === undefined ? warning : `${warning} (line ${lineNumber})`),
    ...(resolved.signal === undefined ? {} : { signal: resolved.signal }),
  };

  const format = sourceFormat(resolved.source.kind);
  const entries: RefSeqEntry[] = [];
  let chunksWritten = 0;

  for await (const sequence of readSourceFile(resolved.source.kind, path, parserOptions)) {
    interrupted.throwIfAborted();
    if (resolved.refs !== undefined && !resolved.refs.has(sequence.name)) {
      continue;
    }
    if (claimed.has(sequence.name)) {
      throw new InputFormatError(`Duplicate reference sequence name '${sequence.name}'`, format, path);
    }
    claimed.add(sequence.name);
    const { entry, chunks } = await recordSequence(sequence, resolved, interrupted);
    entries.push(entry);
    chunksWritten += chunks;
    resolved.onProgress({
      type: "sequence",
      name: entry.name,
      length: entry.length,
      ...(entry.chunkCount === undefined ? {} : { chunkCount: entry.chunkCount }),
    });
  }

  return { path, format, entries, chunksWritten };
}

async function recordSequence(
  sequence: RefSequence,
  resolved: ResolvedOptions,
  interrupted: AbortSignal
): Promise<{ entry: RefSeqEntry; chunks: number }> {
  if (sequence.kind === "sized") {
    const { name, start, end, length } = sequence;
    return { entry: { name, start, end, length }, chunks: 0 };
  }

  const description = sequence.description === undefined ? {} : { description: sequence.description };
  if (!resolved.seq) {
    const length = await countBases(sequence.bases);
    return { entry: { name: sequence.name, start: 0, end: length, length, ...description }, chunks: 0 };
  }

  const { length, chunks } = await writeChunks(sequence, resolved, interrupted);
  return {
    entry: {
      name: sequence.name,
      start: 0,
      end: length,
      length,
      chunkCount: chunks,
      seqChunkSize: resolved.chunkSize,
      ...description,
    },
    chunks,
  };
}

/**
 * Write one sequence's chunk files
 */
async function writeChunks(
  sequence: StreamedSequence,
  resolved: ResolvedOptions,
  interrupted: AbortSignal
): Promise<{ length: number; chunks: number }> {
  const encoder = new TextEncoder();
  let length = 0;
  let chunks = 0;

  for await (const chunk of chunkBases(sequence.name, sequence.bases, resolved.chunkSize)) {
    interrupted.throwIfAborted();
    const relativePath = shardPath(chunk.sequenceName, chunk.index, resolved.scheme, resolved.compress);
    await writeBytes(join(resolved.out, relativePath), encoder.encode(chunk.bases), {
      compressionFormat: resolved.compress ? "gzip" : "none",
    });
    length = chunk.end;
    chunks++;
  }

  return { length, chunks };
}

/**
 * Parse a manifest left by an earlier run, if there is one
 */
async function readExisting<T>(
  path: string,
  parse: (text: string, source: string) => T
): Promise<T | undefined> {
  if (!(await exists(path))) {
    return undefined;
  }
  const text = await readToString(path);
  return text.trim() === "" ? undefined : parse(text, path);
}
