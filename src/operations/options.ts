/**
 * Validation and defaulting of prepare-refseqs options
 *
 * Everything here is checked before any file is opened.
 */

import { type } from "arktype";
import { ConfigError } from "../errors";
import { AlphabetSchema, type JsonObject, JsonObjectSchema } from "../types";
import { COMPRESSED_CHUNK_FACTOR, DEFAULT_CHUNK_SIZE } from "./core/chunker";
import { DEFAULT_TRACK_KEY } from "./core/manifest";
import type { PrepareOptions, ResolvedOptions, SequenceSource } from "./types";

export const DEFAULT_OUT = "data/";

const SOURCE_FIELDS = [
  "gff",
  "fastas",
  "indexedFasta",
  "twobit",
  "conf",
  "sizes",
  "gffSizes",
] as const satisfies readonly (keyof PrepareOptions)[];

/**
 * Shape checks; source exclusivity is checked separately
 */
const PrepareOptionsSchema = type({
  "gff?": "string",
  "fastas?": "string[]",
  "indexedFasta?": "string",
  "twobit?": "string",
  "conf?": "string",
  "sizes?": "string[]",
  "gffSizes?": "string[]",
  "out?": "string>0",
  "sort?": "boolean",
  "seq?": "boolean",
  "refs?": "string[]",
  "compress?": "boolean",
  "chunkSize?": "number.integer>0",
  "hash?": "boolean",
  "trackLabel?": "string",
  "key?": "string",
  "seqType?": AlphabetSchema,
  "trackConfig?": "string | object",
  "concurrency?": "number.integer>0",
});

function isGiven(value: string | readonly string[] | undefined): boolean {
  if (value === undefined) return false;
  return typeof value === "string" ? value !== "" : value.length > 0;
}

/**
 * Work out which single source was configured
 *
 * @throws {ConfigError} Unless exactly one source is given, or if it is `conf`
 */
export function resolveSource(options: PrepareOptions): SequenceSource {
  const given = SOURCE_FIELDS.filter((field) => isGiven(options[field]));
  if (given.length !== 1) {
    throw new ConfigError(
      `Must specify one (and only one) of the following sequence sources: ${SOURCE_FIELDS.join(", ")}` +
        (given.length > 1 ? ` (got ${given.join(", ")})` : "")
    );
  }

  const { gff, fastas, indexedFasta, twobit, sizes, gffSizes } = options;
  if (gff !== undefined && gff !== "") return { kind: "gff", path: gff };
  if (fastas !== undefined && fastas.length > 0) return { kind: "fastas", paths: fastas };
  if (indexedFasta !== undefined && indexedFasta !== "") return { kind: "indexedFasta", path: indexedFasta };
  if (twobit !== undefined && twobit !== "") return { kind: "twobit", path: twobit };
  if (sizes !== undefined && sizes.length > 0) return { kind: "sizes", paths: sizes };
  if (gffSizes !== undefined && gffSizes.length > 0) return { kind: "gffSizes", paths: gffSizes };
  throw new ConfigError("The conf source is not implemented", "conf");
}

/**
 * Accept trackConfig as an object or a JSON string
 *
 * @throws {ConfigError} If the string is not JSON or the value is not an object
 */
export function parseTrackConfig(value: string | JsonObject): JsonObject {
  let parsed: unknown = value;
  if (typeof value === "string") {
    try {
      parsed = JSON.parse(value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`trackConfig is not valid JSON: ${reason}`, "trackConfig", value);
    }
  }
  const result = JsonObjectSchema(parsed);
  if (result instanceof type.errors) {
    throw new ConfigError(`trackConfig must be a JSON object: ${result.summary}`, "trackConfig");
  }
  return result;
}

/**
 * Validate options and fill in defaults
 *
 * @throws {ConfigError} On a bad value, a missing or duplicate source, or `conf`
 *
 * @example
 * ```typescript
 * const resolved = resolveOptions({ fastas: ["genome.fa"], compress: true });
 * resolved.chunkSize; // 80000
 * resolved.scheme; // "hashed"
 * ```
 */
export function resolveOptions(options: PrepareOptions): ResolvedOptions {
  const validated = PrepareOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ConfigError(`Invalid options: ${validated.summary}`);
  }

  const source = resolveSource(options);
  const compress = validated.compress ?? false;
  const baseChunkSize = validated.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const seqType = validated.seqType ?? "dna";
  const trackConfig =
    options.trackConfig === undefined ? undefined : parseTrackConfig(options.trackConfig);
  const refs =
    validated.refs === undefined || validated.refs.length === 0 ? undefined : new Set(validated.refs);

  return {
    source,
    out: validated.out ?? DEFAULT_OUT,
    sort: validated.sort ?? true,
    seq: validated.seq ?? true,
    ...(refs === undefined ? {} : { refs }),
    compress,
    chunkSize: compress ? baseChunkSize * COMPRESSED_CHUNK_FACTOR : baseChunkSize,
    scheme: validated.hash === false ? "flat" : "hashed",
    seqType,
    track: {
      ...(validated.trackLabel === undefined || validated.trackLabel === ""
        ? {}
        : { trackLabel: validated.trackLabel }),
      key: validated.key ?? DEFAULT_TRACK_KEY,
      seqType,
      ...(trackConfig === undefined ? {} : { trackConfig }),
    },
    concurrency: validated.concurrency ?? 1,
    onWarning: options.onWarning ?? ((message) => console.warn(`Warning: ${message}`)),
    onProgress: options.onProgress ?? (() => {}),
    ...(options.signal === undefined ? {} : { signal: options.signal }),
  };
}
