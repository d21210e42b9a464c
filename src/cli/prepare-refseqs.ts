/**
 * `prepare-refseqs` command
 */

import chalk from "chalk";
import { type Command, InvalidArgumentError } from "commander";
import { getErrorSuggestion, RefseqError } from "../errors";
import { DEFAULT_OUT } from "../operations/options";
import { prepareRefseqs } from "../operations/prepare-refseqs";
import type { PrepareOptions, PrepareProgress } from "../operations/types";

/**
 * Flags as commander hands them over
 */
export interface PrepareRefseqsFlags {
  gff?: string;
  fasta?: string[];
  indexed_fasta?: string;
  twobit?: string;
  conf?: string;
  sizes?: string[];
  gffSizes?: string[];
  out: string;
  noSort?: boolean;
  noseq?: boolean;
  refs?: string[];
  compress?: boolean;
  chunksize?: number;
  nohash?: boolean;
  trackLabel?: string;
  key?: string;
  seqType?: string;
  trackConfig?: string;
  concurrency?: number;
  quiet?: boolean;
}

function parsePositiveInteger(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return Number(value);
}

/**
 * Split `--refs` values on commas as well as spaces
 *
 * @example
 * ```typescript
 * splitRefs(["chr1,chr2", "chrM"]) // ["chr1", "chr2", "chrM"]
 * ```
 */
export function splitRefs(values: readonly string[]): string[] {
  return values.flatMap((value) => value.split(",")).map((name) => name.trim()).filter((name) => name !== "");
}

/**
 * Map command-line flags onto library options
 */
export function toPrepareOptions(flags: PrepareRefseqsFlags): PrepareOptions {
  const refs = flags.refs === undefined ? undefined : splitRefs(flags.refs);
  return {
    ...(flags.gff === undefined ? {} : { gff: flags.gff }),
    ...(flags.fasta === undefined ? {} : { fastas: flags.fasta }),
    ...(flags.indexed_fasta === undefined ? {} : { indexedFasta: flags.indexed_fasta }),
    ...(flags.twobit === undefined ? {} : { twobit: flags.twobit }),
    ...(flags.conf === undefined ? {} : { conf: flags.conf }),
    ...(flags.sizes === undefined ? {} : { sizes: flags.sizes }),
    ...(flags.gffSizes === undefined ? {} : { gffSizes: flags.gffSizes }),
    out: flags.out,
    sort: flags.noSort !== true,
    seq: flags.noseq !== true,
    ...(refs === undefined ? {} : { refs }),
    compress: flags.compress === true,
    ...(flags.chunksize === undefined ? {} : { chunkSize: flags.chunksize }),
    hash: flags.nohash !== true,
    ...(flags.trackLabel === undefined ? {} : { trackLabel: flags.trackLabel }),
    ...(flags.key === undefined ? {} : { key: flags.key }),
    ...(flags.seqType === undefined ? {} : { seqType: flags.seqType }),
    ...(flags.trackConfig === undefined ? {} : { trackConfig: flags.trackConfig }),
    ...(flags.concurrency === undefined ? {} : { concurrency: flags.concurrency }),
  };
}

function describeProgress(event: PrepareProgress): string {
  switch (event.type) {
    case "source":
      return `Reading ${event.path}`;
    case "sequence":
      return event.chunkCount === undefined
        ? `  ${event.name}: ${event.length} bp`
        : `  ${event.name}: ${event.length} bp in ${event.chunkCount} chunk${event.chunkCount === 1 ? "" : "s"}`;
    case "manifest":
      return `Wrote ${event.path}`;
  }
}

/**
 * Render any thrown value for the terminal
 */
export function formatCliError(error: unknown): string {
  if (error instanceof RefseqError) {
    const suggestion = getErrorSuggestion(error);
    return suggestion === undefined ? error.toString() : `${error.toString()}\nHint: ${suggestion}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Register the command on a commander program
 */
export function registerPrepareRefseqsCommand(program: Command): void {
  program
    .command("prepare-refseqs")
    .description(
      "Chunk reference sequences into a static store and register the reference sequence track"
    )
    .option("--gff <file>", "GFF3 file with an embedded FASTA section")
    .option("--fasta <files...>", "FASTA files, optionally gzipped (repeatable)")
    .option("--indexed_fasta <file>", "FASTA file indexed with samtools faidx (<file>.fai must exist)")
    .option("--twobit <file>", "UCSC 2bit file")
    .option("--conf <file>", "database configuration file (not implemented)")
    .option("--sizes <files...>", "two-column 'name length' files")
    .option("--gff-sizes <files...>", "GFF3 files with ##sequence-region directives")
    .option("--out <dir>", "output directory", DEFAULT_OUT)
    .option("--noSort", "keep the input order of sequences instead of sorting by name")
    .option("--noseq", "record names and lengths only; write no sequence chunks")
    .option("--refs <names...>", "only process these sequences (comma or space separated)")
    .option("--compress", "gzip each chunk (chunk size is multiplied by 4)")
    .option("--chunksize <bases>", "bases per chunk (default: 20000)", parsePositiveInteger)
    .option("--nohash", "store chunks as seq/<name>/<n>.txt instead of hashed directories")
    .option("--trackLabel <label>", "track label (default: DNA, RNA or the seqType)")
    .option("--key <key>", "displayed track name (default: \"Reference sequence\")")
    .option("--seqType <type>", "sequence alphabet: dna, rna or protein (default: dna)")
    .option("--trackConfig <json>", "JSON object merged into the track configuration")
    .option("--concurrency <n>", "FASTA files processed at once (default: 1)", parsePositiveInteger)
    .option("-q, --quiet", "only report errors")
    .action(async (flags: PrepareRefseqsFlags) => {
      const report = (message: string): void => {
        if (flags.quiet !== true) {
          console.error(chalk.gray(message));
        }
      };

      try {
        const summary = await prepareRefseqs({
          ...toPrepareOptions(flags),
          onWarning: (message) => console.error(chalk.yellow(`Warning: ${message}`)),
          onProgress: (event) => report(describeProgress(event)),
        });
        if (flags.quiet !== true) {
          console.log(
            chalk.green(
              `Prepared ${summary.sequences.length} reference sequence${summary.sequences.length === 1 ? "" : "s"} in ${summary.out}`
            )
          );
        }
      } catch (error) {
        console.error(chalk.red(formatCliError(error)));
        process.exitCode = 1;
      }
    });
}
