/**
 * Source dispatch: one reader per source kind
 */

import { ConfigError, type InputFormat } from "../errors";
import {
  FaiParser,
  FastaParser,
  GffFastaParser,
  type ParserOptions,
  readTwoBitSequences,
  SequenceRegionParser,
  SizesParser,
} from "../formats";
import { exists } from "../io/file-reader";
import type { RefSequence } from "../types";
import type { SequenceSource, SequenceSourceKind } from "./types";

const SOURCE_FORMATS: Record<SequenceSourceKind, InputFormat> = {
  gff: "GFF",
  fastas: "FASTA",
  indexedFasta: "FAI",
  twobit: "2BIT",
  sizes: "SIZES",
  gffSizes: "GFF",
};

/**
 * Format reported in errors about sequences from this source
 */
export function sourceFormat(kind: SequenceSourceKind): InputFormat {
  return SOURCE_FORMATS[kind];
}

/**
 * Input files of a source, in the order they are read
 */
export function sourceFiles(source: SequenceSource): readonly string[] {
  switch (source.kind) {
    case "gff":
    case "indexedFasta":
    case "twobit":
      return [source.path];
    case "fastas":
    case "sizes":
    case "gffSizes":
      return source.paths;
  }
}

/**
 * Path of the samtools index belonging to an indexed FASTA
 */
export function faiPath(fastaPath: string): string {
  return `${fastaPath}.fai`;
}

/**
 * Check that an indexed FASTA comes with its index
 *
 * @throws {ConfigError} If `<file>.fai` does not exist
 */
export async function requireFaiIndex(fastaPath: string): Promise<void> {
  const index = faiPath(fastaPath);
  if (!(await exists(index))) {
    throw new ConfigError(
      `Indexed FASTA '${fastaPath}' has no index; expected '${index}' (create it with 'samtools faidx')`,
      "indexedFasta"
    );
  }
}

/**
 * Read the sequences of one input file of a source
 *
 * For an indexed FASTA the index is read, not the FASTA itself.
 */
export async function* readSourceFile(
  kind: SequenceSourceKind,
  path: string,
  options: ParserOptions = {}
): AsyncGenerator<RefSequence> {
  switch (kind) {
    case "fastas":
      yield* new FastaParser(options).parseFile(path);
      return;
    case "gff":
      yield* new GffFastaParser(options).parseFile(path);
      return;
    case "indexedFasta":
      yield* new FaiParser(options).parseFile(faiPath(path));
      return;
    case "twobit":
      yield* await readTwoBitSequences(path);
      return;
    case "sizes":
      yield* new SizesParser(options).parseFile(path);
      return;
    case "gffSizes":
      yield* new SequenceRegionParser(options).parseFile(path);
      return;
  }
}
