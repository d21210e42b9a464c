/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { FastaParser, FaiParser, readTwoBitSequences } from "../formats";
 * ```
 */

export { AbstractParser, type ParserOptions } from "./abstract-parser";
export { FaiParser, type FaiRecord, parseFaiLine } from "./fai";
export {
  cleanSequenceLine,
  DEFAULT_MAX_LINE_LENGTH,
  FastaParser,
  type FastaParserOptions,
  isFastaHeader,
  parseFastaHeader,
} from "./fasta";
export {
  embeddedFastaLines,
  GffFastaParser,
  parseSequenceRegion,
  SequenceRegionParser,
} from "./gff";
export { parseSizesLine, SizesParser } from "./sizes";
export {
  detectEndianness,
  parseIndex as parseTwoBitIndex,
  readTwoBitSequences,
  TWOBIT_SIGNATURE,
  type TwoBitIndexEntry,
} from "./twobit";
