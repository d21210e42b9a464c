/**
 * samtools `.fai` index reader
 *
 * An indexed FASTA is served to the viewer as-is; the index only supplies the
 * sequence names and lengths for the manifest.
 *
 * @module formats/fai
 */

import { type } from "arktype";
import { InputFormatError, type InputFormat } from "../errors";
import type { NumberedLine } from "../io/stream-utils";
import type { SizedSequence } from "../types";
import { AbstractParser, type ParserOptions } from "./abstract-parser";

/**
 * One line of a `.fai` index
 */
export interface FaiRecord {
  readonly name: string;
  /** Sequence length in bases */
  readonly length: number;
  /** Byte offset of the first base in the FASTA file */
  readonly offset: number;
  /** Bases per line */
  readonly lineBases: number;
  /** Bytes per line, including the newline */
  readonly lineWidth: number;
}

const FAI_LINE = /^([^\t]+)\t(\d+)\t(\d+)\t(\d+)\t(\d+)$/;

/**
 * Cross-field checks on parsed `.fai` records
 */
const FaiRecordSchema = type({
  name: "string>0",
  length: "number>=0",
  offset: "number>=0",
  lineBases: "number>=0",
  lineWidth: "number>=0",
}).narrow((record, ctx) => {
  if (record.length > 0 && record.lineWidth < record.lineBases) {
    return ctx.reject({
      expected: "lineWidth >= lineBases (lineWidth includes newline bytes)",
      actual: `lineWidth=${record.lineWidth}, lineBases=${record.lineBases}`,
      path: ["lineWidth"],
    });
  }
  return true;
});

/**
 * Parse one `.fai` line
 *
 * @throws {InputFormatError} If the line is not five tab-separated fields or fails validation
 */
export function parseFaiLine(line: string, lineNumber: number, source: string): FaiRecord {
  const match = FAI_LINE.exec(line.trim());
  if (match === null) {
    throw new InputFormatError(
      "Improperly-formatted line (expected 5 tab-separated columns)",
      "FAI",
      source,
      lineNumber,
      line
    );
  }

  const [, name = "", length = "", offset = "", lineBases = "", lineWidth = ""] = match;
  const validated = FaiRecordSchema({
    name,
    length: Number(length),
    offset: Number(offset),
    lineBases: Number(lineBases),
    lineWidth: Number(lineWidth),
  });
  if (validated instanceof type.errors) {
    throw new InputFormatError(
      `Invalid index record: ${validated.summary}`,
      "FAI",
      source,
      lineNumber,
      line
    );
  }
  return validated;
}

/**
 * Reads a `.fai` index as sized sequences
 *
 * @example
 * ```typescript
 * const parser = new FaiParser();
 * for await (const sequence of parser.parseFile("genome.fa.fai")) {
 *   console.log(`${sequence.name}: ${sequence.length}`);
 * }
 * ```
 */
export class FaiParser extends AbstractParser<SizedSequence> {
  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): InputFormat {
    return "FAI";
  }

  async *parseLines(
    lines: AsyncIterable<NumberedLine>,
    source: string
  ): AsyncGenerator<SizedSequence> {
    for await (const line of lines) {
      this.throwIfAborted(`reading '${source}'`);
      if (line.text.trim() === "") {
        continue;
      }
      const record = parseFaiLine(line.text, line.lineNumber, source);
      yield { kind: "sized", name: record.name, start: 0, end: record.length, length: record.length };
    }
  }
}
