/**
 * Chromosome sizes reader (`name<whitespace>length` per line)
 */

import { InputFormatError, type InputFormat } from "../errors";
import type { NumberedLine } from "../io/stream-utils";
import type { SizedSequence } from "../types";
import { AbstractParser, type ParserOptions } from "./abstract-parser";

/**
 * Parse one sizes line
 *
 * @throws {InputFormatError} Unless the line is exactly a name and a non-negative integer
 *
 * @example
 * ```typescript
 * parseSizesLine("chr1\t248956422", 1, "hg38.chrom.sizes");
 * // { kind: "sized", name: "chr1", start: 0, end: 248956422, length: 248956422 }
 * ```
 */
export function parseSizesLine(line: string, lineNumber: number, source: string): SizedSequence {
  const fields = line.trim().split(/\s+/);
  const [name, lengthField] = fields;
  if (fields.length !== 2 || name === undefined || lengthField === undefined || !/^\d+$/.test(lengthField)) {
    throw new InputFormatError(
      "Expected two columns: <name> <length>",
      "SIZES",
      source,
      lineNumber,
      line
    );
  }
  const length = Number(lengthField);
  return { kind: "sized", name, start: 0, end: length, length };
}

export class SizesParser extends AbstractParser<SizedSequence> {
  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): InputFormat {
    return "SIZES";
  }

  async *parseLines(
    lines: AsyncIterable<NumberedLine>,
    source: string
  ): AsyncGenerator<SizedSequence> {
    for await (const line of lines) {
      this.throwIfAborted(`reading '${source}'`);
      if (line.text.trim() !== "") {
        yield parseSizesLine(line.text, line.lineNumber, source);
      }
    }
  }
}
