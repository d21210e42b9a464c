/**
 * GFF3 readers for reference sequence data
 *
 * Two pieces of a GFF3 file matter here: the FASTA block at the end (either
 * after a `##FASTA` directive or starting implicitly at the first `>` line),
 * and `##sequence-region` directives that give sequence extents without
 * bases. Feature lines are skipped.
 */

import { InputFormatError, type InputFormat } from "../errors";
import type { FileReaderOptions } from "../io/file-reader";
import type { NumberedLine } from "../io/stream-utils";
import type { SizedSequence, StreamedSequence } from "../types";
import { AbstractParser, type ParserOptions } from "./abstract-parser";
import { DEFAULT_MAX_LINE_LENGTH, FastaParser, type FastaParserOptions, isFastaHeader } from "./fasta";

const FASTA_DIRECTIVE = /^##FASTA\s*$/i;
const SEQUENCE_REGION = /^##sequence-region\s/;

/**
 * Lines of the embedded FASTA block, or nothing when there is none
 *
 * Only the start of a line can open the block when lines arrive in pieces.
 *
 * @param lines - All lines of the GFF3 file
 * @param onMissing - Called when the file ends without a sequence block
 */
export async function* embeddedFastaLines(
  lines: AsyncIterable<NumberedLine>,
  onMissing: () => void = () => {}
): AsyncGenerator<NumberedLine> {
  let inFasta = false;
  let lineStart = true;
  for await (const line of lines) {
    if (inFasta) {
      yield line;
    } else if (lineStart && FASTA_DIRECTIVE.test(line.text)) {
      inFasta = true;
    } else if (lineStart && isFastaHeader(line.text)) {
      inFasta = true;
      yield line;
    }
    lineStart = line.continues !== true;
  }
  if (!inFasta) {
    onMissing();
  }
}

/**
 * Reads the sequences embedded in a GFF3 file
 *
 * @example
 * ```typescript
 * const parser = new GffFastaParser();
 * for await (const sequence of parser.parseFile("annotations.gff3")) {
 *   console.log(sequence.name);
 * }
 * ```
 */
export class GffFastaParser extends AbstractParser<StreamedSequence, FastaParserOptions> {
  private readonly fasta: FastaParser;

  constructor(options: FastaParserOptions = {}) {
    super(options);
    this.fasta = new FastaParser(this.options);
  }

  protected getFormatName(): InputFormat {
    return "GFF";
  }

  protected override getReaderOptions(): FileReaderOptions {
    return { maxLineLength: this.options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH };
  }

  async *parseLines(
    lines: AsyncIterable<NumberedLine>,
    source: string
  ): AsyncGenerator<StreamedSequence> {
    const block = embeddedFastaLines(lines, () => {
      this.options.onWarning(`'${source}' contains no embedded FASTA section`);
    });
    yield* this.fasta.parseLines(block, source);
  }
}

/**
 * Parse one `##sequence-region name start end` directive
 *
 * Start and end are 1-based inclusive in GFF3; the result is 0-based
 * half-open.
 *
 * @throws {InputFormatError} If the directive is malformed
 *
 * @example
 * ```typescript
 * parseSequenceRegion("##sequence-region ctgA 1 50001", 3, "volvox.gff3");
 * // { kind: "sized", name: "ctgA", start: 0, end: 50001, length: 50001 }
 * ```
 */
export function parseSequenceRegion(line: string, lineNumber: number, source: string): SizedSequence {
  const fields = line.trim().split(/\s+/);
  const [, name, startField, endField] = fields;
  const start = Number(startField);
  const end = Number(endField);

  if (
    fields.length !== 4 ||
    name === undefined ||
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 1 ||
    end < start - 1
  ) {
    throw new InputFormatError(
      "Malformed ##sequence-region directive (expected '##sequence-region <name> <start> <end>')",
      "GFF",
      source,
      lineNumber,
      line
    );
  }

  return { kind: "sized", name, start: start - 1, end, length: end - (start - 1) };
}

/**
 * Reads `##sequence-region` directives from GFF3 files
 */
export class SequenceRegionParser extends AbstractParser<SizedSequence> {
  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): InputFormat {
    return "GFF";
  }

  async *parseLines(
    lines: AsyncIterable<NumberedLine>,
    source: string
  ): AsyncGenerator<SizedSequence> {
    for await (const line of lines) {
      this.throwIfAborted(`reading '${source}'`);
      if (SEQUENCE_REGION.test(line.text)) {
        yield parseSequenceRegion(line.text, line.lineNumber, source);
      }
    }
  }
}
