/**
 * Streaming FASTA reader
 *
 * Sequences are handed out as soon as their header is read; their bases are
 * pulled from the same line stream on demand, so a multi-gigabase chromosome
 * is never held in memory. Handles wrapped and unwrapped sequences, blank
 * lines, CRLF endings and stray whitespace inside sequence lines. Files are
 * read in line pieces of at most `maxLineLength` characters, so a chromosome
 * written on a single line is streamed like a wrapped one.
 */

import { InputFormatError, type InputFormat } from "../errors";
import type { FileReaderOptions } from "../io/file-reader";
import type { NumberedLine } from "../io/stream-utils";
import type { StreamedSequence } from "../types";
import { AbstractParser, type ParserOptions } from "./abstract-parser";

const FASTA_HEADER = /^\s*>\s*(\S*)\s*(.*)$/;

/**
 * Default longest piece of a line read at once
 */
export const DEFAULT_MAX_LINE_LENGTH = 65_536;

/**
 * FASTA reader options
 */
export interface FastaParserOptions extends ParserOptions {
  /** Longest piece of a line read at once (default: 65536) */
  readonly maxLineLength?: number;
}

/**
 * Check whether a line is a FASTA header
 */
export function isFastaHeader(line: string): boolean {
  return line.trimStart().startsWith(">");
}

/**
 * Parse a FASTA header into its name and description
 *
 * The name is the first whitespace-delimited token after `>`; whatever
 * follows is the description.
 *
 * Names become chunk file paths, so a name containing `/` or `\`, or one
 * that is `.` or `..`, is rejected.
 *
 * @throws {InputFormatError} If the header has no usable name
 *
 * @example
 * ```typescript
 * parseFastaHeader(">chr1 Homo sapiens chromosome 1", 1, "hg.fa");
 * // { name: "chr1", description: "Homo sapiens chromosome 1" }
 * ```
 */
export function parseFastaHeader(
  line: string,
  lineNumber: number,
  source: string
): { name: string; description?: string } {
  const match = FASTA_HEADER.exec(line);
  const name = match?.[1] ?? "";
  if (name === "") {
    throw new InputFormatError("FASTA header without a sequence name", "FASTA", source, lineNumber);
  }
  if (/[/\\]/.test(name) || name === "." || name === "..") {
    throw new InputFormatError(
      `Sequence name '${name}' is not usable as a file name`,
      "FASTA",
      source,
      lineNumber
    );
  }
  const description = (match?.[2] ?? "").trim();
  return description === "" ? { name } : { name, description };
}

/**
 * Remove all whitespace from a sequence line
 */
export function cleanSequenceLine(line: string): string {
  return line.replace(/\s+/g, "");
}

/**
 * Drain an async generator to completion
 */
async function drain(generator: AsyncGenerator<unknown>): Promise<void> {
  let step = await generator.next();
  while (step.done !== true) {
    step = await generator.next();
  }
}

/**
 * Streaming FASTA parser
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const sequence of parser.parseFile("genome.fa.gz")) {
 *   let length = 0;
 *   for await (const bases of sequence.bases) length += bases.length;
 *   console.log(`${sequence.name}: ${length} bp`);
 * }
 * ```
 */
export class FastaParser extends AbstractParser<StreamedSequence, FastaParserOptions> {
  constructor(options: FastaParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): InputFormat {
    return "FASTA";
  }

  protected override getReaderOptions(): FileReaderOptions {
    return { maxLineLength: this.options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH };
  }

  /**
   * Parse FASTA sequences from numbered lines
   *
   * Each yielded sequence's `bases` must be read before asking for the next
   * sequence; anything left unread is skipped.
   *
   * @throws {InputFormatError} On sequence data before the first header or a nameless header
   */
  async *parseLines(
    lines: AsyncIterable<NumberedLine>,
    source: string
  ): AsyncGenerator<StreamedSequence> {
    const cursor = new LineCursor(lines[Symbol.asyncIterator]());
    let current: AsyncGenerator<string> | undefined;

    try {
      while (true) {
        if (current !== undefined) {
          await drain(current);
          current = undefined;
        }

        const header = await this.nextHeader(cursor, source);
        if (header === undefined) {
          return;
        }
        this.throwIfAborted(`reading '${source}'`);

        const { name, description } = parseFastaHeader(header.text, header.lineNumber, source);
        current = this.bases(cursor);
        yield {
          kind: "streamed",
          name,
          ...(description === undefined ? {} : { description }),
          source,
          bases: current,
        };
      }
    } finally {
      await cursor.close();
    }
  }

  /**
   * Advance to the next header line, joined if it arrived in pieces
   *
   * Non-header lines met here belong to a sequence whose bases were not
   * consumed, unless no header has been seen yet.
   */
  private async nextHeader(
    cursor: LineCursor,
    source: string
  ): Promise<NumberedLine | undefined> {
    const pending = cursor.takePending();
    if (pending !== undefined) {
      return this.restOfLine(cursor, pending);
    }

    let lineStart = true;
    for (let line = await cursor.next(); line !== undefined; line = await cursor.next()) {
      if (lineStart && isFastaHeader(line.text)) {
        cursor.seenHeader = true;
        return this.restOfLine(cursor, line);
      }
      if (!cursor.seenHeader && line.text.trim() !== "") {
        throw new InputFormatError(
          "Sequence data found before the first header",
          "FASTA",
          source,
          line.lineNumber
        );
      }
      lineStart = line.continues !== true;
    }
    return undefined;
  }

  /**
   * Join the remaining pieces of a line that was cut
   */
  private async restOfLine(cursor: LineCursor, first: NumberedLine): Promise<NumberedLine> {
    let text = first.text;
    let line: NumberedLine | undefined = first;
    while (line?.continues === true) {
      line = await cursor.next();
      text += line?.text ?? "";
    }
    return { text, lineNumber: first.lineNumber };
  }

  /**
   * Yield cleaned base fragments until the next header or end of input
   */
  private async *bases(cursor: LineCursor): AsyncGenerator<string> {
    let lineStart = true;
    for (let line = await cursor.next(); line !== undefined; line = await cursor.next()) {
      if (lineStart && isFastaHeader(line.text)) {
        cursor.pushBack(line);
        return;
      }
      lineStart = line.continues !== true;
      const cleaned = cleanSequenceLine(line.text);
      if (cleaned !== "") {
        yield cleaned;
      }
    }
  }
}

/**
 * Shared position in the line stream with one line of push-back
 */
class LineCursor {
  seenHeader = false;
  private pending: NumberedLine | undefined;
  private exhausted = false;

  constructor(private readonly iterator: AsyncIterator<NumberedLine>) {}

  async next(): Promise<NumberedLine | undefined> {
    if (this.pending !== undefined) {
      const line = this.pending;
      this.pending = undefined;
      return line;
    }
    if (this.exhausted) {
      return undefined;
    }
    const step = await this.iterator.next();
    if (step.done === true) {
      this.exhausted = true;
      return undefined;
    }
    return step.value;
  }

  pushBack(line: NumberedLine): void {
    this.pending = line;
  }

  takePending(): NumberedLine | undefined {
    const line = this.pending;
    this.pending = undefined;
    if (line !== undefined) {
      this.seenHeader = true;
    }
    return line;
  }

  /**
   * Release the underlying stream when reading stops early
   */
  async close(): Promise<void> {
    if (!this.exhausted && this.iterator.return !== undefined) {
      this.exhausted = true;
      await this.iterator.return();
    }
  }
}
