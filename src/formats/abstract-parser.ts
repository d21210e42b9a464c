/**
 * Abstract base for line-oriented input readers
 *
 * Provides option merging, AbortSignal support and file opening shared by the
 * FASTA, GFF, .fai and sizes readers. Each format keeps its own parsing logic.
 */

import { RefseqError, type InputFormat } from "../errors";
import { type FileReaderOptions, readNumberedLines } from "../io/file-reader";
import type { NumberedLine } from "../io/stream-utils";

/**
 * Options shared by all readers
 */
export interface ParserOptions {
  /** Abort reading between lines */
  readonly signal?: AbortSignal;
  /** Called for recoverable oddities in the input */
  readonly onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Abstract reader base class
 *
 * @template T - Record type the reader produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & Required<ParserOptions>;

  constructor(options: TOptions) {
    const baseDefaults: Required<ParserOptions> = {
      signal: new AbortController().signal,
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      },
    };

    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
  }

  /**
   * Format-specific default options
   */
  protected getDefaultOptions(): Partial<TOptions> {
    return {};
  }

  /**
   * How `parseFile` reads its input (default: whole lines)
   */
  protected getReaderOptions(): FileReaderOptions {
    return {};
  }

  /**
   * Throw if the caller aborted, naming what was being read
   */
  protected throwIfAborted(context: string): void {
    if (this.options.signal.aborted) {
      throw new RefseqError(
        `Operation aborted during ${this.getFormatName()} ${context}`,
        "ABORTED"
      );
    }
  }

  /**
   * Read records from a file (gzipped files are decompressed)
   *
   * @param filePath - Input file
   * @yields Parsed records
   */
  async *parseFile(filePath: string): AsyncGenerator<T> {
    yield* this.parseLines(readNumberedLines(filePath, this.getReaderOptions()), filePath);
  }

  /**
   * Read records from a string; handy for tests and small inputs
   */
  async *parseString(data: string, source = "<string>"): AsyncGenerator<T> {
    const lines = data.split(/\r?\n/);
    async function* numbered(): AsyncGenerator<NumberedLine> {
      for (const [index, text] of lines.entries()) {
        yield { text, lineNumber: index + 1 };
      }
    }
    yield* this.parseLines(numbered(), source);
  }

  /**
   * Read records from numbered lines
   *
   * @param lines - Input lines with their file line numbers
   * @param source - File name used in error messages
   */
  abstract parseLines(lines: AsyncIterable<NumberedLine>, source: string): AsyncGenerator<T>;

  /**
   * Format identifier for errors and warnings
   */
  protected abstract getFormatName(): InputFormat;
}
