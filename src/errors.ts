/**
 * Error handling for reference sequence preparation
 *
 * Every failure the tool can report is one of the classes below. Configuration
 * problems are raised before any file is touched; format and I/O problems
 * identify the offending file (and line, where there is one).
 */

/**
 * Base error class for all refseq-prep errors
 */
export class RefseqError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "RefseqError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Bad or contradictory configuration (CLI flags or library options)
 */
export class ConfigError extends RefseqError {
  constructor(
    message: string,
    public readonly option?: string,
    context?: string
  ) {
    super(message, "CONFIG_ERROR", undefined, context);
    this.name = "ConfigError";
  }
}

/**
 * Malformed input content, including an existing manifest that cannot be merged
 */
export class InputFormatError extends RefseqError {
  constructor(
    message: string,
    public readonly format: InputFormat,
    public readonly filePath?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(
      filePath === undefined ? message : `${message} in ${format} file '${filePath}'`,
      "INPUT_FORMAT_ERROR",
      lineNumber,
      context
    );
    this.name = "InputFormatError";
  }
}

export type InputFormat = "FASTA" | "GFF" | "FAI" | "2BIT" | "SIZES" | "JSON";

/**
 * Requested reference sequences that the input does not contain
 */
export class NotFoundError extends RefseqError {
  constructor(public readonly missing: readonly string[]) {
    super(
      `Requested reference sequence${missing.length === 1 ? "" : "s"} not found in input: ${missing.join(", ")}`,
      "NOT_FOUND"
    );
    this.name = "NotFoundError";
  }
}

/**
 * Gzip compression/decompression errors
 */
export class CompressionError extends RefseqError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    if (systemError instanceof CompressionError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    let suggestion = "";
    if (msg.includes("header") || msg.includes("invalid")) {
      suggestion = `. File may be corrupted or not actually ${format} compressed`;
    } else if (msg.includes("unexpected eof") || msg.includes("unexpected end")) {
      suggestion = ". File appears to be truncated or incomplete";
    }

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors carrying the failing path
 */
export class IOError extends RefseqError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: IOOperation,
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "IO_ERROR", undefined, context);
    this.name = "IOError";
  }

  /**
   * Create I/O error with system error context
   */
  static fromSystemError(operation: IOOperation, filePath: string, systemError: unknown): IOError {
    if (systemError instanceof IOError) {
      return systemError;
    }
    const errorMessage = describeSystemError(systemError);
    const suggestion = IOError.getSuggestionForSystemError(errorMessage);

    return new IOError(
      `${operation} failed for '${filePath}': ${errorMessage}${suggestion === undefined ? "" : `. ${suggestion}`}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different output directory";
    }

    return undefined;
  }
}

export type IOOperation = "read" | "write" | "stat" | "open" | "copy" | "rename" | "mkdir";

function describeSystemError(systemError: unknown): string {
  if (systemError instanceof Error) {
    return systemError.message;
  }
  // @effect/platform errors are tagged objects rather than Error instances
  if (typeof systemError === "object" && systemError !== null && "message" in systemError) {
    const { message } = systemError;
    if (typeof message === "string") {
      return message;
    }
  }
  return String(systemError);
}

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: RefseqError): string | undefined {
  if (error instanceof ConfigError) {
    return "Run `refseq-prep prepare-refseqs --help` to see the accepted options";
  }
  if (error instanceof NotFoundError) {
    return "Check the --refs names against the sequence names in the input";
  }
  if (error instanceof InputFormatError && error.format === "FAI") {
    return "Regenerate the index with `samtools faidx`";
  }
  return undefined;
}
