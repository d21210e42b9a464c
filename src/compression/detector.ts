/**
 * Compression format detection for input files
 */

import type { CompressionFormat } from "../types";
import { CompressionError } from "../errors";

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

export const CompressionDetector = {
  /**
   * Detect compression format from file extension
   *
   * @param filePath - File path to analyze
   * @returns `gzip` for `.gz`/`.gzip` files, otherwise `none`
   * @throws {CompressionError} If the path is empty
   *
   * @example
   * ```typescript
   * CompressionDetector.fromExtension("/data/genome.fa.gz"); // "gzip"
   * ```
   */
  fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }
    const normalizedPath = filePath.toLowerCase();
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  },

  /**
   * Detect gzip from the first bytes of a buffer
   */
  fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b ? "gzip" : "none";
  },
} as const;
