/**
 * Compression module
 *
 * Gzip for chunk output and for `.gz`/`.gzip` inputs.
 *
 * @example
 * ```typescript
 * import { CompressionDetector, decompress } from "refseq-prep";
 *
 * if (CompressionDetector.fromMagicBytes(bytes) === "gzip") {
 *   bytes = await decompress(bytes);
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { compress, decompress, type GzipOptions } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";

export type { CompressionFormat } from "../types";
export { CompressionFormatSchema } from "../types";
export { CompressionError } from "../errors";
