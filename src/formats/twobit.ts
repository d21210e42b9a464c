/**
 * UCSC 2bit header reader
 *
 * Only the file header, the table of contents and each record's DNA size are
 * read; the packed bases are served to the viewer straight from the copied
 * file. Files may be written in either byte order, identified by which way
 * the signature reads.
 *
 * Layout:
 * - header: signature, version, sequenceCount, reserved (4 × uint32)
 * - index: per sequence `nameSize` (uint8), name, record offset (uint32)
 * - record: dnaSize (uint32) first, then blocks we don't need
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import { InputFormatError, IOError } from "../errors";
import { runWithPlatform } from "../io/runtime";
import type { SizedSequence } from "../types";

export const TWOBIT_SIGNATURE = 0x1a412743;

const HEADER_SIZE = 16;
/** Upper bound of one index entry: 1 + 255 name bytes + 4 */
const MAX_INDEX_ENTRY_SIZE = 260;

/**
 * One entry of the 2bit table of contents
 */
export interface TwoBitIndexEntry {
  readonly name: string;
  readonly offset: number;
}

function formatError(message: string, source: string): InputFormatError {
  return new InputFormatError(message, "2BIT", source);
}

/**
 * Determine byte order from the signature
 *
 * @returns `true` for little-endian, `false` for big-endian
 * @throws {InputFormatError} If neither byte order yields the signature
 */
export function detectEndianness(header: Uint8Array, source: string): boolean {
  if (header.length < HEADER_SIZE) {
    throw formatError("Invalid 2bit file: header is truncated", source);
  }
  const view = new DataView(header.buffer, header.byteOffset, header.byteLength);
  if (view.getUint32(0, true) === TWOBIT_SIGNATURE) {
    return true;
  }
  if (view.getUint32(0, false) === TWOBIT_SIGNATURE) {
    return false;
  }
  throw formatError("Invalid 2bit file: bad signature", source);
}

/**
 * Parse the table of contents from the bytes following the header
 *
 * @param bytes - Bytes starting right after the 16-byte header
 * @param count - Number of entries announced by the header
 * @throws {InputFormatError} If the table is truncated
 */
export function parseIndex(
  bytes: Uint8Array,
  count: number,
  littleEndian: boolean,
  source: string
): TwoBitIndexEntry[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const decoder = new TextDecoder("utf-8");
  const entries: TwoBitIndexEntry[] = [];
  let position = 0;

  for (let i = 0; i < count; i++) {
    if (position + 1 > bytes.length) {
      throw formatError(`Invalid 2bit file: index truncated at entry ${i}`, source);
    }
    const nameSize = view.getUint8(position);
    position += 1;
    if (position + nameSize + 4 > bytes.length) {
      throw formatError(`Invalid 2bit file: index truncated at entry ${i}`, source);
    }
    const name = decoder.decode(bytes.subarray(position, position + nameSize));
    position += nameSize;
    const offset = view.getUint32(position, littleEndian);
    position += 4;
    entries.push({ name, offset });
  }

  return entries;
}

/**
 * Read the sequence names and lengths of a 2bit file
 *
 * @param path - 2bit file
 * @returns One sized sequence per record, in file order
 * @throws {InputFormatError} On a bad signature or truncated index/record
 * @throws {IOError} If the file cannot be read
 *
 * @example
 * ```typescript
 * const sequences = await readTwoBitSequences("hg38.2bit");
 * console.log(sequences.map((s) => `${s.name}\t${s.length}`).join("\n"));
 * ```
 */
export async function readTwoBitSequences(path: string): Promise<SizedSequence[]> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs.open(path, { flag: "r" });

    const readAt = (offset: number, length: number) =>
      Effect.gen(function* () {
        yield* file.seek(offset, "start");
        const bytes = yield* file.readAlloc(length);
        return Option.getOrElse(bytes, () => new Uint8Array(0));
      });

    const header = yield* readAt(0, HEADER_SIZE);
    const littleEndian = yield* Effect.try({
      try: () => detectEndianness(header, path),
      catch: (error) => error,
    });
    const view = new DataView(header.buffer, header.byteOffset, header.byteLength);
    const sequenceCount = view.getUint32(8, littleEndian);

    const indexBytes = yield* readAt(HEADER_SIZE, sequenceCount * MAX_INDEX_ENTRY_SIZE);
    const entries = yield* Effect.try({
      try: () => parseIndex(indexBytes, sequenceCount, littleEndian, path),
      catch: (error) => error,
    });

    const sequences: SizedSequence[] = [];
    for (const entry of entries) {
      const record = yield* readAt(entry.offset, 4);
      if (record.length < 4) {
        return yield* Effect.fail(
          formatError(`Invalid 2bit file: record for '${entry.name}' is truncated`, path)
        );
      }
      const dnaSize = new DataView(record.buffer, record.byteOffset, 4).getUint32(0, littleEndian);
      sequences.push({ kind: "sized", name: entry.name, start: 0, end: dnaSize, length: dnaSize });
    }
    return sequences;
  });

  return runWithPlatform(
    program.pipe(
      Effect.scoped,
      Effect.mapError((error) =>
        error instanceof InputFormatError ? error : IOError.fromSystemError("read", path, error)
      )
    )
  );
}
