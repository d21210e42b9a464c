/**
 * Tests for the 2bit header reader
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { InputFormatError, IOError } from "../../src/errors";
import { detectEndianness, parseIndex, readTwoBitSequences } from "../../src/formats/twobit";
import { buildTwoBit, makeTempDir, removeDir } from "../utils/fixtures";

const RECORDS = [
  { name: "chrB", size: 1234 },
  { name: "chrA", size: 70_000 },
  { name: "chrM", size: 0 },
];

describe("readTwoBitSequences", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  test.each([
    ["little-endian", true],
    ["big-endian", false],
  ])("reads names and sizes from a %s file", async (_label, littleEndian) => {
    const path = join(dir, "genome.2bit");
    writeFileSync(path, buildTwoBit(RECORDS, littleEndian));

    const sequences = await readTwoBitSequences(path);

    expect(sequences).toEqual([
      { kind: "sized", name: "chrB", start: 0, end: 1234, length: 1234 },
      { kind: "sized", name: "chrA", start: 0, end: 70_000, length: 70_000 },
      { kind: "sized", name: "chrM", start: 0, end: 0, length: 0 },
    ]);
  });

  test("rejects a bad signature", async () => {
    const path = join(dir, "bad.2bit");
    const bytes = buildTwoBit(RECORDS);
    bytes[0] = 0;
    writeFileSync(path, bytes);

    await expect(readTwoBitSequences(path)).rejects.toThrow(
      `Invalid 2bit file: bad signature in 2BIT file '${path}'`
    );
  });

  test("rejects a record offset past the end of the file", async () => {
    const path = join(dir, "truncated.2bit");
    const bytes = buildTwoBit([{ name: "chr1", size: 100 }]);
    writeFileSync(path, bytes.subarray(0, 16 + 1 + 4 + 4));

    await expect(readTwoBitSequences(path)).rejects.toThrow(
      "Invalid 2bit file: record for 'chr1' is truncated"
    );
  });

  test("reports a missing file as an IOError", async () => {
    await expect(readTwoBitSequences(join(dir, "missing.2bit"))).rejects.toBeInstanceOf(IOError);
  });
});

describe("detectEndianness", () => {
  test("identifies both byte orders", () => {
    expect(detectEndianness(buildTwoBit([], true).subarray(0, 16), "x.2bit")).toBe(true);
    expect(detectEndianness(buildTwoBit([], false).subarray(0, 16), "x.2bit")).toBe(false);
  });

  test("rejects a short header", () => {
    expect(() => detectEndianness(new Uint8Array(8), "x.2bit")).toThrow(InputFormatError);
  });
});

describe("parseIndex", () => {
  test("rejects an index shorter than the announced count", () => {
    const bytes = buildTwoBit([{ name: "chr1", size: 10 }]).subarray(16, 16 + 1 + 4 + 4);

    expect(() => parseIndex(bytes, 2, true, "x.2bit")).toThrow(
      "Invalid 2bit file: index truncated at entry 1 in 2BIT file 'x.2bit'"
    );
  });
});
