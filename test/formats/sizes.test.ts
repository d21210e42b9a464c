/**
 * Tests for the chromosome sizes reader
 */

import { describe, expect, test } from "vitest";
import { InputFormatError } from "../../src/errors";
import { parseSizesLine, SizesParser } from "../../src/formats/sizes";
import { collect } from "../utils/fixtures";

describe("parseSizesLine", () => {
  test("accepts tab or space separated columns", () => {
    expect(parseSizesLine("chr1\t248956422", 1, "hg38.sizes")).toEqual({
      kind: "sized",
      name: "chr1",
      start: 0,
      end: 248956422,
      length: 248956422,
    });
    expect(parseSizesLine("  chrM   16569 ", 2, "hg38.sizes").length).toBe(16569);
  });

  test.each([["chr1"], ["chr1 10 extra"], ["chr1 ten"], ["chr1 -5"]])(
    "rejects %j",
    (line) => {
      expect(() => parseSizesLine(line, 1, "bad.sizes")).toThrow(InputFormatError);
    }
  );
});

describe("SizesParser", () => {
  test("reads every non-blank line in order", async () => {
    const sequences = await collect(new SizesParser().parseString("chr2 50\n\nchr1 70\n"));
    expect(sequences.map((s) => `${s.name}=${s.length}`)).toEqual(["chr2=50", "chr1=70"]);
  });

  test("reports the failing line", async () => {
    await expect(collect(new SizesParser().parseString("chr1 10\nchr2\n", "g.sizes"))).rejects.toMatchObject({
      lineNumber: 2,
      message: "Expected two columns: <name> <length> in SIZES file 'g.sizes'",
    });
  });
});
