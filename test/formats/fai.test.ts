/**
 * Tests for the samtools .fai reader
 */

import { describe, expect, test } from "vitest";
import { InputFormatError } from "../../src/errors";
import { FaiParser, parseFaiLine } from "../../src/formats/fai";
import { collect } from "../utils/fixtures";

describe("parseFaiLine", () => {
  test("reads the five columns", () => {
    expect(parseFaiLine("ctgA\t50001\t6\t60\t61", 1, "volvox.fa.fai")).toEqual({
      name: "ctgA",
      length: 50001,
      offset: 6,
      lineBases: 60,
      lineWidth: 61,
    });
  });

  test("rejects lines without five tab-separated columns", () => {
    const error = (() => {
      try {
        parseFaiLine("ctgA 50001 6 60 61", 3, "volvox.fa.fai");
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(InputFormatError);
    expect(error).toMatchObject({
      message:
        "Improperly-formatted line (expected 5 tab-separated columns) in FAI file 'volvox.fa.fai'",
      lineNumber: 3,
      context: "ctgA 50001 6 60 61",
    });
  });

  test("rejects a line width shorter than the line bases", () => {
    expect(() => parseFaiLine("ctgA\t100\t6\t60\t50", 1, "volvox.fa.fai")).toThrow(
      /^Invalid index record: /
    );
  });
});

describe("FaiParser", () => {
  test("yields sized sequences and skips blank lines", async () => {
    const text = "ctgA\t50001\t6\t60\t61\n\nctgB\t6079\t50847\t60\t61\n";

    const sequences = await collect(new FaiParser().parseString(text, "volvox.fa.fai"));

    expect(sequences).toEqual([
      { kind: "sized", name: "ctgA", start: 0, end: 50001, length: 50001 },
      { kind: "sized", name: "ctgB", start: 0, end: 6079, length: 6079 },
    ]);
  });
});
