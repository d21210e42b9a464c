/**
 * Tests for line splitting over byte streams
 */

import { describe, expect, test } from "vitest";
import { numberLines, readLineFragments, type LineFragment } from "../../src/io/stream-utils";
import { collect, makeBases } from "../utils/fixtures";

function streamOf(...parts: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(encoder.encode(part));
      controller.close();
    },
  });
}

async function textsOf(stream: ReadableStream<Uint8Array>): Promise<string[]> {
  return (await collect(readLineFragments(stream))).map((fragment) => fragment.text);
}

describe("readLineFragments", () => {
  test("joins lines split across chunks", async () => {
    expect(await textsOf(streamOf(">ch", "r1\nAC", "GT\n"))).toEqual([">chr1", "ACGT"]);
  });

  test("yields a final line without a newline", async () => {
    expect(await textsOf(streamOf("A\nB"))).toEqual(["A", "B"]);
  });

  test("strips CR from a final CRLF-less line", async () => {
    expect(await textsOf(streamOf("A\r\nB\r"))).toEqual(["A", "B"]);
  });

  test("keeps interior blank lines", async () => {
    expect(await textsOf(streamOf("A\n\nB\n"))).toEqual(["A", "", "B"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const bytes = new TextEncoder().encode(">seq1 é\n");
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes.subarray(0, 7));
        controller.enqueue(bytes.subarray(7));
        controller.close();
      },
    });

    expect(await textsOf(stream)).toEqual([">seq1 é"]);
  });

  test("cancels the stream when the consumer stops early", async () => {
    let cancelled = false;
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(new TextEncoder().encode("A\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    for await (const line of readLineFragments(stream)) {
      expect(line.text).toBe("A");
      break;
    }

    expect(cancelled).toBe(true);
  });

  test("cuts a line that spans reads", async () => {
    expect(await collect(readLineFragments(streamOf("AAAAA", "AAAAA\nCC\n"), 4))).toEqual([
      { text: "AAAA", continues: true },
      { text: "AAAA", continues: true },
      { text: "AA", continues: false },
      { text: "CC", continues: false },
    ]);
  });

  test("cuts a long line that arrives in one read", async () => {
    expect(await collect(readLineFragments(streamOf("ACGTACGTAC\n"), 4))).toEqual([
      { text: "ACGT", continues: true },
      { text: "ACGT", continues: true },
      { text: "AC", continues: false },
    ]);
  });

  test("keeps a trailing CR until its newline arrives", async () => {
    expect(await collect(readLineFragments(streamOf("ACGTA\r", "\nG"), 4))).toEqual([
      { text: "ACGT", continues: true },
      { text: "A", continues: false },
      { text: "G", continues: false },
    ]);
  });

  test("streams an unwrapped sequence in bounded pieces", async () => {
    const bases = makeBases(2_000_000, 7);
    const encoded = new TextEncoder().encode(`>chr1\n${bases}\n`);
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        for (let i = 0; i < encoded.length; i += 65_536) {
          controller.enqueue(encoded.subarray(i, i + 65_536));
        }
        controller.close();
      },
    });

    const fragments = await collect(readLineFragments(stream, 10_000));

    expect(fragments[0]).toEqual({ text: ">chr1", continues: false });
    const pieces = fragments.slice(1);
    expect(pieces).toHaveLength(200);
    expect(pieces.every((piece) => piece.text.length <= 10_000)).toBe(true);
    expect(pieces.filter((piece) => !piece.continues)).toHaveLength(1);
    expect(pieces[199]?.continues).toBe(false);
    expect(pieces.map((piece) => piece.text).join("")).toBe(bases);
  });

  test("leaves lines whole without a limit", async () => {
    expect(await collect(readLineFragments(streamOf("ACGTACGT\n")))).toEqual([
      { text: "ACGTACGT", continues: false },
    ]);
  });
});

describe("numberLines", () => {
  test("numbers from 1 and shares a number across pieces of a line", async () => {
    async function* fragments(): AsyncGenerator<LineFragment> {
      yield { text: "a", continues: true };
      yield { text: "b", continues: false };
      yield { text: "c", continues: false };
    }
    expect(await collect(numberLines(fragments()))).toEqual([
      { text: "a", lineNumber: 1, continues: true },
      { text: "b", lineNumber: 1 },
      { text: "c", lineNumber: 2 },
    ]);
  });
});
