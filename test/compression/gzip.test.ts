/**
 * Tests for gzip compression via fflate
 */

import { gzipSync } from "fflate";
import { describe, expect, test } from "vitest";
import { compress, createStream, decompress } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

async function pipe(chunks: Uint8Array[], transform: TransformStream<Uint8Array, Uint8Array>): Promise<string> {
  const input = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk);
      controller.close();
    },
  });
  let text = "";
  const decoder = new TextDecoder();
  for await (const chunk of input.pipeThrough(transform)) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

describe("gzip", () => {
  test("round-trips a chunk", async () => {
    const bases = "ACGTNacgtn".repeat(2_000);

    const compressed = await compress(encode(bases));

    expect(compressed.length).toBeLessThan(bases.length);
    expect(decode(await decompress(compressed))).toBe(bases);
  });

  test("round-trips an empty chunk", async () => {
    expect(await decompress(await compress(new Uint8Array(0)))).toEqual(new Uint8Array(0));
  });

  test("rejects an out-of-range level", async () => {
    await expect(compress(encode("ACGT"), { level: 12 })).rejects.toThrow(
      "Compression level must be 0-9, got 12"
    );
  });

  test("rejects data without the gzip magic bytes", async () => {
    await expect(decompress(encode("ACGT"))).rejects.toBeInstanceOf(CompressionError);
  });

  test("decompresses a stream fed in small pieces", async () => {
    const text = ">chr1\n" + "ACGT".repeat(5_000) + "\n";
    const compressed = gzipSync(encode(text));
    const pieces: Uint8Array[] = [];
    for (let i = 0; i < compressed.length; i += 97) {
      pieces.push(compressed.subarray(i, i + 97));
    }

    expect(await pipe(pieces, createStream())).toBe(text);
  });
});
