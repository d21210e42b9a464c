/**
 * Tests for compression detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";
import { CompressionError } from "../../src/errors";

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test.each([
      ["genome.fa.gz", "gzip"],
      ["genome.fa.gzip", "gzip"],
      ["GENOME.FA.GZ", "gzip"],
      ["genome.fa", "none"],
      ["genome.2bit", "none"],
    ])("%s is %s", (path, format) => {
      expect(CompressionDetector.fromExtension(path)).toBe(format);
    });

    test("rejects an empty path", () => {
      expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
    });
  });

  describe("fromMagicBytes", () => {
    test("recognises the gzip header", () => {
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 8]))).toBe("gzip");
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x3e, 0x63]))).toBe("none");
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f]))).toBe("none");
    });
  });
});
