/**
 * Tests for chunk path placement
 */

import { describe, expect, test } from "vitest";
import { hashDirectories, shardPath, urlTemplate } from "../../../src/operations/core/sharding";

describe("shardPath", () => {
  describe("flat scheme", () => {
    test("places chunks in a directory per sequence", () => {
      expect(shardPath("chr1", 3, "flat", false)).toBe("seq/chr1/3.txt");
    });

    test("adds .gz when compressed", () => {
      expect(shardPath("chr1", 0, "flat", true)).toBe("seq/chr1/0.txt.gz");
    });
  });

  describe("hashed scheme", () => {
    test("nests chunks under the grouped CRC-32 of name-index", () => {
      expect(hashDirectories("chr1", 0)).toEqual(["748", "c6d", "28"]);
      expect(shardPath("chr1", 0, "hashed", false)).toBe("seq/748/c6d/28/chr1-0.txt");
      expect(shardPath("chr1", 0, "hashed", true)).toBe("seq/748/c6d/28/chr1-0.txt.gz");
    });

    test("keeps leading zeros in directory names", () => {
      expect(shardPath("chr1", 1, "hashed", false)).toBe("seq/038/b5d/be/chr1-1.txt");
    });

    test("is deterministic", () => {
      expect(shardPath("ctgA", 0, "hashed", false)).toBe(shardPath("ctgA", 0, "hashed", false));
      expect(shardPath("ctgA", 0, "hashed", false)).toBe("seq/e2a/ad8/56/ctgA-0.txt");
    });

    test("gives distinct paths for distinct chunks", () => {
      const paths = new Set<string>();
      for (const name of ["chr1", "chr2", "chr10", "chrX", "scaffold_1"]) {
        for (let index = 0; index < 200; index++) {
          paths.add(shardPath(name, index, "hashed", false));
        }
      }
      expect(paths.size).toBe(1000);
    });
  });
});

describe("urlTemplate", () => {
  test("describes each scheme", () => {
    expect(urlTemplate("flat")).toBe("seq/{refseq}/");
    expect(urlTemplate("hashed")).toBe("seq/{chunk_dirpath}/{refseq}-");
  });
});
