/**
 * Tests for option validation and defaults
 */

import { describe, expect, test } from "vitest";
import { ConfigError } from "../../src/errors";
import { parseTrackConfig, resolveOptions, resolveSource } from "../../src/operations/options";

describe("resolveSource", () => {
  test("requires a source", () => {
    expect(() => resolveSource({})).toThrow(ConfigError);
    expect(() => resolveSource({ fastas: [] })).toThrow(ConfigError);
  });

  test("rejects more than one source", () => {
    expect(() => resolveSource({ fastas: ["a.fa"], twobit: "a.2bit" })).toThrow(
      "Must specify one (and only one) of the following sequence sources: gff, fastas, indexedFasta, twobit, conf, sizes, gffSizes (got fastas, twobit)"
    );
  });

  test("rejects conf as not implemented", () => {
    expect(() => resolveSource({ conf: "db.conf" })).toThrow("The conf source is not implemented");
  });

  test.each([
    [{ gff: "a.gff3" }, { kind: "gff", path: "a.gff3" }],
    [{ fastas: ["a.fa", "b.fa"] }, { kind: "fastas", paths: ["a.fa", "b.fa"] }],
    [{ indexedFasta: "a.fa" }, { kind: "indexedFasta", path: "a.fa" }],
    [{ twobit: "a.2bit" }, { kind: "twobit", path: "a.2bit" }],
    [{ sizes: ["a.sizes"] }, { kind: "sizes", paths: ["a.sizes"] }],
    [{ gffSizes: ["a.gff3"] }, { kind: "gffSizes", paths: ["a.gff3"] }],
  ])("recognises %j", (options, source) => {
    expect(resolveSource(options)).toEqual(source);
  });
});

describe("resolveOptions", () => {
  test("fills defaults", () => {
    const resolved = resolveOptions({ fastas: ["a.fa"] });

    expect(resolved).toMatchObject({
      out: "data/",
      sort: true,
      seq: true,
      compress: false,
      chunkSize: 20_000,
      scheme: "hashed",
      seqType: "dna",
      track: { key: "Reference sequence", seqType: "dna" },
      concurrency: 1,
    });
    expect(resolved.refs).toBeUndefined();
    expect(resolved.track.trackLabel).toBeUndefined();
  });

  test("multiplies the chunk size when compressing", () => {
    expect(resolveOptions({ fastas: ["a.fa"], compress: true }).chunkSize).toBe(80_000);
    expect(resolveOptions({ fastas: ["a.fa"], compress: true, chunkSize: 1000 }).chunkSize).toBe(4000);
  });

  test("maps hash: false to the flat scheme", () => {
    expect(resolveOptions({ fastas: ["a.fa"], hash: false }).scheme).toBe("flat");
  });

  test("normalises the alphabet", () => {
    expect(resolveOptions({ fastas: ["a.fa"], seqType: "Protein" }).seqType).toBe("protein");
  });

  test("turns refs into a set", () => {
    expect(resolveOptions({ sizes: ["a.sizes"], refs: ["chr1", "chr2"] }).refs).toEqual(
      new Set(["chr1", "chr2"])
    );
  });

  test.each([
    [{ chunkSize: 0 }],
    [{ chunkSize: 1.5 }],
    [{ concurrency: 0 }],
    [{ seqType: "binary" }],
    [{ out: "" }],
  ])("rejects %j", (bad) => {
    expect(() => resolveOptions({ fastas: ["a.fa"], ...bad })).toThrow(/^Invalid options: /);
  });

  test("checks the source before anything else", () => {
    expect(() => resolveOptions({ fastas: ["a.fa"], twobit: "a.2bit" })).toThrow(ConfigError);
  });

  test("parses a JSON trackConfig", () => {
    expect(resolveOptions({ fastas: ["a.fa"], trackConfig: '{"category":"Genome"}' }).track.trackConfig).toEqual({
      category: "Genome",
    });
  });
});

describe("parseTrackConfig", () => {
  test("accepts objects as-is", () => {
    expect(parseTrackConfig({ maxExportSpan: 1000 })).toEqual({ maxExportSpan: 1000 });
  });

  test("rejects invalid JSON", () => {
    expect(() => parseTrackConfig("{category:")).toThrow(/^trackConfig is not valid JSON: /);
  });

  test("rejects JSON that is not an object", () => {
    expect(() => parseTrackConfig("[1, 2]")).toThrow(ConfigError);
    expect(() => parseTrackConfig('"text"')).toThrow(ConfigError);
  });
});
