/**
 * Tests for the prepare-refseqs command
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  formatCliError,
  registerPrepareRefseqsCommand,
  splitRefs,
  toPrepareOptions,
} from "../../src/cli/prepare-refseqs";
import { ConfigError, IOError } from "../../src/errors";
import { makeTempDir, removeDir } from "../utils/fixtures";

describe("splitRefs", () => {
  test("splits on commas and drops empty names", () => {
    expect(splitRefs(["chr1,chr2", "chrM", " chrX ,"])).toEqual(["chr1", "chr2", "chrM", "chrX"]);
  });
});

describe("toPrepareOptions", () => {
  test("maps flags onto options", () => {
    expect(
      toPrepareOptions({
        fasta: ["a.fa", "b.fa"],
        out: "web/data",
        noSort: true,
        noseq: true,
        refs: ["chr1,chr2"],
        compress: true,
        chunksize: 5000,
        nohash: true,
        trackLabel: "ref",
        key: "Genome",
        seqType: "rna",
        trackConfig: '{"a":1}',
        concurrency: 4,
      })
    ).toEqual({
      fastas: ["a.fa", "b.fa"],
      out: "web/data",
      sort: false,
      seq: false,
      refs: ["chr1", "chr2"],
      compress: true,
      chunkSize: 5000,
      hash: false,
      trackLabel: "ref",
      key: "Genome",
      seqType: "rna",
      trackConfig: '{"a":1}',
      concurrency: 4,
    });
  });

  test("defaults the toggles", () => {
    expect(toPrepareOptions({ indexed_fasta: "g.fa", out: "data/" })).toEqual({
      indexedFasta: "g.fa",
      out: "data/",
      sort: true,
      seq: true,
      compress: false,
      hash: true,
    });
  });
});

describe("formatCliError", () => {
  test("adds a hint to known errors", () => {
    expect(formatCliError(new ConfigError("The conf source is not implemented", "conf"))).toBe(
      "ConfigError: The conf source is not implemented\nHint: Run `refseq-prep prepare-refseqs --help` to see the accepted options"
    );
  });

  test("prints errors without a hint as they are", () => {
    const error = new IOError("read failed for 'x'", "x", "read", undefined, "System error: boom");
    expect(formatCliError(error)).toBe("IOError: read failed for 'x'\nContext: System error: boom");
  });

  test("falls back to the message of other errors", () => {
    expect(formatCliError(new Error("plain"))).toBe("plain");
    expect(formatCliError("text")).toBe("text");
  });
});

describe("prepare-refseqs command", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    removeDir(dir);
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  function program(): Command {
    const command = new Command().exitOverride();
    registerPrepareRefseqsCommand(command);
    return command;
  }

  test("prepares a sizes file", async () => {
    const sizes = join(dir, "genome.sizes");
    writeFileSync(sizes, "chr2 20\nchr1 10\n");
    const out = join(dir, "data");

    await program().parseAsync(["prepare-refseqs", "--sizes", sizes, "--out", out, "--noSort", "-q"], {
      from: "user",
    });

    expect(process.exitCode).toBeUndefined();
    expect(JSON.parse(readFileSync(join(out, "seq", "refSeqs.json"), "utf8"))).toEqual([
      { name: "chr2", start: 0, end: 20, length: 20 },
      { name: "chr1", start: 0, end: 10, length: 10 },
    ]);
  });

  test("sets exit code 1 on a configuration error", async () => {
    const out = join(dir, "data");

    await program().parseAsync(["prepare-refseqs", "--conf", "db.conf", "--out", out], { from: "user" });

    expect(process.exitCode).toBe(1);
    expect(existsSync(out)).toBe(false);
  });
});
