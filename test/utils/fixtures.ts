/**
 * In-process fixture builders
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

export function makeTempDir(prefix = "refseq-prep-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

/**
 * Deterministic pseudo-random bases
 */
export function makeBases(length: number, seed = 1): string {
  const alphabet = "ACGT";
  let state = seed;
  let bases = "";
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    bases += alphabet.charAt((state >>> 16) % 4);
  }
  return bases;
}

/**
 * FASTA text with sequence lines wrapped at `width`
 */
export function fastaText(
  records: ReadonlyArray<{ name: string; bases: string; description?: string }>,
  width = 60
): string {
  return records
    .map(({ name, bases, description }) => {
      const header = description === undefined ? `>${name}` : `>${name} ${description}`;
      const lines: string[] = [];
      for (let i = 0; i < bases.length; i += width) {
        lines.push(bases.slice(i, i + width));
      }
      return [header, ...lines].join("\n");
    })
    .join("\n")
    .concat("\n");
}

/**
 * Minimal 2bit file: header, index, and per record the DNA size followed by
 * empty N/mask block tables and zeroed packed bases
 */
export function buildTwoBit(
  records: ReadonlyArray<{ name: string; size: number }>,
  littleEndian = true
): Uint8Array {
  const encoder = new TextEncoder();
  const names = records.map((record) => encoder.encode(record.name));
  const indexSize = names.reduce((total, name) => total + 1 + name.length + 4, 0);
  const recordSizes = records.map((record) => 16 + Math.ceil(record.size / 4));
  const total = 16 + indexSize + recordSizes.reduce((a, b) => a + b, 0);

  const bytes = new Uint8Array(total);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, 0x1a412743, littleEndian);
  view.setUint32(4, 0, littleEndian);
  view.setUint32(8, records.length, littleEndian);
  view.setUint32(12, 0, littleEndian);

  let indexPosition = 16;
  let recordPosition = 16 + indexSize;
  records.forEach((record, i) => {
    const name = names[i] ?? new Uint8Array(0);
    view.setUint8(indexPosition, name.length);
    bytes.set(name, indexPosition + 1);
    view.setUint32(indexPosition + 1 + name.length, recordPosition, littleEndian);
    indexPosition += 1 + name.length + 4;

    view.setUint32(recordPosition, record.size, littleEndian);
    recordPosition += recordSizes[i] ?? 16;
  });

  return bytes;
}

/**
 * Collect an async iterable into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
