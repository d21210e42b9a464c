/**
 * Non-cryptographic checksums used to spread chunk files across directories
 */

const CRC32_POLYNOMIAL = 0xedb88320;

let crcTable: Uint32Array | undefined;

function getCrcTable(): Uint32Array {
  if (crcTable === undefined) {
    crcTable = new Uint32Array(256);
    for (let n = 0; n < 256; n++) {
      let c = n;
      for (let k = 0; k < 8; k++) {
        c = c & 1 ? CRC32_POLYNOMIAL ^ (c >>> 1) : c >>> 1;
      }
      crcTable[n] = c >>> 0;
    }
  }
  return crcTable;
}

/**
 * CRC-32 (IEEE 802.3, as used by zlib and gzip) of a string's UTF-8 bytes
 *
 * @returns Unsigned 32-bit checksum
 *
 * @example
 * ```typescript
 * crc32("123456789") // 0xcbf43926
 * ```
 */
export function crc32(input: string | Uint8Array): number {
  const bytes = typeof input === "string" ? new TextEncoder().encode(input) : input;
  const table = getCrcTable();
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = (table[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * CRC-32 rendered as 8 lower-case hex digits, zero-padded
 *
 * @example
 * ```typescript
 * crc32Hex("123456789") // "cbf43926"
 * crc32Hex("") // "00000000"
 * ```
 */
export function crc32Hex(input: string | Uint8Array): string {
  return crc32(input).toString(16).padStart(8, "0");
}
