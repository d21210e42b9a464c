/**
 * Stream processing utilities for line-oriented sequence files
 */

/**
 * A line of text with its 1-based position in the source file
 *
 * When line length is capped, a long line arrives as several items sharing a
 * line number; every piece but the last has `continues` set.
 */
export interface NumberedLine {
  readonly text: string;
  readonly lineNumber: number;
  readonly continues?: boolean;
}

/**
 * A piece of a line; `continues` is true when more of the same line follows
 */
export interface LineFragment {
  readonly text: string;
  readonly continues: boolean;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Cut a whole line into pieces of at most `maxLength`
 */
function* cutLine(line: string, maxLength: number): Generator<LineFragment> {
  let offset = 0;
  while (line.length - offset > maxLength) {
    yield { text: line.slice(offset, offset + maxLength), continues: true };
    offset += maxLength;
  }
  yield { text: offset === 0 ? line : line.slice(offset), continues: false };
}

/**
 * Split a byte stream into lines, cutting lines longer than `maxLength`
 *
 * Only newly decoded text is scanned for line breaks, so a file that is one
 * very long line is read in linear time, and with a finite `maxLength` never
 * held in memory whole. Accepts `\n` and `\r\n` line endings. A final line
 * without a trailing newline is still yielded.
 *
 * @param stream - Stream of UTF-8 bytes
 * @param maxLength - Longest fragment handed out (default: unlimited)
 *
 * @example
 * ```typescript
 * for await (const { text, continues } of readLineFragments(stream, 65_536)) {
 *   sequence += text;
 *   if (!continues) break;
 * }
 * ```
 */
export async function* readLineFragments(
  stream: ReadableStream<Uint8Array>,
  maxLength = Number.POSITIVE_INFINITY
): AsyncGenerator<LineFragment> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let pending = "";
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      const text = decoder.decode(value, { stream: true });
      let start = 0;
      for (let newline = text.indexOf("\n"); newline !== -1; newline = text.indexOf("\n", start)) {
        yield* cutLine(stripCarriageReturn(pending + text.slice(start, newline)), maxLength);
        pending = "";
        start = newline + 1;
      }
      pending += text.slice(start);

      // Cut only while more text of the line is already known, so a kept
      // "\r" can still pair with a following "\n"
      let offset = 0;
      while (pending.length - offset > maxLength) {
        yield { text: pending.slice(offset, offset + maxLength), continues: true };
        offset += maxLength;
      }
      if (offset > 0) {
        pending = pending.slice(offset);
      }
    }

    const last = stripCarriageReturn(pending + decoder.decode());
    if (last !== "") {
      yield* cutLine(last, maxLength);
    }
  } finally {
    // Stopped early: cancel so the underlying file handle is closed
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Attach 1-based line numbers to line fragments
 */
export async function* numberLines(
  fragments: AsyncIterable<LineFragment>
): AsyncGenerator<NumberedLine> {
  let lineNumber = 1;
  for await (const { text, continues } of fragments) {
    if (continues) {
      yield { text, lineNumber, continues };
    } else {
      yield { text, lineNumber };
      lineNumber++;
    }
  }
}
