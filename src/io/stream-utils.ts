/**
 * Stream processing utilities for text and binary data
 *
 * Line splitting over byte streams and a peekable stream wrapper used for
 * magic-byte detection before a decompressor is chosen.
 */

import { ParseError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 10_000_000;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Handles `\n`, `\r\n` and lone `\r` endings, including endings split
 * across chunk boundaries. Empty lines are yielded; a final line without a
 * terminator is yielded when non-empty.
 *
 * @throws {ParseError} If a single line exceeds the maximum length
 *
 * @example
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   const fields = line.split('\t');
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer);
    yield* result.lines;

    const last = result.remainder.endsWith("\r")
      ? result.remainder.slice(0, -1)
      : result.remainder;
    if (last.length > 0) {
      yield last;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Extract complete lines from a text buffer
 *
 * A trailing `\r` stays in the remainder because the next chunk may begin
 * with the `\n` of the same `\r\n` ending.
 *
 * @throws {ParseError} If a line exceeds the maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkLength(buffer.slice(lineStart, lineEnd)));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(checkLength(buffer.slice(lineStart, position)));
      lineStart = position + 1;
    }
  }

  return {
    lines,
    remainder: checkLength(buffer.slice(lineStart)),
  };
}

function checkLength(line: string): string {
  if (line.length > MAX_LINE_LENGTH) {
    throw new ParseError(
      `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      "text",
      undefined,
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}

/**
 * Peekable wrapper over a byte stream
 *
 * Bytes read by `peek` are replayed at the front of `stream()`, which pulls
 * the rest of the source lazily.
 */
export class BufferedStreamReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private exhausted = false;
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  /**
   * Return up to `bytes` leading bytes without consuming them
   */
  async peek(bytes: number): Promise<Uint8Array> {
    while (this.buffer.length < bytes && !this.exhausted) {
      const { value, done } = await this.reader.read();
      if (done) {
        this.exhausted = true;
        break;
      }
      const merged = new Uint8Array(this.buffer.length + value.length);
      merged.set(this.buffer);
      merged.set(value, this.buffer.length);
      this.buffer = merged;
    }
    return this.buffer.slice(0, bytes);
  }

  /**
   * Stream of every byte, peeked ones included
   */
  stream(): ReadableStream<Uint8Array> {
    let pending: Uint8Array | null = this.buffer.length > 0 ? this.buffer : null;
    const reader = this.reader;

    return new ReadableStream<Uint8Array>({
      async pull(controller): Promise<void> {
        if (pending !== null) {
          controller.enqueue(pending);
          pending = null;
          return;
        }
        const { value, done } = await reader.read();
        if (done) {
          controller.close();
        } else {
          controller.enqueue(value);
        }
      },
      async cancel(reason): Promise<void> {
        await reader.cancel(reason);
      },
    });
  }
}
