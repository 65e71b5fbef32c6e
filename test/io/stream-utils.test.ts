/**
 * Tests for line splitting and the peekable stream reader
 */

import { describe, expect, test } from "vitest";
import { ParseError } from "../../src/errors";
import { BufferedStreamReader, processBuffer, readLines } from "../../src/io/stream-utils";
import { bytesStream, collect, textStream } from "../utils/fixtures";

describe("readLines", () => {
  test("splits on LF, CRLF and lone CR", async () => {
    expect(await collect(readLines(textStream("a\nb\r\nc\rd")))).toEqual(["a", "b", "c", "d"]);
  });

  test("joins a CRLF split across chunks", async () => {
    expect(await collect(readLines(textStream("a\r", "\nb\n")))).toEqual(["a", "b"]);
  });

  test("yields empty lines but no empty final line", async () => {
    expect(await collect(readLines(textStream("a\n\nb\n")))).toEqual(["a", "", "b"]);
  });

  test("strips a trailing CR at end of input", async () => {
    expect(await collect(readLines(textStream("a\r")))).toEqual(["a"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const lines = await collect(readLines(bytesStream(new Uint8Array([0x63, 0xc3]), new Uint8Array([0xa9, 0x0a]))));
    expect(lines).toEqual(["cé"]);
  });

  test("yields nothing for empty input", async () => {
    expect(await collect(readLines(bytesStream()))).toEqual([]);
  });
});

describe("processBuffer", () => {
  test("keeps an unterminated tail and a trailing CR in the remainder", () => {
    expect(processBuffer("x\ny\r")).toEqual({ lines: ["x"], remainder: "y\r" });
  });

  test("rejects over-long lines", () => {
    expect(() => processBuffer("A".repeat(10_000_001))).toThrow(ParseError);
  });
});

describe("BufferedStreamReader", () => {
  const decoder = new TextDecoder();

  test("replays peeked bytes before the rest of the stream", async () => {
    const reader = new BufferedStreamReader(textStream("ab", "cd"));
    expect(decoder.decode(await reader.peek(2))).toBe("ab");
    await expect(new Response(reader.stream()).text()).resolves.toBe("abcd");
  });

  test("peeks across chunk boundaries", async () => {
    const reader = new BufferedStreamReader(textStream("a", "bc"));
    expect(decoder.decode(await reader.peek(2))).toBe("ab");
    await expect(new Response(reader.stream()).text()).resolves.toBe("abc");
  });

  test("returns fewer bytes than asked at end of stream", async () => {
    const reader = new BufferedStreamReader(textStream("abc"));
    expect(await reader.peek(10)).toHaveLength(3);
  });
});
