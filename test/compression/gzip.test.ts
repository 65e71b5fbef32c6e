/**
 * Tests for streaming gzip decompression
 */

import { describe, expect, test } from "vitest";
import { gzipSync } from "fflate";
import { openDecompressed } from "../../src/compression";
import { GzipDecompressor } from "../../src/compression/gzip";
import { CompressionError } from "../../src/errors";
import { bytesStream } from "../utils/fixtures";

const TABLE = "VariationID\tChromosome\n10\t1\n20\tX\n";
const encoder = new TextEncoder();

async function readAll(stream: ReadableStream<Uint8Array>): Promise<string> {
  return new Response(stream).text();
}

describe("GzipDecompressor", () => {
  test("decompresses a stream", async () => {
    const compressed = gzipSync(encoder.encode(TABLE));
    await expect(readAll(GzipDecompressor.wrapStream(bytesStream(compressed)))).resolves.toBe(TABLE);
  });

  test("decompresses input split into single bytes", async () => {
    const compressed = gzipSync(encoder.encode(TABLE));
    const chunks = Array.from(compressed, (byte) => new Uint8Array([byte]));
    await expect(readAll(GzipDecompressor.wrapStream(bytesStream(...chunks)))).resolves.toBe(TABLE);
  });

  test("fails on a truncated member", async () => {
    const compressed = gzipSync(encoder.encode(TABLE.repeat(100)));
    const truncated = compressed.slice(0, Math.floor(compressed.length / 2));
    await expect(readAll(GzipDecompressor.wrapStream(bytesStream(truncated)))).rejects.toThrow(
      CompressionError
    );
  });

  test("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const compressed = gzipSync(encoder.encode(TABLE));
    const stream = GzipDecompressor.wrapStream(bytesStream(compressed), { signal: controller.signal });
    await expect(readAll(stream)).rejects.toThrow(/aborted/);
  });
});

describe("openDecompressed", () => {
  test("sniffs gzip from magic bytes", async () => {
    const compressed = gzipSync(encoder.encode(TABLE));
    await expect(readAll(await openDecompressed(bytesStream(compressed)))).resolves.toBe(TABLE);
  });

  test("passes plain text through, peeked bytes included", async () => {
    const stream = await openDecompressed(bytesStream(encoder.encode("V"), encoder.encode("ariationID\n")));
    await expect(readAll(stream)).resolves.toBe("VariationID\n");
  });

  test("honours an explicit format", async () => {
    const stream = await openDecompressed(bytesStream(encoder.encode(TABLE)), "none");
    await expect(readAll(stream)).resolves.toBe(TABLE);
  });

  test("passes the abort signal to the decompressor", async () => {
    const controller = new AbortController();
    controller.abort();
    const compressed = gzipSync(encoder.encode(TABLE));
    const stream = await openDecompressed(bytesStream(compressed), "auto", { signal: controller.signal });
    await expect(readAll(stream)).rejects.toThrow(CompressionError);
  });
});
