/**
 * Compression support for corpus files
 *
 * @example Streaming decompression
 * ```typescript
 * import { openDecompressed } from './compression';
 *
 * const text = await openDecompressed(raw, 'auto', { signal });
 * ```
 */

import { CompressionError } from "../errors";
import { BufferedStreamReader } from "../io/stream-utils";
import type { CompressionFormat, DecompressorOptions } from "../types";
import { CompressionDetector } from "./detector";
import { wrapStream as wrapGzipStream } from "./gzip";

const MAGIC_BYTES_TO_PEEK = 2;

export { CompressionDetector } from "./detector";
export { GzipDecompressor } from "./gzip";
export type { CompressionFormat, CompressionDetection, DecompressorOptions } from "../types";
export { CompressionError } from "../errors";

/**
 * Apply the decompressor for `format` to a raw stream
 *
 * @throws {CompressionError} If the stream cannot be wrapped
 */
export function decompressStream(
  stream: ReadableStream<Uint8Array>,
  format: CompressionFormat,
  options: DecompressorOptions = {}
): ReadableStream<Uint8Array> {
  switch (format) {
    case "gzip":
      try {
        return wrapGzipStream(stream, options);
      } catch (error) {
        throw CompressionError.fromSystemError("gzip", "stream", error);
      }
    case "none":
      return stream;
  }
}

/**
 * Decompress a raw stream, sniffing the format from its magic bytes when
 * `requested` is "auto"
 */
export async function openDecompressed(
  raw: ReadableStream<Uint8Array>,
  requested: CompressionFormat | "auto" = "auto",
  options: DecompressorOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  if (requested !== "auto") {
    return decompressStream(raw, requested, options);
  }

  const buffered = new BufferedStreamReader(raw);
  const head = await buffered.peek(MAGIC_BYTES_TO_PEEK);
  const detection = CompressionDetector.fromMagicBytes(head);
  return decompressStream(buffered.stream(), detection.format, options);
}
