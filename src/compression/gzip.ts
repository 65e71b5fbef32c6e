/**
 * Streaming gzip decompression
 *
 * Feeds chunks through Node's zlib Gunzip from inside a web TransformStream,
 * so the reference corpus is decompressed incrementally. Concatenated gzip
 * members (bgzip output) decompress as one stream.
 */

import { once } from "node:events";
import { createGunzip } from "node:zlib";
import { type } from "arktype";
import { CompressionError } from "../errors";
import type { DecompressorOptions } from "../types";
import { DecompressorOptionsSchema } from "../types";

function validateOptions(options: DecompressorOptions): void {
  const validation = DecompressorOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new CompressionError(
      `Invalid decompressor options: ${validation.summary}`,
      "gzip",
      "stream"
    );
  }
}

/**
 * Create gzip decompression transform stream
 *
 * Corrupt input, a truncated member and an aborted signal error the
 * stream with a CompressionError.
 *
 * @example
 * ```typescript
 * const decompressed = compressedStream.pipeThrough(createStream());
 * ```
 */
export function createStream(
  options: DecompressorOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  validateOptions(options);
  const { signal } = options;
  const gunzip = createGunzip();
  let bytesProcessed = 0;
  let failure: CompressionError | undefined;

  const fail = (error: unknown): CompressionError => {
    failure ??= CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed);
    return failure;
  };

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller): void {
      gunzip.on("data", (data: Buffer) => {
        if (failure === undefined) controller.enqueue(data);
      });
      gunzip.on("error", (error: unknown) => {
        controller.error(fail(error));
      });
    },
    async transform(chunk): Promise<void> {
      if (failure !== undefined) throw failure;

      bytesProcessed += chunk.length;
      if (signal?.aborted === true) {
        const error = new CompressionError("Decompression aborted", "gzip", "stream", bytesProcessed);
        gunzip.destroy(error);
        throw fail(error);
      }

      try {
        if (!gunzip.write(chunk)) {
          await once(gunzip, "drain");
        }
      } catch (error) {
        throw fail(error);
      }
    },
    async flush(): Promise<void> {
      if (failure !== undefined) throw failure;
      try {
        const ended = once(gunzip, "end");
        gunzip.end();
        await ended;
      } catch (error) {
        throw fail(error);
      }
    },
  });
}

/**
 * Wrap a compressed readable stream with gzip decompression
 *
 * @example
 * ```typescript
 * const raw = await createStream("variant_summary.txt.gz", { compression: "none" });
 * for await (const line of readLines(wrapStream(raw))) {
 *   // ...
 * }
 * ```
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  options: DecompressorOptions = {}
): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream(options));
}

export const GzipDecompressor = {
  createStream,
  wrapStream,
} as const;
