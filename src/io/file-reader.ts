/**
 * File reading utilities on @effect/platform
 *
 * Opens corpus files as web ReadableStreams, decompressed according to their
 * magic bytes unless a format is forced.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { openDecompressed } from "../compression";
import { FileError } from "../errors";
import type { FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

const DEFAULT_OPTIONS = {
  bufferSize: 65_536,
  compression: "auto",
  decompression: {},
} as const satisfies Required<FileReaderOptions>;

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(validatedPath))) return false;
    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * @throws {FileError} If the file does not exist or cannot be opened
 * @throws {CompressionError} If decompression cannot be set up
 *
 * @example
 * ```typescript
 * const stream = await createStream('variant_summary.txt.gz');
 * for await (const line of readLines(stream)) {
 *   // decompressed text lines
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(validatedPath, options);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      "File does not exist or is not a regular file",
      validatedPath,
      "open"
    );
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      chunkSize: FileSystem.Size(mergedOptions.bufferSize),
    });
    return Stream.toReadableStream(effectStream);
  });

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  return openDecompressed(stream, mergedOptions.compression, mergedOptions.decompression);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(path: string, options: FileReaderOptions): Required<FileReaderOptions> {
  const merged: Required<FileReaderOptions> = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, path, "read");
  }

  return merged;
}
